export interface JsonEnvelope {
  success: boolean;
  command: string;
  data?: unknown;
  error?: string;
}

export function jsonOutput(
  envelope: JsonEnvelope,
  stream: NodeJS.WritableStream = process.stdout,
): void {
  stream.write(`${JSON.stringify(envelope, null, 2)}\n`);
}

/**
 * Strip --json from args so cmd-ts doesn't see it.
 */
export function extractJsonFlag(args: string[]): { args: string[]; json: boolean } {
  const idx = args.indexOf('--json');
  if (idx === -1) return { args, json: false };
  return { args: [...args.slice(0, idx), ...args.slice(idx + 1)], json: true };
}

const LONG_ALIASES: Record<string, string> = {
  '--copy-on-conflict': '--conflict',
};

/**
 * Rewrite long-option aliases cmd-ts can't declare (one long name per option).
 * Handles both `--alias value` and `--alias=value`.
 */
export function normalizeArgAliases(args: string[]): string[] {
  return args.map((arg) => {
    const [name, ...rest] = arg.split('=');
    const canonical = name !== undefined ? LONG_ALIASES[name] : undefined;
    if (!canonical) return arg;
    return rest.length > 0 ? `${canonical}=${rest.join('=')}` : canonical;
  });
}
