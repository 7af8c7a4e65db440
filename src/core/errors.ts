/**
 * Fatal configuration problem: an unreadable --config override or a
 * --source that is not a directory. Aborts the whole run.
 */
export class ConfigError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * A required external command is not on PATH
 */
export class MissingDependencyError extends Error {
  readonly commands: string[];

  constructor(commands: string[]) {
    super(`Missing required commands: ${commands.join(' ')}`);
    this.name = 'MissingDependencyError';
    this.commands = commands;
  }
}

export class NoTargetsError extends Error {
  constructor() {
    super('No target paths provided');
    this.name = 'NoTargetsError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
