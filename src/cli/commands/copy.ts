import { array, command, flag, oneOf, option, multioption, optional, string, type Type } from 'cmd-ts';
import { EXIT_INTERRUPTED } from '../../constants.js';
import { runCopyConfigs } from '../../core/engine.js';
import { ConfigError, MissingDependencyError, NoTargetsError } from '../../core/errors.js';
import { buildRunConfig, parseRunOptions, type RunEnvironment } from '../../core/run-config.js';
import type { CopierPreference } from '../../models/run-config.js';
import type { ConflictMode } from '../../models/rule.js';
import { createConsoleLogger, silentLogger } from '../../utils/logger.js';
import { buildRunData, formatRunSummary } from '../format-summary.js';
import { buildDescription } from '../help.js';
import { jsonOutput } from '../json-output.js';
import { copyMeta } from '../metadata/copy.js';
import { readTargetsFromStream } from '../stdin.js';

export interface CopyCommandArgs {
  target: string[];
  config?: string | undefined;
  source?: string | undefined;
  conflict: ConflictMode;
  copier: CopierPreference;
  verbose: boolean;
  debug: boolean;
  dryRun: boolean;
  noColor: boolean;
}

/**
 * Process-level collaborators, replaceable in tests
 */
export interface CommandIO {
  json: boolean;
  cwd: string;
  stdin: AsyncIterable<string | Buffer> & { isTTY?: boolean };
  stdout: NodeJS.WritableStream & { isTTY?: boolean };
  stderr: NodeJS.WritableStream;
  signal?: AbortSignal;
  environment?: Omit<RunEnvironment, 'logger' | 'cwd'>;
}

const COMMAND = 'copy';

const isKnownFatal = (error: unknown): error is Error =>
  error instanceof ConfigError || error instanceof MissingDependencyError || error instanceof NoTargetsError;

/**
 * Run one invocation and return its exit code.
 *
 * Targets come from --target, or from stdin (one per line) when no --target
 * was given and stdin is not a terminal.
 */
export async function executeCopyCommand(args: CopyCommandArgs, io: CommandIO): Promise<number> {
  const logger = io.json
    ? silentLogger
    : createConsoleLogger({
        color: !args.noColor && io.stdout.isTTY === true,
        verbose: args.verbose,
        debug: args.debug,
        dryRun: args.dryRun,
        stdout: io.stdout,
        stderr: io.stderr,
      });

  try {
    const targets = [...args.target];
    if (targets.length === 0 && !io.stdin.isTTY) {
      logger.verbose('Reading target paths from stdin');
      targets.push(...(await readTargetsFromStream(io.stdin)));
    }

    const options = parseRunOptions({
      targets,
      conflict: args.conflict,
      copier: args.copier,
      dryRun: args.dryRun,
      verbose: args.verbose,
      debug: args.debug,
      color: !args.noColor,
      ...(args.config && { config: args.config }),
      ...(args.source && { source: args.source }),
    });

    if (options.targets.length === 0) {
      throw new NoTargetsError();
    }

    const config = await buildRunConfig(options, { ...io.environment, logger, cwd: io.cwd });
    const summary = await runCopyConfigs(options.targets, config, {
      cwd: io.cwd,
      ...(io.signal && { signal: io.signal }),
    });

    if (io.json) {
      jsonOutput(
        { success: !summary.interrupted, command: COMMAND, data: buildRunData(summary) },
        io.stdout,
      );
    } else {
      io.stdout.write(`\n${formatRunSummary(summary, config.dryRun).join('\n')}\n`);
    }
    return summary.interrupted ? EXIT_INTERRUPTED : 0;
  } catch (error) {
    if (!isKnownFatal(error)) throw error;
    if (io.json) {
      jsonOutput({ success: false, command: COMMAND, error: error.message }, io.stdout);
    } else {
      io.stderr.write(`Error: ${error.message}\n`);
    }
    return 1;
  }
}

const targetList: Type<string[], string[]> = {
  ...array(string),
  displayName: 'path',
  defaultValue: () => [],
};

/**
 * Abort controller wired to SIGINT/SIGTERM for the lifetime of one run
 */
function interruptSignal(): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return {
    signal: controller.signal,
    release: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

export function createCopyCommand(options: { json: boolean; version: string }) {
  return command({
    name: 'copy-configs',
    version: options.version,
    description: buildDescription(copyMeta),
    args: {
      target: multioption({
        type: targetList,
        long: 'target',
        short: 't',
        description: 'Target directory (repeatable); read from stdin when omitted',
      }),
      config: option({
        type: optional(string),
        long: 'config',
        short: 'c',
        description: 'Rule file to use instead of the default search',
      }),
      source: option({
        type: optional(string),
        long: 'source',
        short: 's',
        description: 'Source root to copy from (default: git root, else current directory)',
      }),
      conflict: option({
        type: oneOf<ConflictMode>(['skip', 'overwrite', 'backup']),
        long: 'conflict',
        short: 'C',
        defaultValue: (): ConflictMode => 'skip',
        defaultValueIsSerializable: true,
        description: 'What to do when a destination exists: skip|overwrite|backup',
      }),
      copier: option({
        type: oneOf<CopierPreference>(['auto', 'rsync', 'native']),
        long: 'copier',
        defaultValue: (): CopierPreference => 'auto',
        defaultValueIsSerializable: true,
        description: 'Copy primitive: auto|rsync|native',
      }),
      verbose: flag({ long: 'verbose', short: 'v', description: 'Enable verbose output' }),
      debug: flag({ long: 'debug', description: 'Enable debug output (implies --verbose)' }),
      dryRun: flag({ long: 'dry-run', short: 'n', description: 'Show what would be done without copying' }),
      noColor: flag({ long: 'no-color', description: 'Disable ANSI colors in output' }),
    },
    handler: async (args) => {
      const { signal, release } = interruptSignal();
      try {
        const code = await executeCopyCommand(args, {
          json: options.json,
          cwd: process.cwd(),
          stdin: process.stdin,
          stdout: process.stdout,
          stderr: process.stderr,
          signal,
        });
        process.exitCode = code;
      } finally {
        release();
      }
    },
  });
}
