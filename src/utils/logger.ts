import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'info' | 'ok' | 'warn' | 'error' | 'verbose' | 'debug' | 'dry';

/**
 * Diagnostic sink threaded through the copy engine.
 * Which levels actually print is decided by the implementation.
 */
export interface Logger {
  info(message: string): void;
  ok(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  verbose(message: string): void;
  debug(message: string): void;
  dry(message: string): void;
}

export interface ConsoleLoggerOptions {
  color: boolean;
  verbose: boolean;
  debug: boolean;
  dryRun: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

interface LevelStyle {
  prefix: string;
  paint: (c: ChalkInstance, text: string) => string;
  toStderr: boolean;
}

const LEVEL_STYLES: Record<LogLevel, LevelStyle> = {
  info: { prefix: '>>', paint: (c, t) => c.cyan(t), toStderr: false },
  ok: { prefix: '✓', paint: (c, t) => c.green(t), toStderr: false },
  warn: { prefix: '--', paint: (c, t) => c.gray(t), toStderr: true },
  error: { prefix: '!!', paint: (c, t) => c.red(t), toStderr: true },
  verbose: { prefix: '**', paint: (c, t) => c.magenta(t), toStderr: true },
  debug: { prefix: 'DD', paint: (c, t) => c.yellow(t), toStderr: true },
  dry: { prefix: 'DRY', paint: (c, t) => c.cyanBright(t), toStderr: true },
};

/**
 * Format one log line. Colour also depends on chalk's own terminal detection,
 * so a non-TTY stream gets plain prefixes either way.
 */
export function formatLogLine(level: LogLevel, message: string, color: boolean): string {
  const style = LEVEL_STYLES[level];
  const prefix = color ? style.paint(chalk, style.prefix) : style.prefix;
  return `${prefix} ${message}`;
}

/**
 * Logger writing prefixed lines to stdout/stderr, coloured with chalk.
 * verbose lines print only when verbose is on, debug only with debug,
 * dry only in dry-run mode.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  const write = (level: LogLevel, message: string): void => {
    const stream = LEVEL_STYLES[level].toStderr ? stderr : stdout;
    stream.write(`${formatLogLine(level, message, options.color)}\n`);
  };

  return {
    info: (m) => write('info', m),
    ok: (m) => write('ok', m),
    warn: (m) => write('warn', m),
    error: (m) => write('error', m),
    verbose: (m) => {
      if (options.verbose || options.debug || options.dryRun) write('verbose', m);
    },
    debug: (m) => {
      if (options.debug) write('debug', m);
    },
    dry: (m) => {
      if (options.dryRun) write('dry', m);
    },
  };
}

/**
 * Logger that drops everything (used in --json mode)
 */
export const silentLogger: Logger = {
  info: () => {},
  ok: () => {},
  warn: () => {},
  error: () => {},
  verbose: () => {},
  debug: () => {},
  dry: () => {},
};
