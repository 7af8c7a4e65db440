import {
  RunOptionsSchema,
  type RunConfig,
  type RunOptions,
  type RunOptionsInput,
} from '../models/run-config.js';
import type { Logger } from '../utils/logger.js';
import { formatBackupStamp } from './conflict.js';
import { probeCopier } from './copier.js';
import { loadRuleSet } from './rule-config.js';
import { resolveSourceRoot } from './source-root.js';

/**
 * Environment hooks, replaceable in tests
 */
export interface RunEnvironment {
  logger: Logger;
  cwd?: string;
  homeDir?: string;
  now?: () => Date;
  probe?: (command: string) => Promise<boolean>;
  gitRoot?: (cwd: string) => Promise<string | null>;
}

export function parseRunOptions(input: RunOptionsInput): RunOptions {
  return RunOptionsSchema.parse(input);
}

/**
 * Resolve everything an invocation needs exactly once: the copy primitive,
 * the source root, the rule set and the backup timestamp. The result is
 * frozen and passed to the engine explicitly.
 */
export async function buildRunConfig(options: RunOptions, env: RunEnvironment): Promise<RunConfig> {
  const { logger } = env;
  const cwd = env.cwd ?? process.cwd();

  logger.debug(
    `Parsed arguments: verbose=${options.verbose} debug=${options.debug} dry_run=${options.dryRun}`,
  );
  logger.debug(`Config override: ${options.config ?? '<none>'}`);
  logger.debug(`Conflict mode: ${options.conflict}`);

  const copier = await probeCopier(options.copier, logger, env.probe);
  const sourceRoot = await resolveSourceRoot(options.source, cwd, logger, env.gitRoot);
  const ruleSet = await loadRuleSet(
    sourceRoot,
    {
      cwd,
      ...(options.config && { override: options.config }),
      ...(env.homeDir && { homeDir: env.homeDir }),
    },
    logger,
  );

  return Object.freeze({
    sourceRoot,
    ruleSet,
    conflict: options.conflict,
    dryRun: options.dryRun,
    copier,
    backupStamp: formatBackupStamp((env.now ?? (() => new Date()))()),
    logger,
  });
}
