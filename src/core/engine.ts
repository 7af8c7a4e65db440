import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  emptyTargetSummary,
  recordOutcome,
  sumTotals,
  type RunSummary,
  type SkippedTarget,
  type TargetSummary,
} from '../models/copy-outcome.js';
import { describeRuleSetOrigin } from '../models/rule.js';
import type { RunConfig } from '../models/run-config.js';
import { matchPattern } from '../utils/pattern-matcher.js';
import { copyMatch, type CopyContext } from './copy-executor.js';
import { NoTargetsError, errorMessage } from './errors.js';

export interface RunEngineOptions {
  /** Base for relative target paths */
  cwd?: string;
  /** Aborting stops the run before the next item */
  signal?: AbortSignal;
}

/**
 * Why a target cannot receive files, or null when it can
 */
export async function checkTarget(target: string, sourceRoot: string): Promise<string | null> {
  let isDir = false;
  try {
    isDir = (await stat(target)).isDirectory();
  } catch {
    return 'does not exist';
  }
  if (!isDir) return 'not a directory';
  try {
    await access(target, constants.W_OK);
  } catch {
    return 'not writable';
  }
  if (resolve(target) === resolve(sourceRoot)) return 'same as source root';
  return null;
}

function copyContextFor(config: RunConfig): CopyContext {
  return {
    conflict: config.conflict,
    dryRun: config.dryRun,
    copier: config.copier,
    backupStamp: config.backupStamp,
    logger: config.logger,
  };
}

/**
 * Apply every rule of the run to one target. Rules are independent: a source
 * matched by two rules is copied twice, once per destination.
 */
export async function copyIntoTarget(
  target: string,
  config: RunConfig,
  signal?: AbortSignal,
): Promise<TargetSummary> {
  const { logger } = config;
  const summary = emptyTargetSummary(target);
  const context = copyContextFor(config);

  for (const rule of config.ruleSet.rules) {
    if (signal?.aborted) break;
    logger.debug(`Processing pattern: '${rule.sourcePattern}'`);

    let count = 0;
    try {
      for await (const match of matchPattern(rule.sourcePattern, config.sourceRoot)) {
        if (signal?.aborted) break;
        for (const outcome of await copyMatch(match, target, rule, context)) {
          recordOutcome(summary, outcome);
        }
        count++;
      }
    } catch (error) {
      logger.warn(`Pattern '${rule.sourcePattern}' could not be expanded: ${errorMessage(error)}`);
      continue;
    }

    if (count === 0) {
      logger.verbose(`skip (missing): ${rule.sourcePattern}`);
    } else {
      logger.verbose(`Found matches for '${rule.sourcePattern}': ${count} item(s)`);
    }
  }

  return summary;
}

/**
 * Copy into every target in order. A bad target is skipped with a warning
 * and never stops the others; only an empty target list is fatal.
 */
export async function runCopyConfigs(
  targets: readonly string[],
  config: RunConfig,
  options: RunEngineOptions = {},
): Promise<RunSummary> {
  const { logger } = config;
  const cwd = options.cwd ?? process.cwd();
  const requested = targets.filter((t) => t.length > 0);

  if (requested.length === 0) {
    throw new NoTargetsError();
  }

  logger.info(`Processing ${requested.length} target path(s)`);
  logger.debug(`Target paths: ${requested.join(' ')}`);

  const summaries: TargetSummary[] = [];
  const skippedTargets: SkippedTarget[] = [];

  for (const requestedPath of requested) {
    if (options.signal?.aborted) break;

    const target = resolve(cwd, requestedPath);
    const problem = await checkTarget(target, config.sourceRoot);
    if (problem) {
      logger.warn(`Skipping invalid target: ${target} (${problem})`);
      skippedTargets.push({ target, reason: problem });
      continue;
    }

    logger.info(`Copying files into: ${target}`);
    summaries.push(await copyIntoTarget(target, config, options.signal));
  }

  const interrupted = options.signal?.aborted ?? false;
  if (interrupted) {
    logger.warn('Interrupted; remaining items were not processed');
  } else {
    logger.ok('Done.');
  }

  return {
    sourceRoot: config.sourceRoot,
    config: describeRuleSetOrigin(config.ruleSet.origin),
    targets: summaries,
    skippedTargets,
    totals: sumTotals(summaries),
    interrupted,
  };
}
