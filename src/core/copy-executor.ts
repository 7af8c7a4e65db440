import { lstat, mkdir } from 'node:fs/promises';
import { basename, dirname, join, relative } from 'node:path';
import type { ConflictDecision, CopyOutcome } from '../models/copy-outcome.js';
import { isRelativeStructureRule, type ConflictMode, type Rule } from '../models/rule.js';
import type { Logger } from '../utils/logger.js';
import { isDirectoryPattern, listTreeEntries, type MatchResult } from '../utils/pattern-matcher.js';
import { describeRejection, isWithinRoot, validatePathSafety } from '../validators/path-safety.js';
import { applyBackup, pathExists, resolveConflict } from './conflict.js';
import type { CopyPrimitive } from './copier.js';
import { errorMessage } from './errors.js';

/**
 * Per-run settings the executor needs for every item
 */
export interface CopyContext {
  conflict: ConflictMode;
  dryRun: boolean;
  copier: CopyPrimitive;
  backupStamp: string;
  logger: Logger;
}

export interface ResolvedDestination {
  /** Destination relative to the target root, as shown in logs */
  relativeDest: string;
  /** Absolute destination path, without a trailing slash */
  destination: string;
  explicit: boolean;
}

/**
 * Work out where a match lands inside a target.
 *
 * Without a rule, or when the rule's destination equals its pattern, the
 * match keeps its path relative to the source root. Otherwise the rule's
 * destination is used as-is. A destination ending in "/" names a directory:
 * a "dir/" pattern fills it with the matched directory's contents, anything
 * else lands inside it under its own basename.
 */
export function resolveDestination(
  match: MatchResult,
  target: string,
  rule: Rule | null,
): ResolvedDestination {
  if (!rule || isRelativeStructureRule(rule)) {
    return {
      relativeDest: match.relativePath,
      destination: join(target, match.relativePath),
      explicit: false,
    };
  }

  let relativeDest = rule.destPath;
  if (rule.destPath.endsWith('/')) {
    const directory = rule.destPath.replace(/\/+$/, '');
    const intoContents = match.isDirectory && isDirectoryPattern(rule.sourcePattern);
    relativeDest = intoContents ? directory : `${directory}/${basename(match.relativePath)}`;
  }

  return { relativeDest, destination: join(target, relativeDest), explicit: true };
}

async function ensureParentDir(destination: string, logger: Logger): Promise<void> {
  try {
    await mkdir(dirname(destination), { recursive: true });
  } catch (error) {
    // The copy below fails and reports the problem.
    logger.debug(`Could not create ${dirname(destination)}: ${errorMessage(error)}`);
  }
}

async function isExistingDirectory(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Skip mode for a directory landing on an existing directory: files already
 * at the destination are kept and reported one by one, everything missing is
 * added.
 */
async function mergeMissing(
  match: MatchResult,
  target: string,
  destination: string,
  label: string,
  context: CopyContext,
): Promise<CopyOutcome[]> {
  const { logger } = context;
  const base = { sourcePath: match.sourcePath, destPath: destination };

  let entries: string[];
  try {
    entries = await listTreeEntries(match.sourcePath);
  } catch (error) {
    logger.error(`Failed to list ${match.sourcePath}: ${errorMessage(error)}`);
    return [{ ...base, status: 'failed', error: errorMessage(error) }];
  }

  const outcomes: CopyOutcome[] = [];
  let missing = 0;
  for (const entry of entries) {
    const entryDest = join(destination, entry);
    if (!(await pathExists(entryDest))) {
      missing++;
    } else if (!entry.endsWith('/')) {
      logger.warn(`keep (exists): ${relative(target, entryDest)}`);
      outcomes.push({ sourcePath: join(match.sourcePath, entry), destPath: entryDest, status: 'skipped' });
    }
  }

  if (missing === 0) {
    if (outcomes.length === 0) {
      logger.warn(`keep (exists): ${relative(target, destination)}`);
      outcomes.push({ ...base, status: 'skipped' });
    }
    return outcomes;
  }

  if (context.dryRun) {
    logger.dry(`Would copy: ${match.relativePath} -> ${destination} (${missing} new item(s))`);
    return [...outcomes, { ...base, status: 'copied', simulated: true }];
  }

  try {
    await context.copier.copy(match.sourcePath, destination, { isDirectory: true, keepExisting: true });
  } catch (error) {
    logger.error(`Failed to copy ${match.sourcePath} to ${destination}: ${errorMessage(error)}`);
    return [...outcomes, { ...base, status: 'failed', error: errorMessage(error) }];
  }

  logger.ok(`copied: ${label}`);
  return [...outcomes, { ...base, status: 'copied' }];
}

/**
 * Copy one matched item into one target under the active conflict policy.
 * Usually yields a single outcome; a directory merged in skip mode also
 * yields one 'skipped' outcome per file it kept. Never throws: every failure
 * becomes a 'failed' outcome.
 */
export async function copyMatch(
  match: MatchResult,
  target: string,
  rule: Rule | null,
  context: CopyContext,
): Promise<CopyOutcome[]> {
  const { logger } = context;
  const { relativeDest, destination, explicit } = resolveDestination(match, target, rule);
  const base = { sourcePath: match.sourcePath, destPath: destination };

  const safety = validatePathSafety(relativeDest);
  if (!safety.ok || !isWithinRoot(target, destination)) {
    const message = safety.ok
      ? `Destination escapes target: ${relativeDest}`
      : describeRejection(relativeDest, safety.reason);
    logger.error(message);
    return [{ ...base, status: 'failed', error: message }];
  }

  const label = explicit ? `${basename(match.relativePath)} -> ${relativeDest}` : relativeDest;

  if (context.conflict === 'skip' && match.isDirectory && (await isExistingDirectory(destination))) {
    return mergeMissing(match, target, destination, label, context);
  }

  let decision: ConflictDecision;
  try {
    decision = await resolveConflict(destination, context.conflict, context.backupStamp);
  } catch (error) {
    logger.error(`Failed to inspect ${destination}: ${errorMessage(error)}`);
    return [{ ...base, status: 'failed', error: errorMessage(error) }];
  }

  if (decision.kind === 'skip') {
    logger.warn(`keep (exists): ${relativeDest}`);
    return [{ ...base, status: 'skipped' }];
  }

  const backupPath = decision.kind === 'proceed-after-backup' ? decision.backupPath : undefined;

  if (context.dryRun) {
    const backupNote = backupPath ? ` (backup existing to ${relative(target, backupPath)})` : '';
    logger.dry(`Would copy: ${match.relativePath} -> ${destination}${backupNote}`);
    return [{ ...base, status: 'copied', simulated: true, ...(backupPath && { backupPath }) }];
  }

  if (backupPath) {
    try {
      await applyBackup(destination, backupPath);
      logger.info(`backup: ${relativeDest} -> ${relative(target, backupPath)}`);
    } catch (error) {
      logger.error(`Failed to back up ${destination}: ${errorMessage(error)}`);
      return [{ ...base, status: 'failed', error: errorMessage(error) }];
    }
  }

  await ensureParentDir(destination, logger);

  try {
    await context.copier.copy(match.sourcePath, destination, { isDirectory: match.isDirectory });
  } catch (error) {
    logger.error(`Failed to copy ${match.sourcePath} to ${destination}: ${errorMessage(error)}`);
    return [{ ...base, status: 'failed', error: errorMessage(error), ...(backupPath && { backupPath }) }];
  }

  logger.ok(`copied: ${label}`);
  return [{ ...base, status: 'copied', ...(backupPath && { backupPath }) }];
}
