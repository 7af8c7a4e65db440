import { lstat, rename } from 'node:fs/promises';
import { BACKUP_INFIX } from '../constants.js';
import type { ConflictDecision } from '../models/copy-outcome.js';
import type { ConflictMode } from '../models/rule.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Filesystem-safe local timestamp, e.g. 20261019-142305
 */
export function formatBackupStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Pure policy table: what to do with a destination given whether it exists.
 *
 * | mode      | absent  | present                         |
 * |-----------|---------|---------------------------------|
 * | skip      | proceed | skip                            |
 * | overwrite | proceed | proceed                         |
 * | backup    | proceed | proceed after renaming existing |
 */
export function decideConflict(
  destinationExists: boolean,
  mode: ConflictMode,
  backupPath: string,
): ConflictDecision {
  if (!destinationExists) return { kind: 'proceed' };
  switch (mode) {
    case 'skip':
      return { kind: 'skip' };
    case 'overwrite':
      return { kind: 'proceed' };
    case 'backup':
      return { kind: 'proceed-after-backup', backupPath };
  }
}

/**
 * lstat-based existence, so a dangling symlink counts as present
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * First free `<dest>.bak-<stamp>` name. A counter is appended when a backup
 * with the same stamp already exists, so earlier backups are never replaced.
 */
export async function nextBackupPath(destination: string, stamp: string): Promise<string> {
  const base = `${destination}${BACKUP_INFIX}${stamp}`;
  let candidate = base;
  for (let n = 1; await pathExists(candidate); n++) {
    candidate = `${base}-${n}`;
  }
  return candidate;
}

/**
 * Look at the destination on disk and decide how to proceed.
 * Does not rename anything; see applyBackup.
 */
export async function resolveConflict(
  destination: string,
  mode: ConflictMode,
  stamp: string,
): Promise<ConflictDecision> {
  const exists = await pathExists(destination);
  const backupPath = exists && mode === 'backup' ? await nextBackupPath(destination, stamp) : '';
  return decideConflict(exists, mode, backupPath);
}

export async function applyBackup(destination: string, backupPath: string): Promise<void> {
  await rename(destination, backupPath);
}
