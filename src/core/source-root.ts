import { simpleGit } from 'simple-git';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Logger } from '../utils/logger.js';
import { ConfigError } from './errors.js';

/**
 * Top level of the git working tree containing `cwd`, or null outside one
 * (or when git is not installed).
 */
export async function findGitRoot(cwd: string): Promise<string | null> {
  try {
    const root = await simpleGit(cwd).revparse(['--show-toplevel']);
    return root.trim() || null;
  } catch {
    return null;
  }
}

/**
 * Source root for this run: the --source override, else the git root,
 * else the current directory.
 */
export async function resolveSourceRoot(
  override: string | undefined,
  cwd: string,
  logger: Logger,
  gitRoot: (cwd: string) => Promise<string | null> = findGitRoot,
): Promise<string> {
  if (override) {
    const root = resolve(cwd, override);
    const isDir = await stat(root).then((s) => s.isDirectory(), () => false);
    if (!isDir) {
      throw new ConfigError(`Source root does not exist: ${root}`, root);
    }
    logger.verbose(`Source root (override): ${root}`);
    return root;
  }

  const root = await gitRoot(cwd);
  if (root) {
    logger.verbose(`Source root (git): ${root}`);
    return root;
  }

  logger.warn(`Not in a git repo; using current directory as source root: ${cwd}`);
  return cwd;
}
