import fg from 'fast-glob';
import { lstat } from 'node:fs/promises';
import { join } from 'node:path';

export interface MatchResult {
  /** Path relative to the source root, without a trailing slash */
  relativePath: string;
  sourcePath: string;
  isDirectory: boolean;
}

export function isGlobPattern(pattern: string): boolean {
  return fg.isDynamicPattern(pattern);
}

/**
 * A trailing "/" asks for directories only
 */
export function isDirectoryPattern(pattern: string): boolean {
  return pattern.endsWith('/');
}

function stripTrailingSlashes(pattern: string): string {
  return pattern.replace(/\/+$/, '');
}

async function lstatOrNull(path: string) {
  try {
    return await lstat(path);
  } catch {
    return null;
  }
}

/**
 * Expand a pattern against the source root.
 *
 * Hidden files and directories take part in expansion, so ".env*" finds
 * ".env.local" and ".claude/" finds the hidden directory. Symlinks are
 * reported as themselves and never followed. Literal patterns are checked
 * with lstat instead of globbing, which keeps names with spaces or glob
 * metacharacters exact and lets a dangling symlink still match.
 *
 * Nothing matching is a normal outcome: the generator simply ends.
 */
export async function* matchPattern(
  pattern: string,
  sourceRoot: string,
): AsyncGenerator<MatchResult> {
  const directoriesOnly = isDirectoryPattern(pattern);
  const bare = stripTrailingSlashes(pattern);
  if (!bare) return;

  if (!isGlobPattern(bare)) {
    const sourcePath = join(sourceRoot, bare);
    const stats = await lstatOrNull(sourcePath);
    if (!stats) return;
    const isDirectory = stats.isDirectory();
    if (directoriesOnly && !isDirectory) return;
    yield { relativePath: bare, sourcePath, isDirectory };
    return;
  }

  const entries = await fg(bare, {
    cwd: sourceRoot,
    dot: true,
    onlyFiles: false,
    onlyDirectories: directoriesOnly,
    followSymbolicLinks: false,
  });

  for (const relativePath of entries.sort()) {
    const sourcePath = join(sourceRoot, relativePath);
    const stats = await lstatOrNull(sourcePath);
    if (!stats) continue;
    yield { relativePath, sourcePath, isDirectory: stats.isDirectory() };
  }
}

/**
 * Everything below a directory, relative to it and sorted. Directories carry
 * a trailing "/"; symlinks are listed as leaves and never descended into.
 */
export async function listTreeEntries(directory: string): Promise<string[]> {
  const entries = await fg('**', {
    cwd: directory,
    dot: true,
    onlyFiles: false,
    markDirectories: true,
    followSymbolicLinks: false,
  });
  return entries.sort();
}

/**
 * Collect every match of a pattern. Convenience for callers that need the
 * count up front.
 */
export async function collectMatches(pattern: string, sourceRoot: string): Promise<MatchResult[]> {
  const matches: MatchResult[] = [];
  for await (const match of matchPattern(pattern, sourceRoot)) {
    matches.push(match);
  }
  return matches;
}
