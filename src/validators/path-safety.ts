import { isAbsolute, relative, resolve } from 'node:path';

export type PathRejection = 'traversal' | 'absolute' | 'home-relative';

export type PathSafetyResult = { ok: true } | { ok: false; reason: PathRejection };

const REJECTION_MESSAGES: Record<PathRejection, string> = {
  traversal: 'Path traversal detected in',
  absolute: 'Absolute paths not allowed in config:',
  'home-relative': 'Home directory paths not allowed in config:',
};

/**
 * Check a rule path before it reaches the filesystem.
 * Rejects any ".." segment, a leading "/" and a leading "~/".
 */
export function validatePathSafety(path: string): PathSafetyResult {
  if (path.startsWith('/')) {
    return { ok: false, reason: 'absolute' };
  }
  if (path.startsWith('~/')) {
    return { ok: false, reason: 'home-relative' };
  }
  if (path.split('/').includes('..')) {
    return { ok: false, reason: 'traversal' };
  }
  return { ok: true };
}

export function describeRejection(path: string, reason: PathRejection): string {
  return `${REJECTION_MESSAGES[reason]} ${path}`;
}

/**
 * True when `candidate` resolves to `root` or somewhere beneath it
 */
export function isWithinRoot(root: string, candidate: string): boolean {
  const rel = relative(resolve(root), resolve(candidate));
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}
