import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import {
  describeRejection,
  isWithinRoot,
  validatePathSafety,
} from '../../../src/validators/path-safety.js';

describe('validatePathSafety', () => {
  it('accepts plain relative paths and globs', () => {
    for (const path of ['.env', '.env*', 'CLAUDE.md', '.claude/', 'secrets/prod.env', 'agents/My Agent.json', '..env', 'a/..b/c']) {
      expect(validatePathSafety(path)).toEqual({ ok: true });
    }
  });

  it('rejects ".." segments wherever they appear', () => {
    for (const path of ['..', '../x', 'x/..', 'x/../y', 'a/b/../../c']) {
      expect(validatePathSafety(path)).toEqual({ ok: false, reason: 'traversal' });
    }
  });

  it('rejects absolute paths', () => {
    expect(validatePathSafety('/etc/passwd')).toEqual({ ok: false, reason: 'absolute' });
    expect(validatePathSafety('/')).toEqual({ ok: false, reason: 'absolute' });
  });

  it('rejects home-relative paths', () => {
    expect(validatePathSafety('~/.ssh/id_rsa')).toEqual({ ok: false, reason: 'home-relative' });
  });

  it('treats a tilde inside a name as ordinary', () => {
    expect(validatePathSafety('backup~/file')).toEqual({ ok: true });
    expect(validatePathSafety('~notes.md')).toEqual({ ok: true });
    expect(validatePathSafety('~')).toEqual({ ok: true });
  });

  it('reports absolute before traversal', () => {
    expect(validatePathSafety('/../x')).toEqual({ ok: false, reason: 'absolute' });
  });
});

describe('describeRejection', () => {
  it('names the offending path', () => {
    expect(describeRejection('../x', 'traversal')).toBe('Path traversal detected in ../x');
    expect(describeRejection('/x', 'absolute')).toBe('Absolute paths not allowed in config: /x');
    expect(describeRejection('~/x', 'home-relative')).toBe('Home directory paths not allowed in config: ~/x');
  });
});

describe('isWithinRoot', () => {
  const root = join('/tmp', 'target');

  it('accepts the root and paths beneath it', () => {
    expect(isWithinRoot(root, root)).toBe(true);
    expect(isWithinRoot(root, join(root, 'config', 'a.env'))).toBe(true);
  });

  it('rejects siblings and parents', () => {
    expect(isWithinRoot(root, '/tmp')).toBe(false);
    expect(isWithinRoot(root, '/tmp/target-other/file')).toBe(false);
  });
});
