import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile, symlink } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  applyBackup,
  decideConflict,
  formatBackupStamp,
  nextBackupPath,
  pathExists,
  resolveConflict,
} from '../../../src/core/conflict.js';

describe('formatBackupStamp', () => {
  it('formats local date and time to the second', () => {
    expect(formatBackupStamp(new Date(2026, 0, 5, 7, 8, 9))).toBe('20260105-070809');
    expect(formatBackupStamp(new Date(2026, 11, 31, 23, 59, 59))).toBe('20261231-235959');
  });
});

describe('decideConflict', () => {
  it('always proceeds when the destination is absent', () => {
    for (const mode of ['skip', 'overwrite', 'backup'] as const) {
      expect(decideConflict(false, mode, '/t/a.bak')).toEqual({ kind: 'proceed' });
    }
  });

  it('applies the policy when the destination exists', () => {
    expect(decideConflict(true, 'skip', '/t/a.bak')).toEqual({ kind: 'skip' });
    expect(decideConflict(true, 'overwrite', '/t/a.bak')).toEqual({ kind: 'proceed' });
    expect(decideConflict(true, 'backup', '/t/a.bak')).toEqual({
      kind: 'proceed-after-backup',
      backupPath: '/t/a.bak',
    });
  });
});

describe('filesystem helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'copy-configs-conflict-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('pathExists counts dangling symlinks as present', async () => {
    const link = join(dir, 'dangling');
    await symlink(join(dir, 'nowhere'), link);
    expect(await pathExists(link)).toBe(true);
    expect(await pathExists(join(dir, 'nowhere'))).toBe(false);
  });

  it('nextBackupPath adds a counter instead of reusing a taken name', async () => {
    const dest = join(dir, 'CLAUDE.md');
    expect(await nextBackupPath(dest, '20260101-000000')).toBe(`${dest}.bak-20260101-000000`);

    await writeFile(`${dest}.bak-20260101-000000`, 'first backup');
    expect(await nextBackupPath(dest, '20260101-000000')).toBe(`${dest}.bak-20260101-000000-1`);

    await writeFile(`${dest}.bak-20260101-000000-1`, 'second backup');
    expect(await nextBackupPath(dest, '20260101-000000')).toBe(`${dest}.bak-20260101-000000-2`);
  });

  it('resolveConflict proceeds for a missing destination', async () => {
    expect(await resolveConflict(join(dir, 'missing'), 'backup', '20260101-000000')).toEqual({
      kind: 'proceed',
    });
  });

  it('resolveConflict plans a backup without touching the file', async () => {
    const dest = join(dir, '.env');
    await writeFile(dest, 'OLD=1');

    const decision = await resolveConflict(dest, 'backup', '20260101-120000');

    expect(decision).toEqual({ kind: 'proceed-after-backup', backupPath: `${dest}.bak-20260101-120000` });
    expect(await readFile(dest, 'utf-8')).toBe('OLD=1');
  });

  it('applyBackup renames the destination', async () => {
    const dest = join(dir, '.env');
    await writeFile(dest, 'OLD=1');

    await applyBackup(dest, `${dest}.bak-x`);

    expect(await pathExists(dest)).toBe(false);
    expect(await readFile(`${dest}.bak-x`, 'utf-8')).toBe('OLD=1');
  });
});
