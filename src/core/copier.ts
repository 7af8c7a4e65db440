import { execa } from 'execa';
import { cp } from 'node:fs/promises';
import type { CopierPreference } from '../models/run-config.js';
import type { Logger } from '../utils/logger.js';
import { MissingDependencyError } from './errors.js';

export interface PrimitiveCopyOptions {
  /** Source is a real directory (not a symlink to one) */
  isDirectory: boolean;
  /** Leave files that already exist at the destination untouched */
  keepExisting?: boolean;
}

/**
 * Bulk-copy primitive: copies one file, symlink or directory tree to an exact
 * destination path, preserving permissions, timestamps and symlinks.
 * Directories are merged over; existing files are replaced unless
 * `keepExisting` is set.
 */
export interface CopyPrimitive {
  readonly name: 'rsync' | 'native';
  copy(source: string, destination: string, options: PrimitiveCopyOptions): Promise<void>;
}

/**
 * rsync in archive mode. Paths go through argv, never a shell, and "--"
 * keeps names starting with "-" from being read as flags.
 */
export const rsyncCopier: CopyPrimitive = {
  name: 'rsync',
  async copy(source, destination, { isDirectory, keepExisting = false }) {
    const flags = keepExisting ? ['-a', '--ignore-existing'] : ['-a'];
    // Trailing slashes make rsync fill `destination` with the contents of
    // `source` rather than nesting a second directory inside it.
    const paths = isDirectory ? [`${source}/`, `${destination}/`] : [source, destination];
    await execa('rsync', [...flags, '--', ...paths]);
  },
};

export const nativeCopier: CopyPrimitive = {
  name: 'native',
  async copy(source, destination, { keepExisting = false }) {
    await cp(source, destination, {
      recursive: true,
      force: !keepExisting,
      errorOnExist: false,
      preserveTimestamps: true,
      verbatimSymlinks: true,
    });
  },
};

/**
 * Check whether a command can be started
 */
export async function hasCommand(command: string, args: string[] = ['--version']): Promise<boolean> {
  try {
    await execa(command, args);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pick the copy primitive once per run.
 */
export async function probeCopier(
  preference: CopierPreference,
  logger: Logger,
  probe: (command: string) => Promise<boolean> = hasCommand,
): Promise<CopyPrimitive> {
  if (preference === 'native') {
    logger.debug('Copier: native (fs.cp)');
    return nativeCopier;
  }

  const available = await probe('rsync');
  if (available) {
    logger.debug('All dependencies verified: rsync');
    return rsyncCopier;
  }
  if (preference === 'rsync') {
    throw new MissingDependencyError(['rsync']);
  }
  logger.verbose('rsync not found; falling back to native copy');
  return nativeCopier;
}
