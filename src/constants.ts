import { join } from 'node:path';

/**
 * Get the user's home directory (cross-platform).
 */
export function getHomeDir(): string {
  return process.env.HOME || process.env.USERPROFILE || '~';
}

/**
 * Project-local rule file, looked up at the source root
 */
export const RULE_FILE_NAME = '.copyconfigs';

/**
 * Per-user rule files, checked in order after the project-local one
 */
export function getGlobalRuleFilePaths(homeDir: string = getHomeDir()): string[] {
  return [
    join(homeDir, '.config', 'copy-configs', 'config'),
    join(homeDir, '.config', 'gwq', 'copyconfigs'),
  ];
}

/**
 * Patterns copied when no rule file resolves
 */
export const DEFAULT_COPY_PATTERNS = [
  '.env*',
  'CLAUDE.md',
  'GEMINI.md',
  'AGENTS.md',
  'AGENT.md',
  '.claude/',
  '.cursor/',
  '.augment/',
  '.clinerules/',
  '.vscode/settings.json',
] as const;

/**
 * Infix placed between a destination and its backup timestamp
 */
export const BACKUP_INFIX = '.bak-';

/** Exit code for a run stopped by SIGINT/SIGTERM */
export const EXIT_INTERRUPTED = 130;
