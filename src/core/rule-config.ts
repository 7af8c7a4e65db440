import { constants } from 'node:fs';
import { access, readFile, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { DEFAULT_COPY_PATTERNS, RULE_FILE_NAME, getGlobalRuleFilePaths, getHomeDir } from '../constants.js';
import type { RuleSet } from '../models/rule.js';
import type { Logger } from '../utils/logger.js';
import { parseRuleFile } from '../utils/rule-parser.js';
import { ConfigError, errorMessage } from './errors.js';

export interface RuleSourceOptions {
  /** Explicit --config path; relative paths resolve against cwd */
  override?: string;
  cwd?: string;
  homeDir?: string;
}

async function isReadable(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

async function isReadableFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile() && (await isReadable(path));
  } catch {
    return false;
  }
}

/**
 * Rule files searched when no override is given, highest priority first
 */
export function ruleFileSearchPaths(sourceRoot: string, homeDir: string = getHomeDir()): string[] {
  return [join(sourceRoot, RULE_FILE_NAME), ...getGlobalRuleFilePaths(homeDir)];
}

/**
 * Find the rule file for this run.
 *
 * An explicit override only has to be readable (a FIFO from process
 * substitution is fine) and is fatal when it is not. The search paths must
 * be readable regular files; anything else is passed over.
 * Returns null when nothing resolves.
 */
export async function findRuleFile(
  sourceRoot: string,
  options: RuleSourceOptions = {},
): Promise<string | null> {
  if (options.override) {
    const overridePath = resolve(options.cwd ?? process.cwd(), options.override);
    if (!(await isReadable(overridePath))) {
      throw new ConfigError(`Config file not accessible: ${overridePath}`, overridePath);
    }
    return overridePath;
  }

  for (const candidate of ruleFileSearchPaths(sourceRoot, options.homeDir)) {
    if (await isReadableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

export function defaultRuleSet(): RuleSet {
  return {
    origin: { kind: 'default' },
    rules: DEFAULT_COPY_PATTERNS.map((pattern) => ({ sourcePattern: pattern, destPath: pattern })),
  };
}

/**
 * Resolve and parse the active rule set, falling back to the defaults.
 * Rejected lines are logged and dropped.
 */
export async function loadRuleSet(
  sourceRoot: string,
  options: RuleSourceOptions,
  logger: Logger,
): Promise<RuleSet> {
  const path = await findRuleFile(sourceRoot, options);

  if (!path) {
    logger.info(`No config file found, using default patterns: ${DEFAULT_COPY_PATTERNS.join(' ')}`);
    return defaultRuleSet();
  }

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not read config ${path}: ${errorMessage(error)}`, path);
  }

  logger.info(`Using config: ${path}`);
  const { rules } = parseRuleFile(content, logger);
  logger.debug(`Parsed ${rules.length} rule(s) from ${path}`);
  return { origin: { kind: 'file', path }, rules };
}
