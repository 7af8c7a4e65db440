import type { Rule } from '../models/rule.js';
import { describeRejection, validatePathSafety } from '../validators/path-safety.js';
import type { Logger } from './logger.js';

export interface ParsedRuleFile {
  rules: Rule[];
  /** One message per rejected line, prefixed with its line number */
  rejected: string[];
}

export type RuleLineResult =
  | { kind: 'rule'; rule: Rule }
  | { kind: 'empty' }
  | { kind: 'rejected'; message: string };

/**
 * Classify one rule-file line.
 *
 * Lines are `pattern` or `pattern:dest`. Everything from the first `#` is a
 * comment, and blank lines are ignored. Only the first colon splits, so the
 * destination half may itself contain colons.
 */
export function classifyRuleLine(line: string): RuleLineResult {
  let raw = line.endsWith('\r') ? line.slice(0, -1) : line;
  const hash = raw.indexOf('#');
  if (hash !== -1) raw = raw.slice(0, hash);
  raw = raw.trim();

  if (!raw) return { kind: 'empty' };

  const colon = raw.indexOf(':');
  const sourcePattern = colon === -1 ? raw : raw.slice(0, colon).trim();
  const destPath = colon === -1 ? raw : raw.slice(colon + 1).trim();

  if (!sourcePattern || !destPath) {
    return { kind: 'rejected', message: `Malformed rule (empty side): ${raw}` };
  }

  for (const part of [sourcePattern, destPath]) {
    const check = validatePathSafety(part);
    if (!check.ok) {
      return { kind: 'rejected', message: describeRejection(part, check.reason) };
    }
  }

  return { kind: 'rule', rule: { sourcePattern, destPath } };
}

/**
 * Parse one rule line. Returns null for blank, comment-only and rejected
 * lines; rejections are reported through the optional logger.
 */
export function parseRuleLine(line: string, logger?: Logger): Rule | null {
  const result = classifyRuleLine(line);
  if (result.kind === 'rejected') {
    logger?.error(result.message);
    return null;
  }
  return result.kind === 'rule' ? result.rule : null;
}

/**
 * Parse a whole rule file. A bad line never stops the ones after it.
 */
export function parseRuleFile(content: string, logger?: Logger): ParsedRuleFile {
  const rules: Rule[] = [];
  const rejected: string[] = [];

  content.split('\n').forEach((line, index) => {
    const result = classifyRuleLine(line);
    if (result.kind === 'rule') {
      rules.push(result.rule);
    } else if (result.kind === 'rejected') {
      const message = `line ${index + 1}: ${result.message}`;
      rejected.push(message);
      logger?.error(message);
    }
  });

  return { rules, rejected };
}
