import { z } from 'zod';

/**
 * A single copy rule
 *
 * sourcePattern: glob relative to the source root ("CLAUDE.md", ".env*", ".claude/")
 * destPath: path relative to the target root. Equal to sourcePattern when the
 * rule uses the shorthand form, in which case the matched item keeps its
 * relative location under the target.
 */
export const RuleSchema = z
  .object({
    sourcePattern: z.string().min(1),
    destPath: z.string().min(1),
  })
  .readonly();

export type Rule = z.infer<typeof RuleSchema>;

/**
 * Where a rule set came from: the built-in defaults or a rule file path
 */
export type RuleSetOrigin = { kind: 'default' } | { kind: 'file'; path: string };

export interface RuleSet {
  readonly origin: RuleSetOrigin;
  readonly rules: readonly Rule[];
}

/**
 * Conflict policy applied when a destination already exists
 */
export const ConflictModeSchema = z.enum(['skip', 'overwrite', 'backup']);

export type ConflictMode = z.infer<typeof ConflictModeSchema>;

/**
 * True when the rule keeps the relative structure of each match
 */
export function isRelativeStructureRule(rule: Rule): boolean {
  return rule.destPath === rule.sourcePattern;
}

export function describeRuleSetOrigin(origin: RuleSetOrigin): string {
  return origin.kind === 'default' ? 'default patterns' : origin.path;
}
