export { validatePathSafety, isWithinRoot, type PathRejection, type PathSafetyResult } from './validators/path-safety.js';
export { parseRuleLine, parseRuleFile, classifyRuleLine } from './utils/rule-parser.js';
export { matchPattern, collectMatches, listTreeEntries, type MatchResult } from './utils/pattern-matcher.js';
export { decideConflict, resolveConflict, formatBackupStamp } from './core/conflict.js';
export { copyMatch, resolveDestination, type CopyContext } from './core/copy-executor.js';
export { rsyncCopier, nativeCopier, probeCopier, type CopyPrimitive } from './core/copier.js';
export { copyIntoTarget, runCopyConfigs, checkTarget } from './core/engine.js';
export { buildRunConfig, parseRunOptions, type RunEnvironment } from './core/run-config.js';
export { loadRuleSet, findRuleFile, defaultRuleSet } from './core/rule-config.js';
export { resolveSourceRoot, findGitRoot } from './core/source-root.js';
export { ConfigError, MissingDependencyError, NoTargetsError } from './core/errors.js';
export { createConsoleLogger, silentLogger, type Logger } from './utils/logger.js';
export type { Rule, RuleSet, ConflictMode } from './models/rule.js';
export type { RunConfig, RunOptions, CopierPreference } from './models/run-config.js';
export type { CopyOutcome, ConflictDecision, RunSummary, TargetSummary } from './models/copy-outcome.js';
export { DEFAULT_COPY_PATTERNS, RULE_FILE_NAME } from './constants.js';
