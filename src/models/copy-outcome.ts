/**
 * Decision taken for one destination before copying
 */
export type ConflictDecision =
  | { kind: 'proceed' }
  | { kind: 'skip' }
  | { kind: 'proceed-after-backup'; backupPath: string };

export type CopyStatus = 'copied' | 'skipped' | 'failed';

/**
 * Result of copying one matched item into one target
 */
export interface CopyOutcome {
  status: CopyStatus;
  sourcePath: string;
  destPath: string;
  error?: string;
  /** Set when an existing destination was renamed before copying */
  backupPath?: string;
  /** Set in dry-run mode: nothing was written */
  simulated?: boolean;
}

export interface TargetSummary {
  target: string;
  copied: number;
  skipped: number;
  failed: number;
  outcomes: CopyOutcome[];
}

export interface SkippedTarget {
  target: string;
  reason: string;
}

export interface RunTotals {
  copied: number;
  skipped: number;
  failed: number;
}

export interface RunSummary {
  sourceRoot: string;
  config: string;
  targets: TargetSummary[];
  skippedTargets: SkippedTarget[];
  totals: RunTotals;
  interrupted: boolean;
}

export function emptyTargetSummary(target: string): TargetSummary {
  return { target, copied: 0, skipped: 0, failed: 0, outcomes: [] };
}

/**
 * Record an outcome into a target summary, keeping counts in step
 */
export function recordOutcome(summary: TargetSummary, outcome: CopyOutcome): void {
  summary.outcomes.push(outcome);
  summary[outcome.status] += 1;
}

export function sumTotals(targets: TargetSummary[]): RunTotals {
  return targets.reduce<RunTotals>(
    (acc, t) => ({
      copied: acc.copied + t.copied,
      skipped: acc.skipped + t.skipped,
      failed: acc.failed + t.failed,
    }),
    { copied: 0, skipped: 0, failed: 0 },
  );
}
