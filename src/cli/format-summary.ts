import type { RunSummary, TargetSummary } from '../models/copy-outcome.js';

function countsLine(counts: { copied: number; skipped: number; failed: number }, dryRun: boolean): string {
  const copied = dryRun ? `${counts.copied} would be copied` : `${counts.copied} copied`;
  return `${copied}, ${counts.skipped} skipped, ${counts.failed} failed`;
}

function targetLine(summary: TargetSummary, dryRun: boolean): string {
  const status = summary.failed > 0 ? '✗' : '✓';
  return `  ${status} ${summary.target}: ${countsLine(summary, dryRun)}`;
}

/**
 * Format a run summary as display lines, one per target plus a total.
 */
export function formatRunSummary(summary: RunSummary, dryRun = false): string[] {
  const lines: string[] = [];

  for (const target of summary.targets) {
    lines.push(targetLine(target, dryRun));
  }
  for (const skipped of summary.skippedTargets) {
    lines.push(`  ✗ ${skipped.target}: skipped (${skipped.reason})`);
  }

  lines.push(`Total: ${countsLine(summary.totals, dryRun)}`);
  if (summary.interrupted) {
    lines.push('Run interrupted before all items were processed');
  }
  return lines;
}

/**
 * Build a JSON-friendly data object from a run summary.
 */
export function buildRunData(summary: RunSummary) {
  return {
    sourceRoot: summary.sourceRoot,
    config: summary.config,
    copied: summary.totals.copied,
    skipped: summary.totals.skipped,
    failed: summary.totals.failed,
    interrupted: summary.interrupted,
    targets: summary.targets.map((t) => ({
      target: t.target,
      copied: t.copied,
      skipped: t.skipped,
      failed: t.failed,
      outcomes: t.outcomes,
    })),
    skippedTargets: summary.skippedTargets,
  };
}
