import { describe, expect, test } from 'vitest';
import { buildRunData, formatRunSummary } from '../../../src/cli/format-summary.js';
import type { RunSummary, TargetSummary } from '../../../src/models/copy-outcome.js';

function makeTarget(overrides: Partial<TargetSummary> = {}): TargetSummary {
  return { target: '/wt/a', copied: 0, skipped: 0, failed: 0, outcomes: [], ...overrides };
}

function makeSummary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    sourceRoot: '/repo',
    config: 'default patterns',
    targets: [],
    skippedTargets: [],
    totals: { copied: 0, skipped: 0, failed: 0 },
    interrupted: false,
    ...overrides,
  };
}

describe('formatRunSummary', () => {
  test('shows one line per target and a total', () => {
    const lines = formatRunSummary(
      makeSummary({
        targets: [
          makeTarget({ target: '/wt/a', copied: 2 }),
          makeTarget({ target: '/wt/b', copied: 1, skipped: 1, failed: 1 }),
        ],
        skippedTargets: [{ target: '/wt/missing', reason: 'does not exist' }],
        totals: { copied: 3, skipped: 1, failed: 1 },
      }),
    );

    expect(lines).toEqual([
      '  ✓ /wt/a: 2 copied, 0 skipped, 0 failed',
      '  ✗ /wt/b: 1 copied, 1 skipped, 1 failed',
      '  ✗ /wt/missing: skipped (does not exist)',
      'Total: 3 copied, 1 skipped, 1 failed',
    ]);
  });

  test('uses conditional wording in dry-run mode', () => {
    const lines = formatRunSummary(
      makeSummary({ targets: [makeTarget({ copied: 2 })], totals: { copied: 2, skipped: 0, failed: 0 } }),
      true,
    );
    expect(lines).toEqual([
      '  ✓ /wt/a: 2 would be copied, 0 skipped, 0 failed',
      'Total: 2 would be copied, 0 skipped, 0 failed',
    ]);
  });

  test('mentions an interruption', () => {
    expect(formatRunSummary(makeSummary({ interrupted: true })).at(-1)).toBe(
      'Run interrupted before all items were processed',
    );
  });
});

describe('buildRunData', () => {
  test('flattens totals and keeps per-target outcomes', () => {
    const outcome = { status: 'copied' as const, sourcePath: '/repo/CLAUDE.md', destPath: '/wt/a/CLAUDE.md' };
    const data = buildRunData(
      makeSummary({
        targets: [makeTarget({ copied: 1, outcomes: [outcome] })],
        totals: { copied: 1, skipped: 0, failed: 0 },
      }),
    );

    expect(data).toEqual({
      sourceRoot: '/repo',
      config: 'default patterns',
      copied: 1,
      skipped: 0,
      failed: 0,
      interrupted: false,
      targets: [{ target: '/wt/a', copied: 1, skipped: 0, failed: 0, outcomes: [outcome] }],
      skippedTargets: [],
    });
  });
});
