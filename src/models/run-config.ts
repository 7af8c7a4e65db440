import { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import type { CopyPrimitive } from '../core/copier.js';
import { ConflictModeSchema, type RuleSet } from './rule.js';

/**
 * Which bulk-copy primitive to use
 * - 'auto': rsync when it is on PATH, otherwise Node's fs.cp
 * - 'rsync': require rsync, fail the run if it is missing
 * - 'native': always fs.cp
 */
export const CopierPreferenceSchema = z.enum(['auto', 'rsync', 'native']);

export type CopierPreference = z.infer<typeof CopierPreferenceSchema>;

/**
 * Options as they arrive from the command line, before any filesystem lookups
 */
export const RunOptionsSchema = z.object({
  targets: z.array(z.string()),
  config: z.string().optional(),
  source: z.string().optional(),
  conflict: ConflictModeSchema.default('skip'),
  copier: CopierPreferenceSchema.default('auto'),
  dryRun: z.boolean().default(false),
  verbose: z.boolean().default(false),
  debug: z.boolean().default(false),
  color: z.boolean().default(true),
});

export type RunOptionsInput = z.input<typeof RunOptionsSchema>;
export type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Everything one invocation needs, resolved once and never mutated.
 * Passed explicitly to the engine; there are no process-wide flags.
 */
export interface RunConfig {
  readonly sourceRoot: string;
  readonly ruleSet: RuleSet;
  readonly conflict: RunOptions['conflict'];
  readonly dryRun: boolean;
  readonly copier: CopyPrimitive;
  /** Timestamp used for every backup name in this run */
  readonly backupStamp: string;
  readonly logger: Logger;
}
