// ============================================================================
// @symcodex/core — Codec Configuration
// ============================================================================
//
// All codec parameters are pure values. There is no environment coupling:
// two codecs built from the same config produce identical artifacts.
// ============================================================================

import { z } from 'zod';
import { CodecConfigError } from './errors.js';

/**
 * Tunable parameters of the codec.
 */
export interface CodecConfig {
  /** Size of the symbol space; symbol ids fall in `[0, symbolRange)` */
  symbolRange: number;
  /** SHA-256 iterations applied to each symbol by the fingerprinter */
  hashDepth: number;
  /** Shortest symbol run considered as a pattern */
  minPatternLength: number;
  /** Fewest start positions a pattern needs */
  minOccurrences: number;
  /** Smallest estimated net savings, in tokens, for a pattern to be accepted */
  minSavings: number;
  /** Longest symbol run considered as a pattern */
  maxPatternLength: number;
  /** Dictionary size limit */
  maxPatterns: number;
  /** Window visits allowed to the candidate search */
  searchBudget: number;
}

export const DEFAULT_CONFIG: Readonly<CodecConfig> = Object.freeze({
  symbolRange: 10_000,
  hashDepth: 4,
  minPatternLength: 4,
  minOccurrences: 3,
  minSavings: 1,
  maxPatternLength: 20,
  maxPatterns: 256,
  searchBudget: 2_000_000,
});

/**
 * Schema of a fully resolved config; also validates configs embedded in a
 * serialized codex.
 */
export const codecConfigSchema = z
  .object({
    symbolRange: z.number().int().min(1).max(0xffffffff),
    hashDepth: z.number().int().min(1).max(1024),
    minPatternLength: z.number().int().min(2),
    minOccurrences: z.number().int().min(2),
    minSavings: z.number().int().min(1),
    maxPatternLength: z.number().int().min(2),
    maxPatterns: z.number().int().min(1),
    searchBudget: z.number().int().min(0),
  })
  .strict()
  .refine((c) => c.maxPatternLength >= c.minPatternLength, {
    message: 'must be greater than or equal to minPatternLength',
    path: ['maxPatternLength'],
  });

/**
 * Merge a partial configuration over the defaults and validate it.
 *
 * @throws {CodecConfigError} naming the first offending field
 *
 * @example
 * ```ts
 * const config = resolveConfig({ minOccurrences: 2 });
 * config.minPatternLength; // 4
 * ```
 */
export function resolveConfig(overrides: Partial<CodecConfig> = {}): Readonly<CodecConfig> {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  const result = codecConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : undefined;
    const reason = issue ? issue.message : 'invalid configuration';
    throw new CodecConfigError(`Invalid codec config${field ? ` "${field}"` : ''}: ${reason}`, {
      field,
      reason,
    });
  }
  return Object.freeze(result.data);
}
