// ============================================================================
// @symcodex/core — Codex Serialization
// ============================================================================
//
// JSON form of a codex for the storage layer. Keys are written in a fixed
// order so equal codices serialize to equal strings. Parsing validates the
// whole document before anything is handed to `decode`.
// ============================================================================

import { z } from 'zod';
import { freezeCodex } from './codec.js';
import { codecConfigSchema } from './config.js';
import { CodexFormatError } from './errors.js';
import { CODEX_VERSION, type Codex, type PatternRef } from './types.js';

const PATTERN_REF_RE = /^P_\d+$/;

const symbolSchema = z.number().int().min(0);

const patternRefSchema = z.custom<PatternRef>(
  (value) => typeof value === 'string' && PATTERN_REF_RE.test(value),
  'invalid pattern reference',
);

const patternSchema = z.object({
  ref: patternRefSchema,
  symbols: z.array(symbolSchema).min(1),
  occurrences: z.number().int().min(0),
  substitutions: z.number().int().min(0),
  savings: z.number().int(),
});

const statsSchema = z.object({
  symbolCount: z.number().int().min(0),
  tokenCount: z.number().int().min(0),
  patternCount: z.number().int().min(0),
  dictionarySize: z.number().int().min(0),
  symbolsSaved: z.number().int(),
  overallCompressionRatio: z.number().min(1),
  budgetExhausted: z.boolean(),
});

const codexSchema = z
  .object({
    version: z.literal(CODEX_VERSION),
    config: codecConfigSchema,
    chunks: z.array(z.string()),
    residue: z.string(),
    symbols: z.array(symbolSchema),
    patterns: z.array(patternSchema),
    tokens: z.array(z.union([symbolSchema, patternRefSchema])),
    fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
    stats: statsSchema,
  })
  .superRefine((codex, ctx) => {
    const range = codex.config.symbolRange;
    codex.symbols.forEach((symbol, i) => {
      if (symbol >= range) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['symbols', i],
          message: `symbol ${symbol} outside range ${range}`,
        });
      }
    });
    const refs = new Set<string>();
    codex.patterns.forEach((pattern, i) => {
      if (refs.has(pattern.ref)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['patterns', i, 'ref'],
          message: `duplicate reference ${pattern.ref}`,
        });
      }
      refs.add(pattern.ref);
    });
  });

/**
 * Serialize a codex to JSON with a fixed key order.
 */
export function serializeCodex(codex: Codex): string {
  const { config, stats } = codex;
  return JSON.stringify({
    version: codex.version,
    config: {
      symbolRange: config.symbolRange,
      hashDepth: config.hashDepth,
      minPatternLength: config.minPatternLength,
      minOccurrences: config.minOccurrences,
      minSavings: config.minSavings,
      maxPatternLength: config.maxPatternLength,
      maxPatterns: config.maxPatterns,
      searchBudget: config.searchBudget,
    },
    chunks: codex.chunks,
    residue: codex.residue,
    symbols: codex.symbols,
    patterns: codex.patterns.map((p) => ({
      ref: p.ref,
      symbols: p.symbols,
      occurrences: p.occurrences,
      substitutions: p.substitutions,
      savings: p.savings,
    })),
    tokens: codex.tokens,
    fingerprint: codex.fingerprint,
    stats: {
      symbolCount: stats.symbolCount,
      tokenCount: stats.tokenCount,
      patternCount: stats.patternCount,
      dictionarySize: stats.dictionarySize,
      symbolsSaved: stats.symbolsSaved,
      overallCompressionRatio: stats.overallCompressionRatio,
      budgetExhausted: stats.budgetExhausted,
    },
  });
}

/**
 * Parse and validate a serialized codex.
 *
 * @throws {CodexFormatError} If the text is not JSON or not a valid codex
 */
export function parseCodex(json: string): Codex {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new CodexFormatError(
      `Serialized codex is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const result = codexSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    throw new CodexFormatError('Serialized codex failed validation', issues);
  }

  return freezeCodex(result.data);
}
