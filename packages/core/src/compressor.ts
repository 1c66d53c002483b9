// ============================================================================
// @symcodex/core — Pattern Compressor
// ============================================================================
//
// Finds repeated runs of symbols and rewrites them as dictionary references.
//
// Two phases:
//   1. Candidate search: for each run length, longest first, group all
//      windows by content and estimate net savings. Each length is an
//      independent read-only scan of the stream.
//   2. Acceptance: one sequential pass in a fixed order. Accepted patterns
//      claim non-overlapping spans and mark them consumed; later candidates
//      only count starts whose span is still entirely free.
//
// Identical symbol streams always produce identical dictionaries and
// rewritten streams.
// ============================================================================

import type { CodecConfig } from './config.js';
import { CodexDecodeError } from './errors.js';
import { logPatternSearch } from './logger.js';
import type { CompressionStats, Pattern, PatternRef, SymbolId, Token } from './types.js';

export type CompressorOptions = Pick<
  CodecConfig,
  | 'minPatternLength'
  | 'minOccurrences'
  | 'minSavings'
  | 'maxPatternLength'
  | 'maxPatterns'
  | 'searchBudget'
>;

/** A repeated run found by the search, before acceptance. */
export interface Candidate {
  symbols: SymbolId[];
  length: number;
  /** Ascending start positions, overlapping starts included */
  positions: number[];
  /** Estimated savings over all positions */
  savings: number;
}

export interface CandidateSearch {
  candidates: Candidate[];
  windowsVisited: number;
  budgetExhausted: boolean;
}

export interface CompressionResult {
  tokens: Token[];
  patterns: Pattern[];
  stats: CompressionStats;
}

// ── Savings model ───────────────────────────────────────────────────────────

/**
 * Net tokens saved by replacing `starts` runs of `length` symbols: the runs
 * removed, minus the dictionary entry, minus one reference per run.
 */
export function estimateSavings(starts: number, length: number): number {
  return starts * length - length - starts;
}

function meetsThreshold(starts: number, length: number, options: CompressorOptions): boolean {
  if (starts < options.minOccurrences) return false;
  const savings = estimateSavings(starts, length);
  return savings > 0 && savings >= options.minSavings;
}

// ── References ──────────────────────────────────────────────────────────────

export function makeRef(index: number): PatternRef {
  return `P_${String(index).padStart(3, '0')}`;
}

export function isPatternRef(token: Token): token is PatternRef {
  return typeof token === 'string';
}

// ── Phase 1: candidate search ───────────────────────────────────────────────

/**
 * All repeated runs of exactly `length` symbols that pass the thresholds,
 * in order of first occurrence.
 */
export function candidatesOfLength(
  symbols: readonly SymbolId[],
  length: number,
  options: CompressorOptions,
): Candidate[] {
  const groups = new Map<string, number[]>();
  for (let i = 0; i + length <= symbols.length; i++) {
    const key = symbols.slice(i, i + length).join(',');
    const positions = groups.get(key);
    if (positions) {
      positions.push(i);
    } else {
      groups.set(key, [i]);
    }
  }

  const candidates: Candidate[] = [];
  for (const positions of groups.values()) {
    if (!meetsThreshold(positions.length, length, options)) continue;
    candidates.push({
      symbols: symbols.slice(positions[0], positions[0] + length),
      length,
      positions,
      savings: estimateSavings(positions.length, length),
    });
  }
  return candidates;
}

/**
 * Scan every permitted run length, longest first, within the search budget.
 */
export function findCandidates(
  symbols: readonly SymbolId[],
  options: CompressorOptions,
): CandidateSearch {
  const n = symbols.length;
  const longest = Math.min(options.maxPatternLength, n - options.minOccurrences + 1);
  const candidates: Candidate[] = [];
  let windowsVisited = 0;
  let budgetExhausted = false;

  for (let length = longest; length >= options.minPatternLength; length--) {
    const windows = n - length + 1;
    if (windowsVisited + windows > options.searchBudget) {
      budgetExhausted = true;
      break;
    }
    windowsVisited += windows;
    for (const candidate of candidatesOfLength(symbols, length, options)) {
      candidates.push(candidate);
    }
  }

  return { candidates, windowsVisited, budgetExhausted };
}

/**
 * Acceptance order: higher savings first, then earlier first occurrence,
 * then longer run.
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.savings !== b.savings) return b.savings - a.savings;
  if (a.positions[0] !== b.positions[0]) return a.positions[0] - b.positions[0];
  return b.length - a.length;
}

// ── Phase 2: acceptance ─────────────────────────────────────────────────────

function spanIsFree(consumed: Uint8Array, start: number, length: number): boolean {
  for (let i = start; i < start + length; i++) {
    if (consumed[i] === 1) return false;
  }
  return true;
}

/**
 * Rewrite a symbol stream with pattern references.
 *
 * @example
 * ```ts
 * const { tokens, patterns } = compress(symbols, { ...DEFAULT_CONFIG, minOccurrences: 2 });
 * expand(tokens, patterns); // deep-equals symbols
 * ```
 */
export function compress(
  symbols: readonly SymbolId[],
  options: CompressorOptions,
): CompressionResult {
  const n = symbols.length;
  const search = findCandidates(symbols, options);
  const ordered = [...search.candidates].sort(compareCandidates);

  const consumed = new Uint8Array(n);
  const spans = new Map<number, { ref: PatternRef; length: number }>();
  const patterns: Pattern[] = [];

  for (const candidate of ordered) {
    if (patterns.length >= options.maxPatterns) break;

    const { length } = candidate;
    const free = candidate.positions.filter((p) => spanIsFree(consumed, p, length));
    if (!meetsThreshold(free.length, length, options)) continue;

    const ref = makeRef(patterns.length);
    let substitutions = 0;
    let nextStart = 0;
    for (const p of free) {
      if (p < nextStart) continue;
      consumed.fill(1, p, p + length);
      spans.set(p, { ref, length });
      substitutions++;
      nextStart = p + length;
    }

    patterns.push({
      ref,
      symbols: candidate.symbols,
      occurrences: candidate.positions.length,
      substitutions,
      savings: estimateSavings(free.length, length),
    });
  }

  const tokens: Token[] = [];
  for (let i = 0; i < n; ) {
    const span = spans.get(i);
    if (span) {
      tokens.push(span.ref);
      i += span.length;
    } else {
      tokens.push(symbols[i]);
      i++;
    }
  }

  logPatternSearch(
    search.candidates.length,
    patterns.length,
    search.windowsVisited,
    search.budgetExhausted,
  );

  const dictionarySize = patterns.reduce((sum, p) => sum + p.symbols.length, 0);
  return {
    tokens,
    patterns,
    stats: {
      symbolCount: n,
      tokenCount: tokens.length,
      patternCount: patterns.length,
      dictionarySize,
      symbolsSaved: n - tokens.length,
      overallCompressionRatio: n > 0 && tokens.length > 0 ? n / tokens.length : 1,
      budgetExhausted: search.budgetExhausted,
    },
  };
}

// ── Expansion ───────────────────────────────────────────────────────────────

/**
 * Replace every reference with its pattern's symbols.
 *
 * @throws {CodexDecodeError} If a reference has no dictionary entry
 */
export function expand(
  tokens: readonly Token[],
  patterns: readonly Pick<Pattern, 'ref' | 'symbols'>[],
): SymbolId[] {
  const dictionary = new Map<PatternRef, readonly SymbolId[]>();
  for (const pattern of patterns) {
    dictionary.set(pattern.ref, pattern.symbols);
  }

  const symbols: SymbolId[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!isPatternRef(token)) {
      symbols.push(token);
      continue;
    }
    const run = dictionary.get(token);
    if (!run) {
      throw new CodexDecodeError(`Unknown pattern reference "${token}" at token ${i}.`);
    }
    symbols.push(...run);
  }
  return symbols;
}
