// ============================================================================
// @symcodex/core — Codex Analysis
// ============================================================================
//
// Read-only diagnostics over an encoded codex: entropy at each stage of the
// pipeline, per-pattern efficiency, and a compact summary for listings.
// ============================================================================

import { decode } from './codec.js';
import { estimateSavings } from './compressor.js';
import { formatSymbol } from './extractor.js';
import { collapseAll } from './fingerprint.js';
import type { Codex, PatternRef, SymbolId } from './types.js';

/** Entropy (bits per character) at each stage of encoding. */
export interface EntropyAnalysis {
  originalEntropy: number;
  symbolicEntropy: number;
  fractalEntropy: number;
  /** `symbolicEntropy / originalEntropy`; 1 when the input has no entropy */
  entropyPreservation: number;
}

export interface PatternAnalysis {
  ref: PatternRef;
  length: number;
  /** Matches in the original symbol stream, overlapping matches counted */
  occurrences: number;
  substitutions: number;
  /** Tokens actually saved: runs replaced minus dictionary entry minus references */
  realisedSavings: number;
  /** `realisedSavings` over the symbols covered by all matches; 0 when nothing matched */
  spaceEfficiency: number;
}

export interface CodexSummary {
  inputLength: number;
  symbolCount: number;
  uniqueSymbols: number;
  /** Most frequent symbol; ties go to the earliest first appearance */
  mostCommonSymbol: SymbolId | null;
  compressionRatio: number;
  patternCount: number;
  /** First 16 hex characters of the fingerprint */
  shortFingerprint: string;
}

/**
 * Shannon entropy of a string over its code points, in bits.
 */
export function shannonEntropy(text: string): number {
  const units = Array.from(text);
  if (units.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const u of units) {
    counts.set(u, (counts.get(u) || 0) + 1);
  }

  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / units.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

/**
 * Entropy of the decoded input, of the symbol texts and of the collapsed
 * hashes.
 *
 * @throws {CodexDecodeError} If the codex does not decode
 */
export function analyzeEntropy(codex: Codex): EntropyAnalysis {
  const originalEntropy = shannonEntropy(decode(codex));
  const symbolicEntropy = shannonEntropy(codex.symbols.map(formatSymbol).join(''));
  const fractalEntropy = shannonEntropy(
    collapseAll(codex.symbols, codex.config.hashDepth).join(''),
  );

  return {
    originalEntropy,
    symbolicEntropy,
    fractalEntropy,
    entropyPreservation: originalEntropy > 0 ? symbolicEntropy / originalEntropy : 1,
  };
}

/** Fractal entropy of one codex measured across several hash depths. */
export interface DepthEntropyAnalysis {
  originalEntropy: number;
  symbolicEntropy: number;
  depths: number[];
  /** Entropy of the collapsed hashes at each of `depths` */
  fractalEntropies: number[];
  /** `fractalEntropies[i] / originalEntropy`; 1 when the input has no entropy */
  entropyPreservation: number[];
}

export const DEFAULT_ENTROPY_DEPTHS: readonly number[] = Object.freeze([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

/**
 * Compare the entropy of the collapsed hashes across hash depths,
 * independently of the depth the codex was encoded with.
 *
 * @throws {CodexDecodeError} If the codex does not decode
 * @throws {RangeError} If a depth is not a positive integer
 */
export function analyzeEntropyByDepth(
  codex: Codex,
  depths: readonly number[] = DEFAULT_ENTROPY_DEPTHS,
): DepthEntropyAnalysis {
  for (const depth of depths) {
    if (!Number.isInteger(depth) || depth < 1) {
      throw new RangeError(`Hash depth must be a positive integer, got ${depth}`);
    }
  }

  const originalEntropy = shannonEntropy(decode(codex));
  const symbolicEntropy = shannonEntropy(codex.symbols.map(formatSymbol).join(''));
  const fractalEntropies = depths.map((depth) =>
    shannonEntropy(collapseAll(codex.symbols, depth).join('')),
  );

  return {
    originalEntropy,
    symbolicEntropy,
    depths: [...depths],
    fractalEntropies,
    entropyPreservation: fractalEntropies.map((e) =>
      originalEntropy > 0 ? e / originalEntropy : 1,
    ),
  };
}

function countMatches(stream: readonly SymbolId[], run: readonly SymbolId[]): number {
  let count = 0;
  outer: for (let i = 0; i + run.length <= stream.length; i++) {
    for (let j = 0; j < run.length; j++) {
      if (stream[i + j] !== run[j]) continue outer;
    }
    count++;
  }
  return count;
}

/**
 * Efficiency of every dictionary pattern, in dictionary order.
 */
export function analyzePatterns(codex: Codex): PatternAnalysis[] {
  return codex.patterns.map((pattern) => {
    const length = pattern.symbols.length;
    const occurrences = countMatches(codex.symbols, pattern.symbols);
    const realisedSavings = estimateSavings(pattern.substitutions, length);
    const covered = occurrences * length;
    return {
      ref: pattern.ref,
      length,
      occurrences,
      substitutions: pattern.substitutions,
      realisedSavings,
      spaceEfficiency: covered > 0 ? realisedSavings / covered : 0,
    };
  });
}

/**
 * One-line facts about a codex, for listings and logs.
 */
export function summarizeCodex(codex: Codex): CodexSummary {
  const counts = new Map<SymbolId, number>();
  for (const symbol of codex.symbols) {
    counts.set(symbol, (counts.get(symbol) || 0) + 1);
  }

  // Map iteration follows first appearance, so strict > keeps the earliest on ties
  let mostCommonSymbol: SymbolId | null = null;
  let best = 0;
  for (const [symbol, count] of counts) {
    if (count > best) {
      best = count;
      mostCommonSymbol = symbol;
    }
  }

  return {
    inputLength:
      codex.chunks.length > 0 ? codex.chunks.length + 1 : Array.from(codex.residue).length,
    symbolCount: codex.symbols.length,
    uniqueSymbols: counts.size,
    mostCommonSymbol,
    compressionRatio: codex.stats.overallCompressionRatio,
    patternCount: codex.patterns.length,
    shortFingerprint: codex.fingerprint.slice(0, 16),
  };
}
