// ============================================================================
// @symcodex/core — Type Definitions & Codex Constants
// ============================================================================
//
// Central type definitions for the codec pipeline. The codex artifact and
// everything it carries are plain ordered records so they serialize as-is.
// ============================================================================

import type { CodecConfig } from './config.js';

/** Identifier derived from a chunk hash, in `[0, symbolRange)`. */
export type SymbolId = number;

/** Reference token standing in for a dictionary pattern, e.g. `P_007`. */
export type PatternRef = `P_${string}`;

/** One entry of the rewritten stream: a literal symbol or a pattern reference. */
export type Token = SymbolId | PatternRef;

/** Width of every chunk, in units. Not configurable. */
export const CHUNK_WIDTH = 2;

/** Current codex artifact format version. */
export const CODEX_VERSION = 1;

/**
 * A repeated run of symbols registered in the pattern dictionary.
 */
export interface Pattern {
  /** Reference token emitted in place of each substituted span */
  ref: PatternRef;
  /** The literal symbol run */
  symbols: readonly SymbolId[];
  /** Start positions found by the search (overlapping starts counted) */
  occurrences: number;
  /** Spans actually replaced in the rewritten stream */
  substitutions: number;
  /** Estimated net savings at acceptance time, in tokens */
  savings: number;
}

/** Statistics of the pattern substitution phase. */
export interface CompressionStats {
  /** Symbols before substitution */
  symbolCount: number;
  /** Tokens in the rewritten stream */
  tokenCount: number;
  /** Patterns registered in the dictionary */
  patternCount: number;
  /** Sum of all pattern lengths */
  dictionarySize: number;
  /** `symbolCount - tokenCount` */
  symbolsSaved: number;
  /** `symbolCount / tokenCount`; 1 for an empty stream */
  overallCompressionRatio: number;
  /** True when the search budget cut the candidate search short */
  budgetExhausted: boolean;
}

/**
 * The immutable artifact produced by `encode`.
 *
 * `chunks` is authoritative for reconstruction; `symbols` and `fingerprint`
 * never are. `tokens` expanded through `patterns` equals `symbols`.
 */
export interface Codex {
  readonly version: number;
  readonly config: Readonly<CodecConfig>;
  readonly chunks: readonly string[];
  /** The whole input when it is shorter than one chunk, otherwise '' */
  readonly residue: string;
  readonly symbols: readonly SymbolId[];
  readonly patterns: readonly Readonly<Pattern>[];
  readonly tokens: readonly Token[];
  readonly fingerprint: string;
  readonly stats: Readonly<CompressionStats>;
}

/** Per-position entry of the ontology adjacency table. */
export interface SymbolLink {
  symbol: SymbolId;
  /** Index of the previous position, `null` at index 0 */
  predecessor: number | null;
}

/** Output of the ontology linker. */
export interface Ontology {
  links: SymbolLink[];
  /** Ascending positions per distinct symbol, in order of first appearance */
  occurrences: Map<SymbolId, number[]>;
}
