// ============================================================================
// @symcodex/core — Symbol Extraction
// ============================================================================
//
// Slides a width-2 window over the input's code points. Every window becomes
// a chunk (kept verbatim for reconstruction) and a symbol id (a bounded hash
// of the chunk). Distinct chunks may share a symbol id.
// ============================================================================

import { createHash } from 'node:crypto';
import { CHUNK_WIDTH, type SymbolId } from './types.js';

/** Result of symbol extraction. Both arrays have the same length. */
export interface Extraction {
  chunks: string[];
  symbols: SymbolId[];
}

/**
 * Split a string into units (code points). A lone surrogate is one unit.
 */
export function toUnits(input: string): string[] {
  return Array.from(input);
}

/**
 * Derive the symbol id of a chunk: the first four bytes of its UTF-8
 * SHA-256 digest as an unsigned big-endian integer, modulo `symbolRange`.
 */
export function symbolFor(chunk: string, symbolRange: number): SymbolId {
  const digest = createHash('sha256').update(chunk, 'utf8').digest();
  return digest.readUInt32BE(0) % symbolRange;
}

/**
 * Textual form of a symbol id used for hashing: `S_` + id padded to four digits.
 */
export function formatSymbol(symbol: SymbolId): string {
  return `S_${String(symbol).padStart(4, '0')}`;
}

/**
 * Extract overlapping chunks and their symbol ids.
 *
 * Inputs shorter than the chunk width yield empty arrays.
 *
 * @example
 * ```ts
 * extract('abc', 10_000).chunks; // ['ab', 'bc']
 * ```
 */
export function extract(input: string, symbolRange: number): Extraction {
  const units = toUnits(input);
  const count = Math.max(units.length - (CHUNK_WIDTH - 1), 0);
  const chunks: string[] = new Array<string>(count);
  const symbols: SymbolId[] = new Array<SymbolId>(count);

  // Same chunk → same symbol; skip rehashing repeats
  const seen = new Map<string, SymbolId>();

  for (let i = 0; i < count; i++) {
    const chunk = units.slice(i, i + CHUNK_WIDTH).join('');
    let symbol = seen.get(chunk);
    if (symbol === undefined) {
      symbol = symbolFor(chunk, symbolRange);
      seen.set(chunk, symbol);
    }
    chunks[i] = chunk;
    symbols[i] = symbol;
  }

  return { chunks, symbols };
}
