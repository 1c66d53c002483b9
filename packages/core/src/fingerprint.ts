// ============================================================================
// @symcodex/core — Fractal Fingerprint
// ============================================================================
//
// Each symbol is "collapsed" by iterating SHA-256 over its textual form a
// fixed number of times. The fingerprint hashes the symbol texts followed by
// the collapsed hashes, in stream order. It carries no reconstruction data.
// ============================================================================

import { createHash } from 'node:crypto';
import { formatSymbol } from './extractor.js';
import type { SymbolId } from './types.js';

function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Hash a symbol's textual form `depth` times.
 *
 * @example
 * ```ts
 * collapse(42, 1); // hex SHA-256 of 'S_0042'
 * ```
 */
export function collapse(symbol: SymbolId, depth: number): string {
  let h = formatSymbol(symbol);
  for (let i = 0; i < depth; i++) {
    h = sha256Hex(h);
  }
  return h;
}

/**
 * Collapsed hash for every position of a stream.
 */
export function collapseAll(symbols: readonly SymbolId[], depth: number): string[] {
  const memo = new Map<SymbolId, string>();
  return symbols.map((symbol) => {
    let h = memo.get(symbol);
    if (h === undefined) {
      h = collapse(symbol, depth);
      memo.set(symbol, h);
    }
    return h;
  });
}

/**
 * Order-sensitive content fingerprint (hex SHA-256).
 *
 * @param symbols - Symbol stream, in order
 * @param hashes - Collapsed hash per position, as from {@link collapseAll}
 */
export function computeFingerprint(symbols: readonly SymbolId[], hashes: readonly string[]): string {
  const hash = createHash('sha256');
  for (const symbol of symbols) {
    hash.update(formatSymbol(symbol), 'utf8');
  }
  for (const h of hashes) {
    hash.update(h, 'utf8');
  }
  return hash.digest('hex');
}

/**
 * Fingerprint a symbol stream at the given hash depth.
 */
export function fingerprintSymbols(symbols: readonly SymbolId[], depth: number): string {
  return computeFingerprint(symbols, collapseAll(symbols, depth));
}
