// ============================================================================
// @symcodex/core — Symbol Ontology
// ============================================================================
//
// Descriptive metadata over a symbol stream: each position points at its
// predecessor, and positions are grouped by symbol id. Nothing here takes
// part in decoding.
// ============================================================================

import type { Ontology, SymbolId, SymbolLink } from './types.js';

/**
 * Build the flat predecessor table and the per-symbol occurrence lists.
 *
 * @example
 * ```ts
 * const { links, occurrences } = link([7, 3, 7]);
 * links[2];            // { symbol: 7, predecessor: 1 }
 * occurrences.get(7);  // [0, 2]
 * ```
 */
export function link(symbols: readonly SymbolId[]): Ontology {
  const links: SymbolLink[] = [];
  const occurrences = new Map<SymbolId, number[]>();

  for (let i = 0; i < symbols.length; i++) {
    const symbol = symbols[i];
    links.push({ symbol, predecessor: i > 0 ? i - 1 : null });

    const positions = occurrences.get(symbol);
    if (positions) {
      positions.push(i);
    } else {
      occurrences.set(symbol, [i]);
    }
  }

  return { links, occurrences };
}

/**
 * Jaccard index of the distinct symbol ids of two streams.
 * Position-independent; 0 when both streams are empty.
 */
export function structuralSimilarity(a: readonly SymbolId[], b: readonly SymbolId[]): number {
  const setA = new Set(a);
  const setB = new Set(b);
  if (setA.size === 0 && setB.size === 0) return 0;

  let intersection = 0;
  for (const id of setA) {
    if (setB.has(id)) intersection++;
  }
  const union = setA.size + setB.size - intersection;
  return intersection / union;
}
