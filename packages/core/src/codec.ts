// ============================================================================
// @symcodex/core — Codec
// ============================================================================
//
// High-level API. `encode` runs extraction → pattern compression →
// fingerprinting and freezes the result into a Codex. `decode` expands the
// pattern references and stitches the chunk table back into the input.
//
// Every operation is synchronous, pure and stateless: a Codec holds only its
// validated configuration.
// ============================================================================

import { type CodecConfig, DEFAULT_CONFIG, resolveConfig } from './config.js';
import { compress, expand } from './compressor.js';
import { CodexDecodeError, CodexIntegrityError } from './errors.js';
import { extract, formatSymbol, symbolFor, toUnits } from './extractor.js';
import { fingerprintSymbols } from './fingerprint.js';
import * as logger from './logger.js';
import { link } from './ontology.js';
import {
  CHUNK_WIDTH,
  CODEX_VERSION,
  type Codex,
  type CompressionStats,
  type Ontology,
  type Pattern,
  type SymbolId,
  type Token,
} from './types.js';

export interface DecodeOptions {
  /** Also recompute the fingerprint and compare it with the stored one. */
  verify?: boolean;
}

/**
 * Deep-freeze the parts of a codex into an immutable artifact.
 */
export function freezeCodex(parts: {
  config: Readonly<CodecConfig>;
  chunks: readonly string[];
  residue: string;
  symbols: readonly SymbolId[];
  patterns: readonly Pattern[];
  tokens: readonly Token[];
  fingerprint: string;
  stats: CompressionStats;
}): Codex {
  return Object.freeze({
    version: CODEX_VERSION,
    config: Object.freeze({ ...parts.config }),
    chunks: Object.freeze([...parts.chunks]),
    residue: parts.residue,
    symbols: Object.freeze([...parts.symbols]),
    patterns: Object.freeze(
      parts.patterns.map((p) => Object.freeze({ ...p, symbols: Object.freeze([...p.symbols]) })),
    ),
    tokens: Object.freeze([...parts.tokens]),
    fingerprint: parts.fingerprint,
    stats: Object.freeze({ ...parts.stats }),
  });
}

/**
 * Rebuild the input from the chunk table: the first chunk whole, then the
 * last unit of every later chunk.
 *
 * @throws {CodexDecodeError} If a chunk is not two units wide or does not
 *   overlap its predecessor
 */
export function stitch(chunks: readonly string[]): string {
  if (chunks.length === 0) return '';

  const parts: string[] = [];
  let previous: string[] = [];
  for (let i = 0; i < chunks.length; i++) {
    const units = toUnits(chunks[i]);
    if (units.length !== CHUNK_WIDTH) {
      throw new CodexDecodeError(
        `Chunk ${i} has ${units.length} units; expected ${CHUNK_WIDTH}.`,
      );
    }
    if (i === 0) {
      parts.push(units[0], units[1]);
    } else {
      if (units[0] !== previous[1]) {
        throw new CodexDecodeError(`Chunk ${i} does not overlap chunk ${i - 1}.`);
      }
      parts.push(units[1]);
    }
    previous = units;
  }
  return parts.join('');
}

/**
 * Symbolic compression codec.
 *
 * @example
 * ```ts
 * const codec = new Codec({ minOccurrences: 2 });
 * const codex = codec.encode('abababab');
 * codec.decode(codex);       // 'abababab'
 * codec.fingerprint(codex);  // 64-char hex string
 * ```
 */
export class Codec {
  readonly config: Readonly<CodecConfig>;

  /**
   * @throws {CodecConfigError} If any value is out of range
   */
  constructor(config: Partial<CodecConfig> = {}) {
    this.config = resolveConfig(config);
  }

  /**
   * Encode an input into a frozen codex. Inputs shorter than two units
   * produce an empty codex that carries the input as its residue.
   */
  encode(input: string): Codex {
    const t = logger.timer('encode');
    const { chunks, symbols } = extract(input, this.config.symbolRange);
    let residue = '';
    if (chunks.length === 0) {
      residue = input;
      logger.debug('encode: input shorter than chunk width, returning empty codex', {
        length: input.length,
      });
    }

    const { tokens, patterns, stats } = compress(symbols, this.config);
    const fingerprint = fingerprintSymbols(symbols, this.config.hashDepth);

    const codex = freezeCodex({
      config: this.config,
      chunks,
      residue,
      symbols,
      patterns,
      tokens,
      fingerprint,
      stats,
    });
    logger.logEncode(input.length, tokens.length, t.elapsed(), fingerprint);
    return codex;
  }

  /**
   * Encode each input independently.
   */
  encodeMany(inputs: readonly string[]): Codex[] {
    return inputs.map((input) => this.encode(input));
  }

  /**
   * Reconstruct the original input.
   *
   * @throws {CodexDecodeError} If a reference is unknown or the chunk table
   *   and symbol stream disagree
   * @throws {CodexIntegrityError} With `verify`, if a chunk no longer hashes to
   *   its symbol or the fingerprint differs
   */
  decode(codex: Codex, options: DecodeOptions = {}): string {
    const t = logger.timer('decode');
    try {
      const expanded = expand(codex.tokens, codex.patterns);
      checkConsistency(codex, expanded);
      if (options.verify) {
        checkIntegrity(codex, expanded);
      }
      const output = codex.chunks.length > 0 ? stitch(codex.chunks) : codex.residue;
      logger.logDecode(codex.chunks.length, t.elapsed(), codex.fingerprint);
      return output;
    } catch (err) {
      if (err instanceof CodexDecodeError) {
        logger.error(`decode failed: ${err.message}`, { fingerprint: codex.fingerprint.slice(0, 8) });
      }
      throw err;
    }
  }

  /**
   * Decode with the integrity check enabled.
   */
  verify(codex: Codex): string {
    return this.decode(codex, { verify: true });
  }

  /**
   * The fingerprint stored at encode time.
   */
  fingerprint(codex: Codex): string {
    return codex.fingerprint;
  }

  /**
   * Recompute the fingerprint from the codex's rewritten stream, at the
   * hash depth the codex was encoded with.
   *
   * @throws {CodexDecodeError} If a reference is unknown
   */
  recomputeFingerprint(codex: Codex): string {
    return fingerprintSymbols(expand(codex.tokens, codex.patterns), codex.config.hashDepth);
  }

  /**
   * Predecessor links and occurrence groups of the codex's symbols.
   */
  link(codex: Codex): Ontology {
    return link(codex.symbols);
  }
}

function checkConsistency(codex: Codex, expanded: readonly SymbolId[]): void {
  if (codex.chunks.length > 0 && codex.residue !== '') {
    throw new CodexDecodeError('Codex carries both a chunk table and a residue.');
  }
  if (toUnits(codex.residue).length >= CHUNK_WIDTH) {
    throw new CodexDecodeError(`Residue is ${CHUNK_WIDTH} or more units long.`);
  }
  if (codex.symbols.length !== codex.chunks.length) {
    throw new CodexDecodeError(
      `Symbol stream has ${codex.symbols.length} entries but chunk table has ${codex.chunks.length}.`,
    );
  }
  if (expanded.length !== codex.symbols.length) {
    throw new CodexDecodeError(
      `Rewritten stream expands to ${expanded.length} symbols; expected ${codex.symbols.length}.`,
    );
  }
  for (let i = 0; i < expanded.length; i++) {
    if (expanded[i] !== codex.symbols[i]) {
      throw new CodexDecodeError(`Rewritten stream diverges from symbol stream at index ${i}.`);
    }
  }
}

function checkIntegrity(codex: Codex, expanded: readonly SymbolId[]): void {
  const memo = new Map<string, SymbolId>();
  for (let i = 0; i < codex.chunks.length; i++) {
    const chunk = codex.chunks[i];
    let symbol = memo.get(chunk);
    if (symbol === undefined) {
      symbol = symbolFor(chunk, codex.config.symbolRange);
      memo.set(chunk, symbol);
    }
    if (symbol !== codex.symbols[i]) {
      const expected = formatSymbol(codex.symbols[i]);
      const actual = formatSymbol(symbol);
      logger.logIntegrityFailure(expected, actual);
      throw new CodexIntegrityError(expected, actual, { chunk: i });
    }
  }

  const actual = fingerprintSymbols(expanded, codex.config.hashDepth);
  if (actual !== codex.fingerprint) {
    logger.logIntegrityFailure(codex.fingerprint, actual);
    throw new CodexIntegrityError(codex.fingerprint, actual);
  }
}

// ---------------------------------------------------------------------------
// Default instance
// ---------------------------------------------------------------------------

const defaultCodec = new Codec(DEFAULT_CONFIG);

/** Encode with the default configuration. */
export function encode(input: string): Codex {
  return defaultCodec.encode(input);
}

/** Decode any codex; the codex carries its own configuration. */
export function decode(codex: Codex, options?: DecodeOptions): string {
  return defaultCodec.decode(codex, options);
}

export function fingerprint(codex: Codex): string {
  return defaultCodec.fingerprint(codex);
}

export function verify(codex: Codex): string {
  return defaultCodec.verify(codex);
}
