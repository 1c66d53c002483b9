import { createHash } from 'node:crypto';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Codec, decode, encode, fingerprint, stitch, verify } from '../codec.js';
import { DEFAULT_CONFIG } from '../config.js';
import { CodecConfigError, CodexDecodeError, CodexIntegrityError } from '../errors.js';
import { extract, formatSymbol, symbolFor } from '../extractor.js';
import { fingerprintSymbols } from '../fingerprint.js';
import type { Codex } from '../types.js';

const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('Codec', () => {
  beforeEach(() => {
    // decode failures are logged at error level
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('encode', () => {
    it('encodes the empty string to an empty codex', () => {
      const codex = encode('');
      expect(codex.chunks).toEqual([]);
      expect(codex.symbols).toEqual([]);
      expect(codex.patterns).toEqual([]);
      expect(codex.tokens).toEqual([]);
      expect(codex.residue).toBe('');
      expect(codex.fingerprint).toBe(EMPTY_SHA256);
      expect(codex.stats.overallCompressionRatio).toBe(1);
    });

    it('keeps a single unit as residue', () => {
      const codex = encode('a');
      expect(codex.chunks).toEqual([]);
      expect(codex.symbols).toEqual([]);
      expect(codex.residue).toBe('a');
      expect(codex.fingerprint).toBe(EMPTY_SHA256);
    });

    it('encodes "aa" to one chunk and one symbol', () => {
      const codex = encode('aa');
      expect(codex.chunks).toEqual(['aa']);
      expect(codex.symbols).toEqual(extract('aa', DEFAULT_CONFIG.symbolRange).symbols);
      expect(codex.residue).toBe('');
    });

    it('keeps chunk and symbol counts at input length minus one', () => {
      const codex = encode('symbolic compression');
      expect(codex.chunks).toHaveLength(19);
      expect(codex.symbols).toHaveLength(19);
    });

    it('fingerprints the symbol stream at the configured depth', () => {
      const codec = new Codec({ hashDepth: 2 });
      const codex = codec.encode('fingerprint me');
      expect(codex.fingerprint).toBe(fingerprintSymbols(codex.symbols, 2));
    });

    it('records the configuration it was encoded with', () => {
      const codex = new Codec({ minOccurrences: 2 }).encode('abc');
      expect(codex.config).toEqual({ ...DEFAULT_CONFIG, minOccurrences: 2 });
      expect(codex.version).toBe(1);
    });

    it('returns a deeply frozen codex', () => {
      const codex = new Codec({ minOccurrences: 2 }).encode('abababab');
      expect(Object.isFrozen(codex)).toBe(true);
      expect(Object.isFrozen(codex.chunks)).toBe(true);
      expect(Object.isFrozen(codex.symbols)).toBe(true);
      expect(Object.isFrozen(codex.tokens)).toBe(true);
      expect(Object.isFrozen(codex.patterns)).toBe(true);
      expect(Object.isFrozen(codex.patterns[0])).toBe(true);
      expect(Object.isFrozen(codex.patterns[0].symbols)).toBe(true);
      expect(Object.isFrozen(codex.config)).toBe(true);
      expect(Object.isFrozen(codex.stats)).toBe(true);
    });

    it('is deterministic', () => {
      const text = 'the cat sat on the mat, the cat sat on the hat';
      expect(encode(text)).toEqual(encode(text));
    });

    it('encodes many inputs independently', () => {
      const codec = new Codec();
      const codices = codec.encodeMany(['one', 'two', '']);
      expect(codices.map((c) => codec.decode(c))).toEqual(['one', 'two', '']);
    });
  });

  describe('repetitive input', () => {
    it('compresses "abababab" with the five-symbol run it finds first', () => {
      const codec = new Codec({ minPatternLength: 4, minOccurrences: 2 });
      const codex = codec.encode('abababab');
      const [ab, ba] = codex.symbols;

      // "ab" and "ba" hash to distinct symbols in the default range
      expect(ab).not.toBe(ba);
      expect(codex.symbols).toEqual([ab, ba, ab, ba, ab, ba, ab]);
      // the run of five starts at 0 and 2; the spans overlap, so only one is replaced
      expect(codex.patterns).toEqual([
        { ref: 'P_000', symbols: [ab, ba, ab, ba, ab], occurrences: 2, substitutions: 1, savings: 3 },
      ]);
      expect(codex.tokens).toEqual(['P_000', ba, ab]);
      expect(codex.stats.overallCompressionRatio).toBe(7 / 3);
      expect(codec.decode(codex)).toBe('abababab');
    });

    it('registers exactly the 4-symbol run when longer runs are not allowed', () => {
      const codec = new Codec({ minPatternLength: 4, maxPatternLength: 4, minOccurrences: 2 });
      const codex = codec.encode('abababab');

      expect(codex.patterns).toHaveLength(1);
      expect(codex.patterns[0].symbols).toEqual(codex.symbols.slice(0, 4));
      expect(codex.tokens).toEqual(['P_000', ...codex.symbols.slice(4)]);
      expect(codec.decode(codex)).toBe('abababab');
    });
  });

  describe('collision tolerance', () => {
    const codec = new Codec({ symbolRange: 1 });

    it('decodes colliding inputs to their own originals', () => {
      const a = codec.encode('hello');
      const b = codec.encode('world');
      expect(a.symbols).toEqual(b.symbols);
      expect(codec.decode(a)).toBe('hello');
      expect(codec.decode(b)).toBe('world');
    });

    it('shares a fingerprint between inputs whose symbol streams coincide', () => {
      expect(codec.encode('hello').fingerprint).toBe(codec.encode('world').fingerprint);
    });

    it('round-trips when every symbol collides and patterns form', () => {
      const text = 'abcdefghijklmnopqrstuvwxyz';
      const codex = codec.encode(text);
      expect(codex.patterns.length).toBeGreaterThan(0);
      expect(codec.decode(codex)).toBe(text);
    });
  });

  describe('decode', () => {
    it('round-trips unicode and lone surrogates', () => {
      for (const text of ['日本語のテキスト', '🚀🎉🚀🎉', 'a\ud800b', '\udc00', 'tab\tnew\nline']) {
        expect(decode(encode(text))).toBe(text);
      }
    });

    it('rejects an unknown pattern reference', () => {
      const codex = encode('abcdef');
      const corrupted: Codex = { ...codex, tokens: [...codex.tokens, 'P_999'] };
      expect(() => decode(corrupted)).toThrow(CodexDecodeError);
    });

    it('rejects a chunk table that disagrees with the symbol stream', () => {
      const codex = encode('abcdef');
      const corrupted: Codex = { ...codex, chunks: codex.chunks.slice(1) };
      expect(() => decode(corrupted)).toThrow(
        'Symbol stream has 5 entries but chunk table has 4.',
      );
    });

    it('rejects a rewritten stream that diverges from the symbol stream', () => {
      const codex = encode('abcdef');
      const corrupted: Codex = { ...codex, tokens: codex.tokens.slice(0, -1) };
      expect(() => decode(corrupted)).toThrow(
        'Rewritten stream expands to 4 symbols; expected 5.',
      );
    });

    it('rejects chunks that do not overlap', () => {
      const codex = encode('hello');
      const corrupted: Codex = { ...codex, chunks: ['hX', ...codex.chunks.slice(1)] };
      expect(() => decode(corrupted)).toThrow('Chunk 1 does not overlap chunk 0.');
    });

    it('rejects a residue of two or more units', () => {
      const corrupted: Codex = { ...encode('a'), residue: 'ab' };
      expect(() => decode(corrupted)).toThrow(CodexDecodeError);
    });

    it('decodes with the configuration carried by the codex', () => {
      const codex = new Codec({ hashDepth: 2, symbolRange: 13 }).encode('carried config');
      expect(verify(codex)).toBe('carried config');
    });
  });

  describe('verify', () => {
    it('returns the input when the fingerprint matches', () => {
      const codec = new Codec();
      expect(codec.verify(codec.encode('intact'))).toBe('intact');
    });

    it('raises an integrity error when the stored fingerprint is wrong', () => {
      const codex = encode('tampered');
      const corrupted: Codex = { ...codex, fingerprint: 'f'.repeat(64) };
      expect(decode(corrupted)).toBe('tampered');
      expect(() => verify(corrupted)).toThrow(CodexIntegrityError);
    });

    it('carries both fingerprints on the integrity error', () => {
      const codex = encode('tampered');
      const corrupted: Codex = { ...codex, fingerprint: '0'.repeat(64) };
      try {
        verify(corrupted);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(CodexIntegrityError);
        if (err instanceof CodexIntegrityError) {
          expect(err.expected).toBe('0'.repeat(64));
          expect(err.actual).toBe(codex.fingerprint);
        }
      }
    });

    it('reports chunks swapped in from another input as an integrity failure', () => {
      const codex = encode('hello');
      const swapped: Codex = { ...codex, chunks: encode('jello').chunks };
      expect(decode(swapped)).toBe('jello');
      try {
        verify(swapped);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(CodexIntegrityError);
        if (err instanceof CodexIntegrityError) {
          expect(err.chunk).toBe(0);
          expect(err.expected).toBe(formatSymbol(codex.symbols[0]));
          expect(err.actual).toBe(formatSymbol(symbolFor('je', DEFAULT_CONFIG.symbolRange)));
          expect(err.message).toBe(
            `Chunk 0 hashes to ${err.actual}, stored ${err.expected}. The codex is corrupted.`,
          );
        }
      }
    });

    it('leaves the fingerprint mismatch without a chunk index', () => {
      const codex = encode('tampered');
      try {
        verify({ ...codex, fingerprint: 'c'.repeat(64) });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(CodexIntegrityError);
        if (err instanceof CodexIntegrityError) {
          expect(err.chunk).toBeUndefined();
        }
      }
    });
  });

  describe('fingerprint', () => {
    it('exposes the stored fingerprint', () => {
      const codex = encode('stored');
      expect(fingerprint(codex)).toBe(codex.fingerprint);
    });

    it('recomputes the same fingerprint from the rewritten stream', () => {
      const codec = new Codec({ minOccurrences: 2 });
      const codex = codec.encode('abcabcabcabcabc');
      expect(codec.recomputeFingerprint(codex)).toBe(codex.fingerprint);
    });

    it('is stable across codec instances', () => {
      const text = 'stable across instances';
      expect(new Codec().encode(text).fingerprint).toBe(new Codec().encode(text).fingerprint);
    });

    it('matches a hand-computed value for a two-symbol stream', () => {
      const codex = encode('abc');
      const sha256 = (t: string) => createHash('sha256').update(t, 'utf8').digest('hex');
      const texts = codex.symbols.map((s) => `S_${String(s).padStart(4, '0')}`);
      const hashes = texts.map((t) => sha256(sha256(sha256(sha256(t)))));
      expect(codex.fingerprint).toBe(sha256(texts.join('') + hashes.join('')));
    });
  });

  describe('link', () => {
    it('links the codex symbols', () => {
      const codec = new Codec();
      const codex = codec.encode('abab');
      const { links, occurrences } = codec.link(codex);
      expect(links.map((l) => l.predecessor)).toEqual([null, 0, 1]);
      expect(occurrences.get(codex.symbols[0])).toEqual([0, 2]);
    });
  });

  describe('configuration', () => {
    it('rejects invalid configuration at construction', () => {
      expect(() => new Codec({ minOccurrences: 1 })).toThrow(CodecConfigError);
    });
  });

  describe('stitch', () => {
    it('joins the first chunk with the last unit of each later chunk', () => {
      expect(stitch(['ab', 'bc', 'cd'])).toBe('abcd');
      expect(stitch([])).toBe('');
    });

    it('rejects chunks of the wrong width', () => {
      expect(() => stitch(['abc'])).toThrow('Chunk 0 has 3 units; expected 2.');
    });
  });
});
