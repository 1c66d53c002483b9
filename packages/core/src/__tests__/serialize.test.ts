import { describe, expect, it } from 'vitest';
import { Codec, encode, verify } from '../codec.js';
import { CodexDecodeError, CodexFormatError } from '../errors.js';
import { parseCodex, serializeCodex } from '../serialize.js';

function formatIssues(json: string): string[] {
  try {
    parseCodex(json);
  } catch (err) {
    if (err instanceof CodexFormatError) return err.issues;
    throw err;
  }
  return [];
}

describe('serializeCodex', () => {
  it('writes keys in a fixed order', () => {
    const json = serializeCodex(encode('ab'));
    expect(json.startsWith('{"version":1,"config":{"symbolRange":10000,"hashDepth":4,')).toBe(true);
    const keys: Record<string, unknown> = JSON.parse(json);
    expect(Object.keys(keys)).toEqual([
      'version',
      'config',
      'chunks',
      'residue',
      'symbols',
      'patterns',
      'tokens',
      'fingerprint',
      'stats',
    ]);
  });

  it('serializes equal codices to equal strings', () => {
    const text = 'same input, same bytes';
    expect(serializeCodex(encode(text))).toBe(serializeCodex(encode(text)));
  });
});

describe('parseCodex', () => {
  const codec = new Codec({ minOccurrences: 2 });

  it('restores an equal, frozen codex', () => {
    const codex = codec.encode('abababab');
    const parsed = parseCodex(serializeCodex(codex));
    expect(parsed).toEqual(codex);
    expect(Object.isFrozen(parsed)).toBe(true);
    expect(Object.isFrozen(parsed.patterns[0].symbols)).toBe(true);
    expect(verify(parsed)).toBe('abababab');
  });

  it('keeps the residue of a single-unit input', () => {
    const parsed = parseCodex(serializeCodex(encode('z')));
    expect(parsed.residue).toBe('z');
    expect(verify(parsed)).toBe('z');
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseCodex('{not json')).toThrow(CodexFormatError);
    expect(() => parseCodex('{not json')).toThrow(/^Serialized codex is not valid JSON: /);
  });

  it('is a decode error', () => {
    expect(() => parseCodex('[]')).toThrow(CodexDecodeError);
  });

  it('rejects an unsupported version', () => {
    const doc: { version: number } = JSON.parse(serializeCodex(encode('hello')));
    doc.version = 2;
    const issues = formatIssues(JSON.stringify(doc));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('version: ')).toBe(true);
  });

  it('rejects a symbol outside the configured range', () => {
    const doc: { symbols: number[] } = JSON.parse(serializeCodex(encode('hello')));
    doc.symbols[0] = 10_000;
    expect(formatIssues(JSON.stringify(doc))).toEqual([
      'symbols.0: symbol 10000 outside range 10000',
    ]);
  });

  it('rejects a malformed pattern reference', () => {
    const doc: { tokens: unknown[] } = JSON.parse(serializeCodex(encode('hello')));
    doc.tokens.push('Q_1');
    expect(() => parseCodex(JSON.stringify(doc))).toThrow(CodexFormatError);
  });

  it('rejects duplicate dictionary references', () => {
    const doc: { patterns: unknown[] } = JSON.parse(serializeCodex(codec.encode('abababab')));
    doc.patterns.push(doc.patterns[0]);
    expect(formatIssues(JSON.stringify(doc))).toEqual([
      'patterns.1.ref: duplicate reference P_000',
    ]);
  });

  it('rejects a malformed fingerprint', () => {
    const doc: { fingerprint: string } = JSON.parse(serializeCodex(encode('hello')));
    doc.fingerprint = 'XYZ';
    const issues = formatIssues(JSON.stringify(doc));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('fingerprint: ')).toBe(true);
  });

  it('rejects an invalid embedded config', () => {
    const doc: { config: { minOccurrences: number } } = JSON.parse(
      serializeCodex(encode('hello')),
    );
    doc.config.minOccurrences = 1;
    const issues = formatIssues(JSON.stringify(doc));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('config.minOccurrences: ')).toBe(true);
  });

  it('lists issues in the error message', () => {
    const doc: { symbols: number[] } = JSON.parse(serializeCodex(encode('hello')));
    doc.symbols[1] = 20_000;
    expect(() => parseCodex(JSON.stringify(doc))).toThrow(
      'Serialized codex failed validation: symbols.1: symbol 20000 outside range 10000',
    );
  });
});
