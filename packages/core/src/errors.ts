// ============================================================================
// @symcodex/core — Error Types
// ============================================================================

/**
 * Base error class for all symcodex errors.
 */
export class SymcodexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SymcodexError';
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a codec configuration value is out of range.
 */
export class CodecConfigError extends SymcodexError {
  public readonly field?: string;
  public readonly reason?: string;

  constructor(message: string, options?: { field?: string; reason?: string }) {
    super(message);
    this.name = 'CodecConfigError';
    this.field = options?.field;
    this.reason = options?.reason;
  }
}

// ---------------------------------------------------------------------------
// Decoding Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a codex cannot be decoded: a reference token has no
 * dictionary entry, or the chunk table and symbol stream disagree.
 * The codex must be treated as corrupted.
 */
export class CodexDecodeError extends SymcodexError {
  constructor(message: string) {
    super(message);
    this.name = 'CodexDecodeError';
  }
}

/**
 * Thrown when a serialized codex fails schema validation.
 */
export class CodexFormatError extends CodexDecodeError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.slice(0, 5).join('; ')}` : message);
    this.name = 'CodexFormatError';
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Integrity Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a codex fails verification: a chunk no longer hashes to its
 * stored symbol, or the fingerprint recomputed from the decoded stream
 * differs from the one stored at encode time.
 */
export class CodexIntegrityError extends SymcodexError {
  public readonly expected: string;
  public readonly actual: string;
  /** Index of the chunk whose symbol disagrees; absent for a fingerprint mismatch */
  public readonly chunk?: number;

  constructor(expected: string, actual: string, options?: { chunk?: number }) {
    super(
      options?.chunk !== undefined
        ? `Chunk ${options.chunk} hashes to ${actual}, stored ${expected}. The codex is corrupted.`
        : `Fingerprint mismatch: stored ${expected.slice(0, 16)}…, recomputed ${actual.slice(0, 16)}…. The codex is corrupted.`,
    );
    this.name = 'CodexIntegrityError';
    this.expected = expected;
    this.actual = actual;
    this.chunk = options?.chunk;
  }
}
