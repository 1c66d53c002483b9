// ============================================================================
// @symcodex/core — Public API
// ============================================================================

// Codec
export { Codec, encode, decode, fingerprint, verify, stitch, freezeCodex } from './codec.js';
export type { DecodeOptions } from './codec.js';

// Configuration
export { DEFAULT_CONFIG, resolveConfig, codecConfigSchema } from './config.js';
export type { CodecConfig } from './config.js';

// Pipeline stages
export { extract, toUnits, symbolFor, formatSymbol } from './extractor.js';
export type { Extraction } from './extractor.js';
export { link, structuralSimilarity } from './ontology.js';
export { collapse, collapseAll, computeFingerprint, fingerprintSymbols } from './fingerprint.js';
export {
  compress,
  expand,
  findCandidates,
  candidatesOfLength,
  compareCandidates,
  estimateSavings,
  makeRef,
  isPatternRef,
} from './compressor.js';
export type {
  Candidate,
  CandidateSearch,
  CompressionResult,
  CompressorOptions,
} from './compressor.js';

// Serialization
export { serializeCodex, parseCodex } from './serialize.js';

// Analysis
export {
  analyzeEntropy,
  analyzeEntropyByDepth,
  analyzePatterns,
  summarizeCodex,
  shannonEntropy,
  DEFAULT_ENTROPY_DEPTHS,
} from './analysis.js';
export type {
  EntropyAnalysis,
  DepthEntropyAnalysis,
  PatternAnalysis,
  CodexSummary,
} from './analysis.js';

// Errors
export {
  SymcodexError,
  CodecConfigError,
  CodexDecodeError,
  CodexFormatError,
  CodexIntegrityError,
} from './errors.js';

// Logging
export {
  onLog,
  setLogLevel,
  getLogLevel,
  isDebugEnabled,
  timer,
  Timer,
} from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

// Types
export type {
  SymbolId,
  PatternRef,
  Token,
  Pattern,
  CompressionStats,
  Codex,
  SymbolLink,
  Ontology,
} from './types.js';
export { CHUNK_WIDTH, CODEX_VERSION } from './types.js';
