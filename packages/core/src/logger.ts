// ============================================================================
// @symcodex/core — Logging & Observability
// ============================================================================

import process from 'node:process';

/**
 * Log levels for symcodex.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events (lets the embedding layer collect codec metrics).
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

/**
 * Current log level (controlled by SYMCODEX_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

function initLevel(): void {
  const flag = process.env.SYMCODEX_DEBUG;
  if (flag === '1' || flag === 'true') {
    currentLevel = 'debug';
  } else if (flag === 'warn') {
    currentLevel = 'warn';
  } else if (flag === 'error') {
    currentLevel = 'error';
  } else {
    currentLevel = 'info';
  }
}

initLevel();

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Create a log entry, print it and emit it to callbacks.
 */
function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[symcodex] ${message}${dataStr}`;

  switch (level) {
    case 'debug':
      console.debug(msg);
      break;
    case 'info':
      console.info(msg);
      break;
    case 'warn':
      console.warn(msg);
      break;
    case 'error':
      console.error(msg);
      break;
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[symcodex] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only printed when SYMCODEX_DEBUG=1 is set.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

/**
 * Something unexpected that the codec still handled.
 */
export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Performance timer for measuring operation duration.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /**
   * Elapsed milliseconds without logging.
   */
  elapsed(): number {
    return performance.now() - this.startTime;
  }

  /**
   * End the timer and log the result at debug level.
   */
  end(): number {
    const duration = this.elapsed();
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Event Callbacks
// ---------------------------------------------------------------------------

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => {
    callbacks.delete(callback);
  };
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log encoding performance.
 */
export function logEncode(
  inputLength: number,
  tokenCount: number,
  durationMs: number,
  fingerprint: string,
): void {
  debug(`encode: ${durationMs.toFixed(2)}ms for ${inputLength} chars → ${tokenCount} tokens`, {
    inputLength,
    tokens: tokenCount,
    durationMs,
    fingerprint: fingerprint.slice(0, 8),
  });
}

export function logDecode(chunkCount: number, durationMs: number, fingerprint: string): void {
  debug(`decode: ${durationMs.toFixed(2)}ms for ${chunkCount} chunks`, {
    chunks: chunkCount,
    durationMs,
    fingerprint: fingerprint.slice(0, 8),
  });
}

/**
 * Log the outcome of a pattern search. Budget exhaustion is a warning.
 */
export function logPatternSearch(
  candidateCount: number,
  acceptedCount: number,
  windowsVisited: number,
  budgetExhausted: boolean,
): void {
  const data = {
    candidates: candidateCount,
    accepted: acceptedCount,
    windowsVisited,
    budgetExhausted,
  };
  if (budgetExhausted) {
    warn(`pattern search stopped at budget after ${windowsVisited} windows`, data);
  } else {
    debug(`pattern search: ${acceptedCount}/${candidateCount} candidates accepted`, data);
  }
}

export function logIntegrityFailure(expected: string, actual: string): void {
  error(`integrity check failed for ${expected.slice(0, 8)}`, {
    expected: expected.slice(0, 16),
    actual: actual.slice(0, 16),
  });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Set the log level programmatically.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}
