// ============================================================================
// @baseshift/core — Logging & Observability
// ============================================================================

import process from 'node:process';

/**
 * Log levels for baseshift.
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
 * Callback for log events, for embedders that observe conversions.
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

/**
 * Current log level (controlled by BASESHIFT_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

function initLevel(): void {
  const debug = process.env.BASESHIFT_DEBUG;
  if (debug === '1' || debug === 'true') {
    currentLevel = 'debug';
  } else if (debug === 'warn') {
    currentLevel = 'warn';
  } else if (debug === 'error') {
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
 * Create a log entry and emit to console and callbacks.
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
  const msg = `[baseshift] ${message}${dataStr}`;

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
      console.error('[baseshift] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only logs when BASESHIFT_DEBUG=1 is set.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Performance timer for measuring conversion duration.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /**
   * End with custom data and log the result at debug level.
   */
  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
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
  return () => callbacks.delete(callback);
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log a recurring cycle found during long division.
 */
export function logCycle(outputBase: number, recurringStart: number, cycleLength: number): void {
  debug(`cycle of ${cycleLength} digit(s) from index ${recurringStart} in base ${outputBase}`, {
    outputBase,
    recurringStart,
    cycleLength,
  });
}

/**
 * Log an expansion cut short by the depth bound.
 */
export function logTruncation(outputBase: number, bound: number): void {
  debug(`fraction truncated at ${bound} digit(s) in base ${outputBase}`, { outputBase, bound });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}
