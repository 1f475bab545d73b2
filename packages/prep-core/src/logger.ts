// ============================================================================
// Logging
// ============================================================================

import process from 'node:process';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Level from CIPHERPREP_DEBUG: 1/true → debug, warn, error, anything else → info.
 */
function levelFromEnv(): LogLevel {
  const env = process.env.CIPHERPREP_DEBUG;
  if (env === '1' || env === 'true') return 'debug';
  if (env === 'warn' || env === 'error') return env;
  return 'info';
}

let currentLevel: LogLevel = levelFromEnv();

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[currentLevel]) return;

  const entry: LogEntry = { level, message, timestamp: new Date().toISOString(), data };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[cipherprep] ${message}${dataStr}`;

  // stdout stays free for command output
  switch (level) {
    case 'debug':
      console.debug(msg);
      break;
    case 'info':
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
      console.error('[cipherprep] Log callback error:', e);
    }
  }
}

export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

/**
 * Something unexpected but handled, e.g. a skipped record.
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

export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

/**
 * Register a callback for log events.
 * @returns Unsubscribe function
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => callbacks.delete(callback);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}
