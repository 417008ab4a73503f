/**
 * Harvest Logger
 *
 * One line per event, tagged with the module and the process run id:
 *   2024-01-09T06:00:00.000Z [INFO] [Harvest] plan.ready | cutoff=1971-01-05 units=4 runId=1a2b3c4d
 *
 * Level and format are set once from config (LOG_LEVEL, LOG_FORMAT) by the
 * CLI; until then the logger writes `info` and above in the pretty format.
 *
 * Usage:
 *   const log = createLogger('RankingsClient');
 *   const unitLog = log.child({ unit: 'odi/batting/1971-01-05' });
 *   unitLog.debug('fetch.attempt_failed', { attempt: 1, error: 'HTTP 503' });
 */

import * as crypto from 'crypto';
import axios from 'axios';

// =============================================================================
// TYPES
// =============================================================================

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;
export const LOG_FORMATS = ['pretty', 'json'] as const;

export type LogLevel = typeof LOG_LEVELS[number];
export type LogFormat = typeof LOG_FORMATS[number];
export type LogData = Record<string, unknown>;

type LogFn = (event: string, data?: LogData) => void;

export interface Logger {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  trace: LogFn;
  isEnabled: (level: LogLevel) => boolean;
  /** Logger whose lines all carry `fields`, e.g. the work unit being fetched */
  child: (fields: LogData) => Logger;
}

export interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

// =============================================================================
// SETTINGS
// =============================================================================

const settings: LoggerSettings = { level: 'info', format: 'pretty' };

/** Process-scoped run id, shared by every line of one harvest */
export const RUN_ID: string = crypto.randomUUID().slice(0, 8);

/**
 * Apply level and/or format. Returns the settings in force before the call.
 */
export function configureLogger(next: Partial<LoggerSettings>): LoggerSettings {
  const previous = { ...settings };
  if (next.level) settings.level = next.level;
  if (next.format) settings.format = next.format;
  return previous;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] <= LEVEL_RANK[settings.level];
}

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3, trace: 4 };

// =============================================================================
// FORMATTING
// =============================================================================

const MAX_STRING_LENGTH = 200;

// Every Date in this project is a calendar date at UTC midnight
function formatValue(value: unknown): unknown {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString().split('T')[0];
  }
  if (typeof value === 'string' && value.length > MAX_STRING_LENGTH) {
    return value.slice(0, MAX_STRING_LENGTH) + '…';
  }
  return value;
}

function renderLine(level: LogLevel, module: string, event: string, data: LogData): string {
  const ts = new Date().toISOString();

  if (settings.format === 'json') {
    return JSON.stringify({ ts, level, module, event, ...data });
  }

  const pairs = Object.entries(data)
    .filter(([, v]) => v !== undefined && v !== null)
    .map(([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`);
  const head = `${ts} [${level.toUpperCase()}] [${module}] ${event}`;
  return pairs.length > 0 ? `${head} | ${pairs.join(' ')}` : head;
}

// =============================================================================
// FACTORY
// =============================================================================

function makeLogger(module: string, fields: LogData): Logger {
  const logFn = (level: LogLevel): LogFn => (event, data) => {
    if (!enabled(level)) return;

    const merged: LogData = {};
    for (const [k, v] of Object.entries({ ...fields, ...data })) {
      merged[k] = formatValue(v);
    }
    merged.runId = RUN_ID;

    const line = renderLine(level, module, event, merged);
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    error: logFn('error'),
    warn: logFn('warn'),
    info: logFn('info'),
    debug: logFn('debug'),
    trace: logFn('trace'),
    isEnabled: enabled,
    child: (extra) => makeLogger(module, { ...fields, ...extra }),
  };
}

export function createLogger(module: string): Logger {
  return makeLogger(module, {});
}

// =============================================================================
// RATE-LIMITED LOGGING
// =============================================================================

const lastEmitted = new Map<string, { at: number; suppressed: number }>();

/**
 * Emit at most once per `intervalMs` for `key`; the next emitted line reports
 * how many were skipped in between.
 */
export function rateLimitedLog(
  logger: Logger,
  level: LogLevel,
  key: string,
  intervalMs: number,
  event: string,
  data?: LogData,
): void {
  if (!logger.isEnabled(level)) return;

  const now = Date.now();
  const state = lastEmitted.get(key);
  if (state && now - state.at < intervalMs) {
    state.suppressed++;
    return;
  }

  lastEmitted.set(key, { at: now, suppressed: 0 });
  logger[level](event, state && state.suppressed > 0 ? { ...data, suppressedCount: state.suppressed } : data);
}

// =============================================================================
// ERRORS
// =============================================================================

/**
 * Loggable fields for a failed request or any thrown value.
 * Response bodies are never included (ranking pages are whole HTML documents).
 */
export function safeErrorData(err: unknown): LogData {
  if (err === null || err === undefined) return { error: 'unknown' };

  if (axios.isAxiosError(err)) {
    const result: LogData = { error: err.message.slice(0, MAX_STRING_LENGTH) };
    if (err.response) result.httpStatus = err.response.status;
    if (err.config?.url) result.url = err.config.url.slice(0, MAX_STRING_LENGTH);
    if (err.code) result.errorCode = err.code;
    return result;
  }

  const message = err instanceof Error ? err.message : String(err);
  return { error: message.slice(0, MAX_STRING_LENGTH) };
}
