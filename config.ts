/**
 * Rankings Harvester - Configuration
 * Source location, retry policy, worker pool size and the publication calendar
 */

import * as os from 'os';
import { parseCalendarDate, formatSlashDate } from './core/dates';
import { isLogFormat, isLogLevel, LOG_FORMATS, LOG_LEVELS } from './core/logger';
import type { Logger, LogFormat, LogLevel } from './core/logger';

export const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;
export type Weekday = typeof WEEKDAYS[number];

export interface HarvestConfig {
  // Source
  baseUrl: string;              // Locator base; {format}/{category}/{YYYY/MM/DD}/ is appended
  userAgent: string;            // Sent on every request

  // Persistence
  outputFile: string;           // Master dataset; a .gz suffix means gzip-compressed CSV

  // Fetching
  maxRetries: number;           // Attempts per work unit
  requestTimeoutMs: number;     // Per-request timeout
  retryDelayMs: number;         // Fixed backoff after a failed attempt
  maxRowsPerPage: number;       // Data rows taken from each table
  concurrency: number;          // Worker pool size

  // Publication calendar
  timeZone: string;             // Zone in which "today" is evaluated
  publicationWeekday: Weekday;  // Day of the week new tables are published
  strictCutoff: boolean;        // On publication day, the current week is not yet available
  historyStart: Date;           // Earliest date ever planned for an empty (format, category)

  // Logging
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export const DEFAULT_BASE_URL = 'https://www.relianceiccrankings.com/datespecific';
export const DEFAULT_OUTPUT_FILE = 'ICC_Rankings.csv.gz';

function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return parseInt(value, 10);
}

export function loadHarvestConfig(env: NodeJS.ProcessEnv = process.env): HarvestConfig {
  const weekdayText = (env.HARVEST_PUBLICATION_DAY || 'tuesday').toLowerCase();
  const publicationWeekday = WEEKDAYS.find(d => d === weekdayText);
  const historyStartText = env.HARVEST_HISTORY_START || '1971-01-01';
  const historyStart = parseCalendarDate(historyStartText);
  if (!historyStart) {
    throw new Error(`HARVEST_HISTORY_START must be a YYYY-MM-DD date (got "${historyStartText}")`);
  }
  if (!publicationWeekday) {
    throw new Error(`HARVEST_PUBLICATION_DAY must be one of ${WEEKDAYS.join(', ')} (got "${weekdayText}")`);
  }
  const logLevel = (env.LOG_LEVEL || 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${logLevel}")`);
  }
  const logFormat = (env.LOG_FORMAT || 'pretty').toLowerCase();
  if (!isLogFormat(logFormat)) {
    throw new Error(`LOG_FORMAT must be one of ${LOG_FORMATS.join(', ')} (got "${logFormat}")`);
  }

  return {
    baseUrl: env.RANKINGS_BASE_URL || DEFAULT_BASE_URL,
    userAgent: env.RANKINGS_USER_AGENT || 'Mozilla/5.0',

    outputFile: env.HARVEST_OUTPUT_FILE || DEFAULT_OUTPUT_FILE,

    maxRetries: parseIntEnv(env.HARVEST_MAX_RETRIES, 3),
    requestTimeoutMs: parseIntEnv(env.HARVEST_TIMEOUT_MS, 10_000),
    retryDelayMs: parseIntEnv(env.HARVEST_RETRY_DELAY_MS, 1_000),
    maxRowsPerPage: parseIntEnv(env.HARVEST_MAX_ROWS, 100),
    concurrency: parseIntEnv(env.HARVEST_CONCURRENCY, os.availableParallelism()),

    timeZone: env.HARVEST_TIME_ZONE || 'Asia/Kolkata',
    publicationWeekday,
    strictCutoff: (env.HARVEST_STRICT_CUTOFF || 'true').toLowerCase() !== 'false',
    historyStart,

    logLevel,
    logFormat,
  };
}

export function validateHarvestConfig(config: HarvestConfig): void {
  if (!/^https?:\/\//.test(config.baseUrl)) {
    throw new Error('RANKINGS_BASE_URL must be an http(s) URL');
  }
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 1) {
    throw new Error('HARVEST_MAX_RETRIES must be a positive integer');
  }
  if (!Number.isInteger(config.requestTimeoutMs) || config.requestTimeoutMs < 1) {
    throw new Error('HARVEST_TIMEOUT_MS must be a positive integer');
  }
  if (!Number.isInteger(config.retryDelayMs) || config.retryDelayMs < 0) {
    throw new Error('HARVEST_RETRY_DELAY_MS must be zero or a positive integer');
  }
  if (!Number.isInteger(config.maxRowsPerPage) || config.maxRowsPerPage < 1) {
    throw new Error('HARVEST_MAX_ROWS must be a positive integer');
  }
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    throw new Error('HARVEST_CONCURRENCY must be a positive integer');
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: config.timeZone });
  } catch {
    throw new Error(`HARVEST_TIME_ZONE is not a known time zone: ${config.timeZone}`);
  }
}

export function logHarvestConfig(config: HarvestConfig, log: Logger): void {
  log.info('config.loaded', {
    baseUrl: config.baseUrl,
    outputFile: config.outputFile,
    maxRetries: config.maxRetries,
    timeoutMs: config.requestTimeoutMs,
    retryDelayMs: config.retryDelayMs,
    maxRows: config.maxRowsPerPage,
    concurrency: config.concurrency,
    timeZone: config.timeZone,
    publicationDay: config.publicationWeekday,
    strictCutoff: config.strictCutoff,
    historyStart: formatSlashDate(config.historyStart),
    logLevel: config.logLevel,
    logFormat: config.logFormat,
  });
}
