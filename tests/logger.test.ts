/**
 * Tests for the harvest logger: line format, level filtering, unit-scoped
 * child loggers, rate limiting and error extraction.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AxiosError } from 'axios';
import {
  configureLogger,
  createLogger,
  rateLimitedLog,
  safeErrorData,
  RUN_ID,
  LoggerSettings,
} from '../core/logger';
import { utcDate } from '../core/dates';

describe('createLogger', () => {
  const origConsoleLog = console.log;
  const origConsoleWarn = console.warn;
  let loggedLines: string[];
  let previous: LoggerSettings;

  beforeEach(() => {
    loggedLines = [];
    console.log = (...args: unknown[]) => { loggedLines.push(args.join(' ')); };
    console.warn = (...args: unknown[]) => { loggedLines.push(args.join(' ')); };
    previous = configureLogger({ level: 'debug', format: 'pretty' });
  });

  afterEach(() => {
    console.log = origConsoleLog;
    console.warn = origConsoleWarn;
    configureLogger(previous);
  });

  it('writes level, module, event and key=value pairs', () => {
    createLogger('Harvest').info('plan.ready', { units: 3, cutoff: '1971/01/05' });

    expect(loggedLines).toHaveLength(1);
    expect(loggedLines[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] \[Harvest\] plan\.ready \| units=3 cutoff=1971\/01\/05 runId=\w{8}$/,
    );
  });

  it('prints dates as calendar days', () => {
    createLogger('Harvest').info('plan.ready', { cutoff: utcDate(1971, 1, 5) });
    expect(loggedLines[0]).toContain('cutoff=1971-01-05 ');
  });

  it('drops events below the configured level', () => {
    configureLogger({ level: 'warn' });
    const log = createLogger('Harvest');
    log.info('hidden');
    log.warn('shown');

    expect(loggedLines).toHaveLength(1);
    expect(loggedLines[0]).toContain('[WARN] [Harvest] shown');
  });

  it('child loggers tag every line with the unit', () => {
    const log = createLogger('RankingsClient').child({ unit: 'odi/batting/1971-01-05' });
    log.debug('fetch.attempt_failed', { attempt: 2 });

    expect(loggedLines[0]).toContain(
      `[RankingsClient] fetch.attempt_failed | unit=odi/batting/1971-01-05 attempt=2 runId=${RUN_ID}`,
    );
  });

  it('emits JSON lines in json format', () => {
    configureLogger({ format: 'json' });
    createLogger('Harvest').info('fetch.summary', { ok: 2 });

    const entry = JSON.parse(loggedLines[0]);
    expect(entry).toMatchObject({ level: 'info', module: 'Harvest', event: 'fetch.summary', ok: 2, runId: RUN_ID });
  });

  it('rate-limited logs emit once per interval', () => {
    const log = createLogger('WorkerPool');
    for (let i = 0; i < 5; i++) {
      rateLimitedLog(log, 'info', 'test.rate-limit', 60_000, 'pool.progress', { done: i });
    }
    expect(loggedLines).toHaveLength(1);
    expect(loggedLines[0]).toContain('done=0');
  });
});

describe('configureLogger', () => {
  it('returns the settings it replaced', () => {
    const original = configureLogger({ level: 'trace' });
    const replaced = configureLogger(original);
    expect(replaced).toEqual({ level: 'trace', format: original.format });
  });
});

describe('safeErrorData', () => {
  it('extracts message, code and status from an axios error', () => {
    const err = new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED');
    expect(safeErrorData(err)).toEqual({ error: 'timeout of 10000ms exceeded', errorCode: 'ECONNABORTED' });
  });

  it('handles plain errors, strings and nothing', () => {
    expect(safeErrorData(new Error('HTTP 503'))).toEqual({ error: 'HTTP 503' });
    expect(safeErrorData('socket hang up')).toEqual({ error: 'socket hang up' });
    expect(safeErrorData(undefined)).toEqual({ error: 'unknown' });
  });
});
