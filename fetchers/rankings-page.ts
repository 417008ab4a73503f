/**
 * Rankings Page Fetcher
 * Fetches one date-specific ranking table and parses its rows
 */

import axios from 'axios';
import * as cheerio from 'cheerio';
import { createLogger, safeErrorData } from '../core/logger';
import { formatIsoDate, formatSlashDate } from '../core/dates';
import { FetchOutcome, RankingRecord, UnitFetcher, WorkUnit } from '../core/types';

// =============================================================================
// TYPES
// =============================================================================

export interface PageResponse {
  status: number;
  body: string;
}

/** Issues one GET; rejects on transport errors and timeouts, resolves for any HTTP status */
export type PageGetter = (url: string) => Promise<PageResponse>;

export interface RankingsClientConfig {
  baseUrl: string;
  userAgent: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxRowsPerPage: number;
}

export interface RankingsClientDeps {
  getPage?: PageGetter;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_CLIENT_CONFIG: Readonly<RankingsClientConfig> = Object.freeze({
  baseUrl: 'https://www.relianceiccrankings.com/datespecific',
  userAgent: 'Mozilla/5.0',
  requestTimeoutMs: 10_000,
  maxRetries: 3,
  retryDelayMs: 1_000,
  maxRowsPerPage: 100,
});

// =============================================================================
// HELPERS
// =============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function describeUnit(unit: WorkUnit): string {
  return `${unit.format}/${unit.category}/${formatIsoDate(unit.date)}`;
}

export function buildUnitUrl(baseUrl: string, unit: WorkUnit): string {
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}/${unit.format}/${unit.category}/${formatSlashDate(unit.date)}/`;
}

/**
 * GET through a dedicated axios instance. Every status resolves so the
 * caller decides what counts as success.
 */
export function createAxiosPageGetter(config: Pick<RankingsClientConfig, 'userAgent' | 'requestTimeoutMs'>): PageGetter {
  const http = axios.create({
    timeout: config.requestTimeoutMs,
    headers: { 'User-Agent': config.userAgent },
    responseType: 'text',
    validateStatus: () => true,
  });

  return async (url) => {
    const response = await http.get<string>(url);
    return {
      status: response.status,
      body: typeof response.data === 'string' ? response.data : '',
    };
  };
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Rows of the first table on the page, header row skipped, capped at `maxRows`.
 * The first three cells are rank, player and rating; shorter rows are dropped.
 */
export function parseRankingsTable(html: string, unit: WorkUnit, maxRows: number): RankingRecord[] {
  const $ = cheerio.load(html);
  const rows = $('table').first().find('tr').slice(1, 1 + maxRows);
  const records: RankingRecord[] = [];

  rows.each((_, row) => {
    const cells = $(row).find('td');
    if (cells.length < 3) return;

    records.push({
      date: unit.date,
      format: unit.format,
      category: unit.category,
      rank: cells.eq(0).text().trim(),
      player: cells.eq(1).text().trim(),
      rating: cells.eq(2).text().trim(),
    });
  });

  return records;
}

// =============================================================================
// CLIENT
// =============================================================================

export class RankingsClient implements UnitFetcher {
  private readonly config: Readonly<RankingsClientConfig>;
  private readonly getPage: PageGetter;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log = createLogger('RankingsClient');

  constructor(config: Partial<RankingsClientConfig> = {}, deps: RankingsClientDeps = {}) {
    this.config = Object.freeze({ ...DEFAULT_CLIENT_CONFIG, ...config });
    this.getPage = deps.getPage ?? createAxiosPageGetter(this.config);
    this.sleep = deps.sleep ?? sleep;
  }

  getConfig(): Readonly<RankingsClientConfig> {
    return this.config;
  }

  urlFor(unit: WorkUnit): string {
    return buildUnitUrl(this.config.baseUrl, unit);
  }

  /**
   * Fetch one unit with bounded retries. Never rejects.
   */
  async fetchUnitOutcome(unit: WorkUnit): Promise<FetchOutcome> {
    const url = this.urlFor(unit);
    const { maxRetries, retryDelayMs, maxRowsPerPage } = this.config;
    const log = this.log.child({ unit: describeUnit(unit) });
    let lastReason = 'no attempts made';

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.getPage(url);
        if (response.status !== 200) {
          throw new Error(`HTTP ${response.status}`);
        }

        const records = parseRankingsTable(response.body, unit, maxRowsPerPage);
        if (records.length === 0) {
          log.debug('fetch.empty', { attempt });
          return { status: 'empty', attempts: attempt };
        }

        log.trace('fetch.ok', { rows: records.length, attempt });
        return { status: 'ok', records, attempts: attempt };
      } catch (err) {
        const data = safeErrorData(err);
        lastReason = String(data.error);
        log.debug('fetch.attempt_failed', { attempt, maxRetries, ...data });

        if (attempt < maxRetries) {
          await this.sleep(retryDelayMs);
        }
      }
    }

    log.warn('fetch.unit_failed', { attempts: maxRetries, reason: lastReason });
    return { status: 'failed', attempts: maxRetries, reason: lastReason };
  }

  async fetchUnit(unit: WorkUnit): Promise<RankingRecord[]> {
    const outcome = await this.fetchUnitOutcome(unit);
    return outcome.status === 'ok' ? outcome.records : [];
  }
}
