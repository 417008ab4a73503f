/**
 * Harvest Run
 *
 * One incremental pass over the master dataset:
 *   load → cutoff → plan → fetch (worker pool) → merge → save
 *
 * Exits early, without touching the file, when nothing is missing or
 * when the fetch produced no rows.
 */

import {
  Category,
  FetchSummary,
  Format,
  UnitFetcher,
} from '../core/types';
import { createLogger } from '../core/logger';
import { formatSlashDate } from '../core/dates';
import { computeCutoff, CutoffOptions, DEFAULT_CUTOFF_OPTIONS } from './cutoff';
import { DEFAULT_PLAN_OPTIONS, planGaps, summarizePlan, PairPlan } from './gap-planner';
import { runAll } from './worker-pool';
import { merge } from './merge';
import { MasterStore } from '../store/master-file';
import { describeUnit } from '../fetchers/rankings-page';

const log = createLogger('Harvest');

const MAX_REPORTED_FAILURES = 10;

// =============================================================================
// TYPES
// =============================================================================

export interface HarvestOptions {
  formats?: readonly Format[];
  categories?: readonly Category[];
  historyStart?: Date;
  cutoff?: CutoffOptions;
  cutoffDate?: Date;        // Explicit cutoff; skips the publication calendar
  now?: Date;
  concurrency?: number;
  dryRun?: boolean;
}

export interface HarvestDeps {
  store: MasterStore;
  fetcher: UnitFetcher;
}

export type HarvestEvent =
  | { type: 'loaded'; existed: boolean; rows: number }
  | { type: 'planned'; jobs: number; cutoff: Date; pairs: PairPlan[] }
  | { type: 'fetched'; rows: number; summary: FetchSummary }
  | { type: 'saved'; totalRows: number; location: string };

export type HarvestStatus = 'up-to-date' | 'planned' | 'no-new-data' | 'updated';

export interface HarvestReport {
  status: HarvestStatus;
  cutoff: Date;
  loadedExisting: boolean;
  jobs: number;
  newRows: number;
  totalRows: number;
  location: string;
  pairs: PairPlan[];
  summary: FetchSummary;
}

// =============================================================================
// PROGRESS LINES
// =============================================================================

/**
 * Human-readable progress line for an event.
 */
export function describeHarvestEvent(event: HarvestEvent): string {
  switch (event.type) {
    case 'loaded':
      return event.existed
        ? `Loaded existing master file (${event.rows.toLocaleString('en-US')} rows).`
        : 'No existing file, starting fresh.';
    case 'planned':
      return event.jobs === 0
        ? 'Nothing new to scrape.'
        : `Scraping ${event.jobs} jobs from multiple format-category-date combinations.`;
    case 'fetched':
      return event.rows === 0
        ? 'No new data scraped.'
        : `New rows scraped this run: ${event.rows}`;
    case 'saved':
      return `Updated master file → ${event.location} (${event.totalRows.toLocaleString('en-US')} rows total)`;
  }
}

// =============================================================================
// RUN
// =============================================================================

export function emptySummary(): FetchSummary {
  return { ok: 0, empty: 0, failed: 0, failures: [] };
}

export async function runHarvest(
  options: HarvestOptions,
  deps: HarvestDeps,
  onEvent?: (event: HarvestEvent) => void,
): Promise<HarvestReport> {
  const notify = (event: HarvestEvent): void => onEvent?.(event);

  // Step 1: Load master dataset
  const loaded = deps.store.load();
  notify({ type: 'loaded', existed: loaded.existed, rows: loaded.records.length });

  // Step 2: Plan missing units up to the cutoff
  const cutoff = options.cutoffDate ?? computeCutoff(options.now ?? new Date(), options.cutoff ?? DEFAULT_CUTOFF_OPTIONS);
  const planOptions = {
    formats: options.formats ?? DEFAULT_PLAN_OPTIONS.formats,
    categories: options.categories ?? DEFAULT_PLAN_OPTIONS.categories,
    historyStart: options.historyStart ?? DEFAULT_PLAN_OPTIONS.historyStart,
  };
  const units = planGaps(loaded.records, cutoff, planOptions);
  const pairs = summarizePlan(loaded.records, cutoff, planOptions);

  log.info('plan.ready', { cutoff: formatSlashDate(cutoff), units: units.length });
  notify({ type: 'planned', jobs: units.length, cutoff, pairs });

  const report: HarvestReport = {
    status: 'up-to-date',
    cutoff,
    loadedExisting: loaded.existed,
    jobs: units.length,
    newRows: 0,
    totalRows: loaded.records.length,
    location: deps.store.location,
    pairs,
    summary: emptySummary(),
  };

  if (units.length === 0) return report;
  if (options.dryRun) return { ...report, status: 'planned' };

  // Step 3: Fetch every unit
  const summary = emptySummary();
  const fetched = await runAll(units, deps.fetcher, {
    concurrency: options.concurrency,
    onOutcome: (unit, outcome) => {
      summary[outcome.status]++;
      if (outcome.status === 'failed' && summary.failures.length < MAX_REPORTED_FAILURES) {
        summary.failures.push({ unit: describeUnit(unit), reason: outcome.reason });
      }
    },
  });

  log.info('fetch.summary', { ok: summary.ok, empty: summary.empty, failed: summary.failed, rows: fetched.length });
  notify({ type: 'fetched', rows: fetched.length, summary });

  if (fetched.length === 0) {
    return { ...report, status: 'no-new-data', summary };
  }

  // Step 4: Merge and save
  const updated = merge(loaded.records, fetched);
  deps.store.save(updated, loaded.unrecognized);
  notify({ type: 'saved', totalRows: updated.length, location: deps.store.location });

  return {
    ...report,
    status: 'updated',
    newRows: fetched.length,
    totalRows: updated.length,
    summary,
  };
}
