/**
 * Worker Pool
 *
 * Runs independent async tasks with bounded concurrency. Each worker pulls
 * the next unclaimed item and writes its settled result into that item's
 * slot; results are read only after every worker has finished.
 */

import * as os from 'os';
import { createLogger, rateLimitedLog, safeErrorData } from '../core/logger';
import { FetchOutcome, RankingRecord, UnitFetcher, WorkUnit } from '../core/types';
import { describeUnit } from '../fetchers/rankings-page';

const log = createLogger('WorkerPool');

const PROGRESS_INTERVAL_MS = 5_000;

export interface PoolOptions {
  concurrency?: number;                          // default: os.availableParallelism()
  onSettled?: (done: number, total: number) => void;
}

export function defaultConcurrency(): number {
  return os.availableParallelism();
}

/**
 * Run `task` over every item, at most `concurrency` at a time.
 * A rejected task never stops the others; results come back in input order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: PoolOptions = {},
): Promise<PromiseSettledResult<R>[]> {
  const results = new Array<PromiseSettledResult<R>>(items.length);
  const workerCount = Math.max(1, Math.min(options.concurrency ?? defaultConcurrency(), items.length));
  let next = 0;
  let done = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await task(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
      done++;
      options.onSettled?.(done, items.length);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount && i < items.length; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}

export interface RunAllOptions {
  concurrency?: number;
  onOutcome?: (unit: WorkUnit, outcome: FetchOutcome) => void;
}

/**
 * Fetch every unit through the pool and return all rows as one flat list.
 * Units that came back empty or failed contribute nothing.
 */
export async function runAll(
  units: readonly WorkUnit[],
  fetcher: UnitFetcher,
  options: RunAllOptions = {},
): Promise<RankingRecord[]> {
  const concurrency = options.concurrency ?? defaultConcurrency();
  log.info('pool.start', { units: units.length, concurrency });

  const settled = await runPool(units, unit => fetcher.fetchUnitOutcome(unit), {
    concurrency,
    onSettled: (done, total) =>
      rateLimitedLog(log, 'info', 'pool.progress', PROGRESS_INTERVAL_MS, 'pool.progress', { done, total }),
  });

  const records: RankingRecord[] = [];
  settled.forEach((result, index) => {
    const unit = units[index];
    let outcome: FetchOutcome;

    if (result.status === 'fulfilled') {
      outcome = result.value;
    } else {
      const data = safeErrorData(result.reason);
      log.error('pool.task_rejected', { unit: describeUnit(unit), ...data });
      outcome = { status: 'failed', attempts: 0, reason: String(data.error) };
    }

    if (outcome.status === 'ok') {
      records.push(...outcome.records);
    }
    options.onOutcome?.(unit, outcome);
  });

  log.info('pool.done', { units: units.length, rows: records.length });
  return records;
}
