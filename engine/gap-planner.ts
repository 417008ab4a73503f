/**
 * Gap Planner
 *
 * Works out which (date, format, category) tables are missing from the
 * master dataset. Each (format, category) pair has a watermark, the latest
 * date already stored for it; everything after the watermark up to the
 * cutoff is a gap.
 */

import {
  CATEGORIES,
  Category,
  FORMATS,
  Format,
  RankingRecord,
  WorkUnit,
} from '../core/types';
import { addDays, datesAfter, utcDate } from '../core/dates';

// =============================================================================
// TYPES
// =============================================================================

export interface PlanOptions {
  formats: readonly Format[];
  categories: readonly Category[];
  historyStart: Date;   // First date planned for a pair with no records
}

export const DEFAULT_PLAN_OPTIONS: PlanOptions = {
  formats: FORMATS,
  categories: CATEGORIES,
  historyStart: utcDate(1971, 1, 1),
};

export interface PairPlan {
  format: Format;
  category: Category;
  watermark: Date | null;     // null: nothing stored yet
  firstMissing: Date | null;  // null: pair is fully covered
  units: number;
}

// =============================================================================
// WATERMARKS
// =============================================================================

function pairKey(format: string, category: string): string {
  return `${format}/${category}`;
}

/**
 * Latest stored date per (format, category). Records with a null date are
 * ignored; pairs with no dated records map to null.
 */
export function computeWatermarks(
  master: readonly RankingRecord[],
  formats: readonly Format[] = FORMATS,
  categories: readonly Category[] = CATEGORIES,
): Map<string, Date | null> {
  const watermarks = new Map<string, Date | null>();
  for (const format of formats) {
    for (const category of categories) {
      watermarks.set(pairKey(format, category), null);
    }
  }

  for (const record of master) {
    if (!record.date) continue;
    const key = pairKey(record.format, record.category);
    if (!watermarks.has(key)) continue;

    const current = watermarks.get(key);
    if (!current || record.date.getTime() > current.getTime()) {
      watermarks.set(key, record.date);
    }
  }

  return watermarks;
}

export function getWatermark(
  watermarks: Map<string, Date | null>,
  format: Format,
  category: Category,
): Date | null {
  return watermarks.get(pairKey(format, category)) ?? null;
}

// =============================================================================
// PLANNING
// =============================================================================

function missingDates(watermark: Date | null, cutoff: Date, historyStart: Date): Date[] {
  const after = watermark ?? addDays(historyStart, -1);
  if (after.getTime() >= cutoff.getTime()) return [];
  return datesAfter(after, cutoff);
}

/**
 * Per-pair view of the plan, used for dry runs and logging.
 */
export function summarizePlan(
  master: readonly RankingRecord[],
  cutoff: Date,
  options: PlanOptions = DEFAULT_PLAN_OPTIONS,
): PairPlan[] {
  const watermarks = computeWatermarks(master, options.formats, options.categories);
  const plans: PairPlan[] = [];

  for (const format of options.formats) {
    for (const category of options.categories) {
      const watermark = getWatermark(watermarks, format, category);
      const dates = missingDates(watermark, cutoff, options.historyStart);
      plans.push({
        format,
        category,
        watermark,
        firstMissing: dates.length > 0 ? dates[0] : null,
        units: dates.length,
      });
    }
  }

  return plans;
}

/**
 * Every missing work unit, pairs in (format, category) order and dates ascending.
 * Empty when all requested pairs are covered through the cutoff.
 */
export function planGaps(
  master: readonly RankingRecord[],
  cutoff: Date,
  options: PlanOptions = DEFAULT_PLAN_OPTIONS,
): WorkUnit[] {
  const watermarks = computeWatermarks(master, options.formats, options.categories);
  const units: WorkUnit[] = [];

  for (const format of options.formats) {
    for (const category of options.categories) {
      const watermark = getWatermark(watermarks, format, category);
      for (const date of missingDates(watermark, cutoff, options.historyStart)) {
        units.push({ date, format, category });
      }
    }
  }

  return units;
}
