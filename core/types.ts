/**
 * Rankings Harvester - Types
 */

export const FORMATS = ['odi', 'test'] as const;
export const CATEGORIES = ['batting', 'bowling'] as const;

export type Format = typeof FORMATS[number];
export type Category = typeof CATEGORIES[number];

export function isFormat(value: string): value is Format {
  return FORMATS.some(format => format === value);
}

export function isCategory(value: string): value is Category {
  return CATEGORIES.some(category => category === value);
}

/**
 * One row of a published ranking table.
 * Cell values stay as the trimmed text they were scraped (or read) as.
 */
export interface RankingRecord {
  date: Date | null;   // UTC midnight; null when the stored date could not be parsed
  format: Format;
  category: Category;
  rank: string;
  player: string;
  rating: string;
}

/**
 * One fetch target: the table for a single date, format and category.
 */
export interface WorkUnit {
  date: Date;
  format: Format;
  category: Category;
}

/**
 * Result of fetching one unit, before it is collapsed to a plain row list.
 * `empty` is a definitive answer from the source; `failed` means every attempt errored.
 */
export type FetchOutcome =
  | { status: 'ok'; records: RankingRecord[]; attempts: number }
  | { status: 'empty'; attempts: number }
  | { status: 'failed'; attempts: number; reason: string };

export type FetchStatus = FetchOutcome['status'];

export interface UnitFetcher {
  fetchUnitOutcome(unit: WorkUnit): Promise<FetchOutcome>;
  fetchUnit(unit: WorkUnit): Promise<RankingRecord[]>;
}

export interface FetchSummary {
  ok: number;
  empty: number;
  failed: number;
  failures: Array<{ unit: string; reason: string }>;
}
