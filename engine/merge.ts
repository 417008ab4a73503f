/**
 * Merge Engine
 * Appends newly fetched rows to the master dataset, dropping repeated
 * observations and restoring canonical order.
 */

import { RankingRecord } from '../core/types';
import { formatSlashDate } from '../core/dates';

/**
 * Identity of an observation: the full (date, format, category, rank, player, rating) tuple.
 */
export function recordKey(record: RankingRecord): string {
  return JSON.stringify([
    record.date ? formatSlashDate(record.date) : null,
    record.format,
    record.category,
    record.rank,
    record.player,
    record.rating,
  ]);
}

/** Keeps the first record of every identity */
export function dedupeRecords(records: readonly RankingRecord[]): RankingRecord[] {
  const seen = new Set<string>();
  const unique: RankingRecord[] = [];
  for (const record of records) {
    const key = recordKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }
  return unique;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// Null dates sort after every real date
function compareDates(a: Date | null, b: Date | null): number {
  if (a && b) return a.getTime() - b.getTime();
  if (a) return -1;
  if (b) return 1;
  return 0;
}

const LEADING_INTEGER = /^(\d+)(.*)$/s;

/**
 * Total order on rank text: ranks with a leading integer ("2", "10", "5=")
 * come first, ordered by that integer, then by what follows it; everything
 * else is ordered as text after them.
 */
export function compareRanks(a: string, b: string): number {
  const ma = LEADING_INTEGER.exec(a);
  const mb = LEADING_INTEGER.exec(b);
  if (ma && !mb) return -1;
  if (!ma && mb) return 1;
  if (ma && mb) {
    return Number(ma[1]) - Number(mb[1])
      || compareText(ma[2], mb[2])
      || compareText(a, b);
  }
  return compareText(a, b);
}

/** Canonical order: format, category, date, rank; player and rating break ties */
export function compareRecords(a: RankingRecord, b: RankingRecord): number {
  return compareText(a.format, b.format)
    || compareText(a.category, b.category)
    || compareDates(a.date, b.date)
    || compareRanks(a.rank, b.rank)
    || compareText(a.player, b.player)
    || compareText(a.rating, b.rating);
}

export function sortRecords(records: readonly RankingRecord[]): RankingRecord[] {
  return [...records].sort(compareRecords);
}

/**
 * Master ∪ new rows, deduplicated by identity and canonically sorted.
 * Neither input is modified.
 */
export function merge(
  master: readonly RankingRecord[],
  newRecords: readonly RankingRecord[],
): RankingRecord[] {
  return sortRecords(dedupeRecords([...master, ...newRecords]));
}
