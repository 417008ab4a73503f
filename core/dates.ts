/**
 * Calendar date helpers.
 *
 * A calendar date is a Date at UTC midnight. Arithmetic is done in whole
 * days on the UTC clock, so local time zones and DST never shift a date.
 */

export const DAY_MS = 86_400_000;

const SLASH_DATE = /^(\d{4})[/-](\d{1,2})[/-](\d{1,2})$/;

export function utcDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Parse `YYYY/MM/DD` (or `YYYY-MM-DD`) into a calendar date.
 * Returns null for anything else, including impossible dates like 2023/02/30.
 */
export function parseCalendarDate(text: string): Date | null {
  const match = SLASH_DATE.exec(text.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = utcDate(year, month, day);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `YYYY/MM/DD`, the form used in source URLs and in the master file */
export function formatSlashDate(date: Date): string {
  return `${date.getUTCFullYear()}/${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}`;
}

/** `YYYY-MM-DD`, for logs */
export function formatIsoDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function daysBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / DAY_MS);
}

/**
 * Every date in the half-open window (after, through].
 * Empty when `through` is not later than `after`.
 */
export function datesAfter(after: Date, through: Date): Date[] {
  const count = daysBetween(after, through);
  const dates: Date[] = [];
  for (let i = 1; i <= count; i++) {
    dates.push(addDays(after, i));
  }
  return dates;
}
