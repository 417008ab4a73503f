/**
 * Publication Cutoff
 *
 * Rankings are published once a week. The cutoff is the most recent
 * publication day on or before "today" in the reference zone; in strict
 * mode, publication day itself still points at the previous week.
 */

import { WEEKDAYS, Weekday } from '../config';
import { addDays, utcDate } from '../core/dates';

export interface CutoffOptions {
  timeZone: string;
  publicationWeekday: Weekday;
  strict: boolean;
}

export const DEFAULT_CUTOFF_OPTIONS: CutoffOptions = {
  timeZone: 'Asia/Kolkata',
  publicationWeekday: 'tuesday',
  strict: true,
};

/**
 * Calendar date of `now` as seen in `timeZone`, returned as UTC midnight.
 */
export function calendarDateInZone(now: Date, timeZone: string): Date {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): number => {
    const found = parts.find(p => p.type === type);
    if (!found) throw new Error(`Missing ${type} in formatted date for ${timeZone}`);
    return Number(found.value);
  };

  return utcDate(part('year'), part('month'), part('day'));
}

export function computeCutoff(now: Date, options: CutoffOptions = DEFAULT_CUTOFF_OPTIONS): Date {
  const today = calendarDateInZone(now, options.timeZone);
  const target = WEEKDAYS.indexOf(options.publicationWeekday);

  let delta = (today.getUTCDay() - target + 7) % 7;
  if (options.strict && delta === 0) {
    delta = 7;
  }

  return addDays(today, -delta);
}
