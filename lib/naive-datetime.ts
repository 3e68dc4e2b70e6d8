/**
 * Timezone-naive timestamps, `YYYY-MM-DDTHH:mm:ss`.
 *
 * The source columns carry a UTC marker (`2016-04-29T18:38:08Z`); the offset is
 * dropped and the wall-clock value kept, so arithmetic below runs in UTC where
 * no DST shift can move a value across a day boundary.
 */

import { isValid } from 'date-fns';
import type { Weekday } from './types/appointment';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/** Monday-first, the order the weekday summary and charts use. */
export const WEEKDAYS: readonly Weekday[] = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
];

/**
 * Parses a date or date-time string into its naive form.
 * Returns null when the string is not a timestamp or names an impossible date.
 */
export function parseNaiveTimestamp(value: string): string | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour = '00', minute = '00', second = '00'] = match;
  const normalized = `${year}-${month}-${day}T${hour}:${minute}:${second}`;

  const date = new Date(`${normalized}Z`);
  if (!isValid(date)) return null;
  // Date.parse rolls 2016-02-30 over into March; reject instead.
  if (date.toISOString().slice(0, 19) !== normalized) return null;

  return normalized;
}

export function naiveToEpochMs(naive: string): number {
  return Date.parse(`${naive}Z`);
}

/**
 * Whole days from `from` to `to`, floored: ten hours before midnight is -1.
 */
export function wholeDaysBetween(from: string, to: string): number {
  return Math.floor((naiveToEpochMs(to) - naiveToEpochMs(from)) / MS_PER_DAY);
}

export function weekdayOf(naive: string): Weekday {
  const sundayFirst = new Date(naiveToEpochMs(naive)).getUTCDay();
  return WEEKDAYS[(sundayFirst + 6) % 7];
}
