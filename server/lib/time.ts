/**
 * Calendar Date Utilities
 *
 * Season boundaries are calendar dates (YYYY-MM-DD) with no time of day.
 * These utilities provide a single source of truth for turning an instant
 * into the calendar date of a reference timezone, and for day arithmetic
 * between calendar dates.
 */

import { toZonedTime } from 'date-fns-tz';
import { addDays, addYears, differenceInCalendarDays, format, parseISO } from 'date-fns';

export const DEFAULT_TIMEZONE = 'America/New_York';

/**
 * Get the calendar day of an instant in a timezone as a YYYY-MM-DD string.
 *
 * @example
 * // 9:00 PM ET on Sep 11 (1:00 AM UTC Sep 12)
 * getDayInZone(new Date('2025-09-12T01:00:00Z'), 'America/New_York') // '2025-09-11'
 */
export function getDayInZone(instant: Date | string, timeZone: string = DEFAULT_TIMEZONE): string {
  const date = typeof instant === 'string' ? new Date(instant) : instant;
  const zoned = toZonedTime(date, timeZone);
  const year = zoned.getFullYear();
  const month = String(zoned.getMonth() + 1).padStart(2, '0');
  const day = String(zoned.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Today's calendar date in a timezone. Only the HTTP and job layers call this;
 * season calculations always receive the date as a parameter.
 */
export function getToday(timeZone: string = DEFAULT_TIMEZONE, now: Date = new Date()): string {
  return getDayInZone(now, timeZone);
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 *
 * @example
 * daysBetween('2025-09-01', '2025-09-11') // 10
 */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

export type LeapDayRule = 'clamp' | 'roll-forward';

/**
 * Shift a date by whole years. In a non-leap target year Feb 29 lands on
 * Feb 28 ('clamp') or Mar 1 ('roll-forward').
 *
 * @example
 * addCalendarYears('2028-02-29', 1)                 // '2029-02-28'
 * addCalendarYears('2028-02-29', 1, 'roll-forward') // '2029-03-01'
 */
export function addCalendarYears(date: string, years: number, leapDay: LeapDayRule = 'clamp'): string {
  const source = parseISO(date);
  let shifted = addYears(source, years);
  if (leapDay === 'roll-forward' && shifted.getDate() !== source.getDate()) {
    shifted = addDays(shifted, 1);
  }
  return format(shifted, 'yyyy-MM-dd');
}

/**
 * Long display form, e.g. "September 11, 2025"
 */
export function formatLongDate(date: string): string {
  return format(parseISO(date), 'MMMM d, yyyy');
}
