/**
 * Calendar helpers
 *
 * All day boundaries are local midnights in an IANA timezone, so a window may
 * be 23 or 25 hours long around daylight-saving transitions.
 */

import { TZDate } from '@date-fns/tz';
import { addDays, format, getUnixTime, isValid, parseISO, subDays } from 'date-fns';

import type { TimeWindow } from '$types/common';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const SECONDS_PER_HOUR = 3600;

/**
 * Current time in whole epoch seconds
 */
export function now(): number {
  return getUnixTime(new Date());
}

/**
 * Check that a string is a real calendar date in YYYY-MM-DD form
 * @param value - Candidate date string
 * @returns True for valid ISO dates
 */
export function isIsoDate(value: unknown): value is string {
  return typeof value === 'string' && ISO_DATE_PATTERN.test(value) && isValid(parseISO(value));
}

/**
 * Local calendar date of a timestamp
 * @param timestamp - Epoch seconds
 * @param timeZone - IANA timezone name
 * @returns Date in YYYY-MM-DD format
 */
export function formatLocalDate(timestamp: number, timeZone: string): string {
  return format(new TZDate(timestamp * 1000, timeZone), 'yyyy-MM-dd');
}

/**
 * Local calendar date of the day before a timestamp
 * @param timestamp - Epoch seconds
 * @param timeZone - IANA timezone name
 * @returns Date in YYYY-MM-DD format
 */
export function previousLocalDate(timestamp: number, timeZone: string): string {
  return format(subDays(new TZDate(timestamp * 1000, timeZone), 1), 'yyyy-MM-dd');
}

/**
 * Window covering one local calendar day
 * @param date - Date in YYYY-MM-DD format
 * @param timeZone - IANA timezone name
 * @returns [local midnight, next local midnight) in epoch seconds
 */
export function localDayWindow(date: string, timeZone: string): TimeWindow {
  const parts = date.split('-');
  const start = new TZDate(parseInt(parts[0], 10), parseInt(parts[1], 10) - 1, parseInt(parts[2], 10), timeZone);
  const end = addDays(start, 1);

  return { start: getUnixTime(start), end: getUnixTime(end) };
}

/**
 * Check that a timezone name is known to the runtime
 * @param timeZone - IANA timezone name
 * @returns True if Intl accepts the zone
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timeZone });
    return true;
  } catch (_err) {
    return false;
  }
}
