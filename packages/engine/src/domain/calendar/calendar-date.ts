/**
 * Calendar date helpers
 *
 * Record dates are stored as `YYYY-MM-DD` text; month and day may be written
 * without zero padding (`2024-3-5`). Window filtering compares parsed calendar
 * dates, never the raw strings.
 */

import type { CalendarDate } from '@cashsplit/shared';
import { LedgerValidationError } from '../../core/errors';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

/**
 * Parse a `YYYY-MM-DD` date, or return null when the text is not a real
 * calendar date (e.g. `2024-02-30`)
 */
export function tryParseIsoDate(text: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // Round-trip through UTC to reject days that overflow the month
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  if (
    utc.getUTCFullYear() !== year ||
    utc.getUTCMonth() !== month - 1 ||
    utc.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

/**
 * Parse a `YYYY-MM-DD` date supplied by a collaborator (filter bounds, drafts)
 */
export function parseIsoDate(text: string): CalendarDate {
  const date = tryParseIsoDate(text);
  if (!date) {
    throw new LedgerValidationError(`Date must be YYYY-MM-DD: "${text}"`);
  }
  return date;
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.month !== b.month) return a.month - b.month;
  return a.day - b.day;
}

export function formatIsoDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Local calendar date of `now`, as `YYYY-MM-DD`
 */
export function todayIsoDate(now: Date = new Date()): string {
  return formatIsoDate({
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
  });
}
