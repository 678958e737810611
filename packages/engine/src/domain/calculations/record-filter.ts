/**
 * Expense record filtering by inclusive calendar-date window
 */

import type { DateWindow, ExpenseRecord } from '@cashsplit/shared';
import { compareCalendarDates, tryParseIsoDate } from '../calendar/calendar-date';

/**
 * Check if a record falls within the window
 *
 * A record whose date cannot be parsed only passes an unbounded window.
 */
export function isRecordInWindow(record: ExpenseRecord, window: DateWindow): boolean {
  const { start, end } = window;
  if (!start && !end) {
    return true;
  }

  const date = tryParseIsoDate(record.date);
  if (!date) {
    return false;
  }
  if (start && compareCalendarDates(date, start) < 0) {
    return false;
  }
  if (end && compareCalendarDates(date, end) > 0) {
    return false;
  }
  return true;
}

/**
 * Filter records based on the date window, preserving their order
 */
export function filterRecordsByDate(
  records: readonly ExpenseRecord[],
  window: DateWindow = {}
): ExpenseRecord[] {
  return records.filter((record) => isRecordInWindow(record, window));
}
