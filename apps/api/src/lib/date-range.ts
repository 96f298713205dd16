import { format, startOfDay, startOfMonth } from 'date-fns';
import type { DateRangeParams } from '@tally/core';
import type { TransactionRangeQuery } from '@tally/types';

export const API_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Fill missing query bounds: start defaults to the first day of the
 * current month, end to today
 */
export function resolveDateRange(query: TransactionRangeQuery, now: Date = new Date()): DateRangeParams {
  return {
    startDate: query.start ?? startOfMonth(now),
    endDate: query.end ?? startOfDay(now),
  };
}

export function formatApiDate(date: Date): string {
  return format(date, API_DATE_FORMAT);
}

export function serializeRange(range: DateRangeParams): { start: string; end: string } {
  return { start: formatApiDate(range.startDate), end: formatApiDate(range.endDate) };
}
