import { format, startOfMonth as monthStart, subDays } from 'date-fns';

/**
 * Format a date as `YYYY-MM-DD` in local time, the form YNAB expects for
 * transaction dates and `since_date` filters.
 */
export function toIsoDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function startOfMonth(now: Date = new Date()): string {
  return toIsoDate(monthStart(now));
}

export function daysAgo(days: number, now: Date = new Date()): string {
  return toIsoDate(subDays(now, days));
}
