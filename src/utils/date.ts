import * as chrono from 'chrono-node';
import {
  addDays,
  endOfDay,
  endOfISOWeek,
  endOfMonth,
  format,
  getISODay,
  getISOWeek,
  getISOWeekYear,
  startOfDay,
  startOfISOWeek,
  startOfMonth,
  subDays,
} from 'date-fns';
import { DateRange } from '../types/session';
import { ParseError, ValidationError } from '../types/errors';

export type DateRangePreset =
  | 'today'
  | 'yesterday'
  | 'last_7_days'
  | 'last_30_days'
  | 'this_week'
  | 'this_month';

export const DATE_RANGE_PRESETS: readonly DateRangePreset[] = [
  'today',
  'yesterday',
  'last_7_days',
  'last_30_days',
  'this_week',
  'this_month',
];

/**
 * Get the date key for grouping by day
 */
export function getDateKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Get the ISO week key for grouping by week, e.g. "2024-W03"
 */
export function getWeekKey(date: Date): string {
  return `${getISOWeekYear(date)}-W${String(getISOWeek(date)).padStart(2, '0')}`;
}

/**
 * Monday = 0 ... Sunday = 6
 */
export function getWeekdayIndex(date: Date): number {
  return getISODay(date) - 1;
}

export function isWithinRange(date: Date, range: DateRange): boolean {
  const time = date.getTime();
  return time >= range.start.getTime() && time < range.end.getTime();
}

/**
 * Throw if a range is empty or inverted
 */
export function assertValidRange(range: DateRange): void {
  if (Number.isNaN(range.start.getTime()) || Number.isNaN(range.end.getTime())) {
    throw new ValidationError('Date range contains an invalid date', 'dateRange');
  }
  if (range.start.getTime() >= range.end.getTime()) {
    throw new ValidationError(
      `Date range start (${range.start.toISOString()}) must be before end (${range.end.toISOString()})`,
      'dateRange'
    );
  }
}

/**
 * Whole days ending today: [start of (today - days), end of today)
 */
export function lastNDays(days: number, referenceDate: Date = new Date()): DateRange {
  return {
    start: startOfDay(subDays(referenceDate, days)),
    end: addDays(startOfDay(referenceDate), 1),
  };
}

/**
 * Resolve a named range relative to a reference date
 */
export function resolvePreset(preset: DateRangePreset, referenceDate: Date = new Date()): DateRange {
  const today = startOfDay(referenceDate);

  switch (preset) {
    case 'today':
      return { start: today, end: addDays(today, 1) };
    case 'yesterday':
      return { start: subDays(today, 1), end: today };
    case 'last_7_days':
      return lastNDays(7, referenceDate);
    case 'last_30_days':
      return lastNDays(30, referenceDate);
    case 'this_week':
      return { start: startOfISOWeek(referenceDate), end: addDays(startOfDay(endOfISOWeek(referenceDate)), 1) };
    case 'this_month':
      return { start: startOfMonth(referenceDate), end: addDays(startOfDay(endOfMonth(referenceDate)), 1) };
  }
}

export function isDateRangePreset(value: string): value is DateRangePreset {
  return (DATE_RANGE_PRESETS as readonly string[]).includes(value);
}

/**
 * Format a date range for display
 * The end is exclusive, so the label shows the last included day.
 */
export function formatDateRange(range: DateRange): string {
  const lastIncluded = new Date(range.end.getTime() - 1);
  return `${format(range.start, 'MMM d')} - ${format(lastIncluded, 'MMM d, yyyy')}`;
}

/**
 * Parse a date given on the command line:
 * - ISO dates: "2024-01-15"
 * - Natural language: "yesterday", "last monday", "2 weeks ago"
 */
export function parseFuzzyDate(input: string, referenceDate: Date = new Date()): Date {
  const trimmed = input.trim();

  if (/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) {
    const [year, month, day] = trimmed.split('-').map((part) => parseInt(part, 10));
    return new Date(year, month - 1, day);
  }

  const parsed = chrono.parseDate(trimmed, referenceDate, { forwardDate: false });
  if (!parsed) {
    throw new ParseError('Unable to parse date', input);
  }

  return startOfDay(parsed);
}

/**
 * End of the day a date falls on, as an exclusive bound
 */
export function exclusiveEndOfDay(date: Date): Date {
  return new Date(endOfDay(date).getTime() + 1);
}
