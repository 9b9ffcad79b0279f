/**
 * Month tokens ("YYYY-MM") and the calendar ranges they cover.
 * Pure functions: no DB, no IO.
 */
import { calendarDate, fromDayjs, toDayjs, today, toIsoDate, type CalendarDate } from './date.js';
import { InvalidTypeError, ParseError, describeType } from './errors.js';

/** YYYY-MM string */
export type Month = string;

/** First and last (inclusive) day of a month */
export interface MonthRange {
  start: CalendarDate;
  end: CalendarDate;
}

const INTEGER_RE = /^[+-]?\d+$/;

function parseIntegerPart(part: string, label: string, token: string): number {
  const trimmed = part.trim();
  if (!INTEGER_RE.test(trimmed)) {
    throw new ParseError(`${label} is not a number in month '${token}'`, token);
  }
  return Number(trimmed);
}

/**
 * Given 'YYYY-MM' or 'YYYY/MM', return the first and last day of that month.
 *
 *   monthRange('2024-02') -> { start: 2024-02-01, end: 2024-02-29 }
 *
 * @throws InvalidTypeError when the token is not a string
 * @throws ParseError for malformed tokens and impossible months ('2023-13')
 */
export function monthRange(token: unknown): MonthRange {
  if (typeof token !== 'string') {
    throw new InvalidTypeError(`month must be a string in 'YYYY-MM' format, got ${describeType(token)}`);
  }

  const parts = token.trim().replace(/\//g, '-').split('-');
  if (parts.length < 2) {
    throw new ParseError(`month must be 'YYYY-MM', got '${token}'`, token);
  }

  const year = parseIntegerPart(parts[0], 'year', token);
  const month = parseIntegerPart(parts[1], 'month', token);

  const start = calendarDate(year, month, 1);
  // Day before the first of next month; dayjs rolls December into January
  const end = fromDayjs(toDayjs(start).add(1, 'month').subtract(1, 'day'));
  return { start, end };
}

/** Canonical 'YYYY-MM' form of a token, validated */
export function normalizeMonth(token: unknown): Month {
  return monthOf(monthRange(token).start);
}

export function monthOf(date: CalendarDate): Month {
  return toIsoDate(date).slice(0, 7);
}

/** Get current month as YYYY-MM */
export function currentMonth(now: Date = new Date()): Month {
  return monthOf(today(now));
}

/**
 * Get the last N months (including the reference month) as YYYY-MM labels.
 */
export function lastNMonths(count: number, from: Date = new Date()): Month[] {
  if (count <= 0) return [];

  const anchor = toDayjs(calendarDate(from.getFullYear(), from.getMonth() + 1, 1));
  return Array.from({ length: count }, (_, index) =>
    monthOf(fromDayjs(anchor.subtract(count - 1 - index, 'month'))),
  );
}
