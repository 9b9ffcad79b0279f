/**
 * Calendar date parsing.
 * Pure functions: no DB, no IO.
 *
 * Strings are tried as ISO-8601 (extended or basic) first, then against an
 * ordered list of common formats (first strict match wins), then as Unix epoch seconds.
 */
import dayjs, { type Dayjs } from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import utc from 'dayjs/plugin/utc.js';
import { InvalidTypeError, ParseError, describeType } from './errors.js';

dayjs.extend(customParseFormat);
dayjs.extend(utc);

/** A day on the calendar, without time of day */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;      // 1-12
  readonly day: number;        // 1-31
}

export type DateInput = string | Date | CalendarDate;

/**
 * Tried in order after ISO. DD/MM/YYYY comes before MM/DD/YYYY, so
 * "03/04/2023" is the 3rd of April.
 */
export const DEFAULT_DATE_FORMATS: readonly string[] = Object.freeze([
  'YYYY-MM-DD',
  'DD-MM-YYYY',
  'DD/MM/YYYY',
  'MM/DD/YYYY',
  'YYYY/MM/DD',
  'DD MMM YYYY',      // 01 Jan 2022
  'DD MMMM YYYY',     // 01 January 2022
  'MMM DD, YYYY',     // Jan 01, 2022
  'MMMM DD, YYYY',    // January 01, 2022
]);

// YYYY-MM-DD, optionally with a time and a zone offset; the date is taken as written
const ISO_DATE_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

// YYYYMMDD, the ISO basic form
const ISO_BASIC_RE = /^(\d{4})(\d{2})(\d{2})$/;

const DIGITS_RE = /^\d+$/;

const WORD_RE = /[A-Za-z]+/g;

const MIN_YEAR = 1;
const MAX_YEAR = 9999;

function utcMidnight(year: number, month: number, day: number): Date {
  // setUTCFullYear keeps years below 100 as written
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  return d;
}

/**
 * Build a validated calendar date.
 * @throws ParseError for impossible dates (month 13, Feb 30, year 0)
 */
export function calendarDate(year: number, month: number, day: number): CalendarDate {
  if (![year, month, day].every(Number.isInteger)) {
    throw new ParseError(`date parts must be integers: ${year}-${month}-${day}`);
  }
  if (year < MIN_YEAR || year > MAX_YEAR) {
    throw new ParseError(`year ${year} is out of range`);
  }
  if (month < 1 || month > 12) {
    throw new ParseError(`month must be in 1..12, got ${month}`);
  }
  const probe = utcMidnight(year, month, day);
  if (day < 1 || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    throw new ParseError(`day is out of range for ${year}-${pad2(month)}: ${day}`);
  }
  return Object.freeze({ year, month, day });
}

export function isCalendarDate(value: unknown): value is CalendarDate {
  if (typeof value !== 'object' || value === null) return false;
  return 'year' in value && typeof value.year === 'number'
    && 'month' in value && typeof value.month === 'number'
    && 'day' in value && typeof value.day === 'number';
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** YYYY-MM-DD */
export function toIsoDate(date: CalendarDate): string {
  return `${String(date.year).padStart(4, '0')}-${pad2(date.month)}-${pad2(date.day)}`;
}

/** Strict YYYY-MM-DD only, used for values read back from storage */
export function fromIsoDate(value: string): CalendarDate {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!m) throw new ParseError(`not an ISO date: '${value}'`, value);
  return calendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

export function toDayjs(date: CalendarDate): Dayjs {
  return dayjs.utc(utcMidnight(date.year, date.month, date.day));
}

export function fromDayjs(d: Dayjs): CalendarDate {
  if (!d.isValid()) throw new ParseError('invalid date');
  return calendarDate(d.year(), d.month() + 1, d.date());
}

/** Local calendar day of a Date; the time of day is dropped */
export function calendarDateFromDate(value: Date): CalendarDate {
  if (Number.isNaN(value.getTime())) {
    throw new ParseError('invalid Date', value);
  }
  return calendarDate(value.getFullYear(), value.getMonth() + 1, value.getDate());
}

export function today(now: Date = new Date()): CalendarDate {
  return calendarDateFromDate(now);
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function isSameDate(a: CalendarDate, b: CalendarDate): boolean {
  return compareDates(a, b) === 0;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromDayjs(toDayjs(date).add(days, 'day'));
}

function parseIso(s: string): CalendarDate | null {
  const m = ISO_DATE_RE.exec(s) ?? ISO_BASIC_RE.exec(s);
  if (!m) return null;
  try {
    return calendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
  } catch {
    return null;
  }
}

/**
 * "DD/MM/YYYY" -> ["DD/MM/YYYY", "D/MM/YYYY", "DD/M/YYYY", "D/M/YYYY"]
 * so that strict matching still takes "1/2/2023".
 */
export function paddingVariants(format: string): string[] {
  const dayLoose = format.replace(/(?<!D)DD(?!D)/, 'D');
  const monthLoose = format.replace(/(?<!M)MM(?!M)/, 'M');
  const bothLoose = dayLoose.replace(/(?<!M)MM(?!M)/, 'M');
  return [...new Set([format, dayLoose, monthLoose, bothLoose])];
}

/** "feb" / "FEB" -> "Feb": dayjs matches month names case-sensitively */
function titleCaseWords(s: string): string {
  return s.replace(WORD_RE, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function parseWithFormat(s: string, format: string): CalendarDate | null {
  const input = format.includes('MMM') ? titleCaseWords(s) : s;
  for (const variant of paddingVariants(format)) {
    const d = dayjs.utc(input, variant, true);
    if (d.isValid()) {
      try {
        return fromDayjs(d);
      } catch {
        return null;
      }
    }
  }
  return null;
}

function parseEpochSeconds(s: string): CalendarDate | null {
  const seconds = Number(s);
  if (!Number.isSafeInteger(seconds)) return null;
  const d = dayjs.unix(seconds).utc();
  if (!d.isValid()) return null;
  try {
    return fromDayjs(d);
  } catch {
    return null;
  }
}

/**
 * Parse a value into a calendar date.
 *
 * Dates and CalendarDates are truncated to the day. Strings are tried as
 * ISO-8601 (YYYY-MM-DD or YYYYMMDD), then against `formats` (dayjs tokens, default
 * DEFAULT_DATE_FORMATS) in order, then as epoch seconds when all digits.
 *
 * @throws ParseError when no interpretation succeeds
 * @throws InvalidTypeError for anything but a string, Date or CalendarDate
 */
export function parseDate(value: unknown, formats?: readonly string[]): CalendarDate {
  if (value === null || value === undefined) {
    throw new ParseError('date value is missing', value);
  }
  if (value instanceof Date) return calendarDateFromDate(value);
  if (isCalendarDate(value)) return calendarDate(value.year, value.month, value.day);
  if (typeof value !== 'string') {
    throw new InvalidTypeError(`parseDate expects a string, Date or CalendarDate, got ${describeType(value)}`);
  }

  const s = value.trim();
  if (s === '') {
    throw new ParseError('empty date string', value);
  }

  const iso = parseIso(s);
  if (iso) return iso;

  const candidates = formats && formats.length > 0 ? formats : DEFAULT_DATE_FORMATS;
  for (const format of candidates) {
    const parsed = parseWithFormat(s, format);
    if (parsed) return parsed;
  }

  if (DIGITS_RE.test(s)) {
    const parsed = parseEpochSeconds(s);
    if (parsed) return parsed;
  }

  throw new ParseError(`unrecognized date format: '${value}'`, value);
}

/** Like parseDate, but blank, missing or invalid input becomes today */
export function parseDateOrToday(value: unknown, now: Date = new Date()): CalendarDate {
  if (value === null || value === undefined) return today(now);
  if (typeof value === 'string' && value.trim() === '') return today(now);
  try {
    return parseDate(value);
  } catch (error) {
    if (error instanceof ParseError || error instanceof InvalidTypeError) {
      return today(now);
    }
    throw error;
  }
}
