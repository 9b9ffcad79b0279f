import { describe, expect, it } from 'vitest';
import {
  DEFAULT_DATE_FORMATS,
  addDays,
  calendarDate,
  compareDates,
  fromIsoDate,
  isSameDate,
  paddingVariants,
  parseDate,
  parseDateOrToday,
  toIsoDate,
} from '../domain/date.js';
import { InvalidTypeError, ParseError } from '../domain/errors.js';

function iso(value: unknown, formats?: readonly string[]): string {
  return toIsoDate(parseDate(value, formats));
}

describe('calendarDate', () => {
  it('builds valid dates', () => {
    expect(calendarDate(2024, 2, 29)).toEqual({ year: 2024, month: 2, day: 29 });
    expect(toIsoDate(calendarDate(5, 1, 9))).toBe('0005-01-09');
  });

  it('rejects impossible dates', () => {
    expect(() => calendarDate(2023, 2, 29)).toThrow(ParseError);
    expect(() => calendarDate(2023, 13, 1)).toThrow(ParseError);
    expect(() => calendarDate(2023, 4, 31)).toThrow(ParseError);
    expect(() => calendarDate(0, 1, 1)).toThrow(ParseError);
    expect(() => calendarDate(2023, 1, 1.5)).toThrow(ParseError);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(calendarDate(2023, 1, 1))).toBe(true);
  });
});

describe('parseDate: ISO', () => {
  it('reads YYYY-MM-DD', () => {
    expect(parseDate('2023-02-15')).toEqual({ year: 2023, month: 2, day: 15 });
  });

  it('drops the time of day as written', () => {
    expect(iso('2023-02-15T23:59:59Z')).toBe('2023-02-15');
    expect(iso('2023-02-15 08:30')).toBe('2023-02-15');
    expect(iso('2023-02-15T10:00:00.123+09:00')).toBe('2023-02-15');
  });

  it('reads the basic YYYYMMDD form', () => {
    expect(iso('20230215')).toBe('2023-02-15');
    expect(iso('00010101')).toBe('0001-01-01');
  });

  it('trims surrounding whitespace', () => {
    expect(iso('  2023-02-15\n')).toBe('2023-02-15');
  });
});

describe('parseDate: common formats', () => {
  it('keeps the documented order', () => {
    expect(DEFAULT_DATE_FORMATS.slice(0, 5)).toEqual([
      'YYYY-MM-DD',
      'DD-MM-YYYY',
      'DD/MM/YYYY',
      'MM/DD/YYYY',
      'YYYY/MM/DD',
    ]);
  });

  it('reads day-first before month-first', () => {
    expect(iso('15/02/2023')).toBe('2023-02-15');
    expect(iso('03/04/2023')).toBe('2023-04-03');
  });

  it('falls through to month-first when day-first is impossible', () => {
    expect(iso('02/15/2023')).toBe('2023-02-15');
  });

  it('reads dashed and year-first forms', () => {
    expect(iso('15-02-2023')).toBe('2023-02-15');
    expect(iso('2023/02/15')).toBe('2023-02-15');
  });

  it('reads month names', () => {
    expect(iso('01 Jan 2022')).toBe('2022-01-01');
    expect(iso('1 January 2022')).toBe('2022-01-01');
    expect(iso('Feb 1, 2023')).toBe('2023-02-01');
    expect(iso('February 01, 2023')).toBe('2023-02-01');
  });

  it('reads month names in any letter case', () => {
    expect(iso('15 feb 2023')).toBe('2023-02-15');
    expect(iso('15 FEB 2023')).toBe('2023-02-15');
    expect(iso('01 january 2022')).toBe('2022-01-01');
    expect(iso('01 JANUARY 2022')).toBe('2022-01-01');
    expect(iso('feb 1, 2023')).toBe('2023-02-01');
    expect(iso('FEB 1, 2023')).toBe('2023-02-01');
    expect(iso('february 01, 2023')).toBe('2023-02-01');
    expect(iso('FEBRUARY 01, 2023')).toBe('2023-02-01');
  });

  it('accepts unpadded day and month', () => {
    expect(iso('1/2/2023')).toBe('2023-02-01');
    expect(iso('5-11-2023')).toBe('2023-11-05');
  });

  it('uses caller formats instead of the defaults', () => {
    expect(iso('15.02.2023', ['DD.MM.YYYY'])).toBe('2023-02-15');
    expect(iso('03/04/2023', ['MM/DD/YYYY'])).toBe('2023-03-04');
    expect(() => parseDate('15/02/2023', ['MM/DD/YYYY'])).toThrow(ParseError);
  });

  it('rejects dates that do not exist', () => {
    expect(() => parseDate('31/02/2023')).toThrow(ParseError);
    expect(() => parseDate('2023-02-30')).toThrow(ParseError);
  });
});

describe('parseDate: epoch seconds', () => {
  it('reads an all-digit string as a UTC day', () => {
    expect(iso('1672531200')).toBe('2023-01-01');
    expect(iso('1672617599')).toBe('2023-01-01');
    expect(iso('0')).toBe('1970-01-01');
  });

  it('fails when the timestamp is out of range', () => {
    expect(() => parseDate('99999999999999999999')).toThrow(ParseError);
  });
});

describe('parseDate: other inputs', () => {
  it('truncates a Date to its local day', () => {
    expect(iso(new Date(2023, 1, 15, 23, 59, 59))).toBe('2023-02-15');
  });

  it('returns a calendar date as is', () => {
    expect(iso({ year: 2020, month: 12, day: 31 })).toBe('2020-12-31');
  });

  it('fails on blank, missing and invalid values', () => {
    expect(() => parseDate('')).toThrow(ParseError);
    expect(() => parseDate('   ')).toThrow(ParseError);
    expect(() => parseDate(null)).toThrow(ParseError);
    expect(() => parseDate(new Date('nope'))).toThrow(ParseError);
    expect(() => parseDate('not-a-date')).toThrow("unrecognized date format: 'not-a-date'");
  });

  it('rejects unsupported types', () => {
    expect(() => parseDate(1672531200)).toThrow(InvalidTypeError);
    expect(() => parseDate({})).toThrow(InvalidTypeError);
    expect(() => parseDate(['2023-02-15'])).toThrow(InvalidTypeError);
  });
});

describe('parseDateOrToday', () => {
  const now = new Date(2024, 5, 10, 9, 30);

  it('falls back to the current day', () => {
    for (const input of ['not-a-date', '', '   ', null, undefined, 42]) {
      expect(toIsoDate(parseDateOrToday(input, now))).toBe('2024-06-10');
    }
  });

  it('parses valid input normally', () => {
    expect(toIsoDate(parseDateOrToday('2023-02-15', now))).toBe('2023-02-15');
  });
});

describe('helpers', () => {
  it('paddingVariants: loosens day and month fields', () => {
    expect(paddingVariants('DD/MM/YYYY')).toEqual(['DD/MM/YYYY', 'D/MM/YYYY', 'DD/M/YYYY', 'D/M/YYYY']);
    expect(paddingVariants('MMM DD, YYYY')).toEqual(['MMM DD, YYYY', 'MMM D, YYYY']);
  });

  it('fromIsoDate: strict YYYY-MM-DD only', () => {
    expect(fromIsoDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
    expect(() => fromIsoDate('2024-2-29')).toThrow(ParseError);
  });

  it('compareDates, isSameDate and addDays', () => {
    const a = calendarDate(2023, 12, 31);
    const b = addDays(a, 1);
    expect(toIsoDate(b)).toBe('2024-01-01');
    expect(compareDates(a, b)).toBeLessThan(0);
    expect(compareDates(b, a)).toBeGreaterThan(0);
    expect(compareDates(a, calendarDate(2023, 12, 31))).toBe(0);
    expect(isSameDate(a, calendarDate(2023, 12, 31))).toBe(true);
    expect(isSameDate(a, b)).toBe(false);
  });
});
