import { describe, expect, it } from 'vitest';
import { toIsoDate } from '../domain/date.js';
import { InvalidTypeError, ParseError } from '../domain/errors.js';
import { currentMonth, lastNMonths, monthOf, monthRange, normalizeMonth } from '../domain/month.js';

function range(token: unknown): [string, string] {
  const { start, end } = monthRange(token);
  return [toIsoDate(start), toIsoDate(end)];
}

describe('monthRange', () => {
  it('handles leap and common Februaries', () => {
    expect(range('2024-02')).toEqual(['2024-02-01', '2024-02-29']);
    expect(range('2023-02')).toEqual(['2023-02-01', '2023-02-28']);
    expect(range('1900-02')).toEqual(['1900-02-01', '1900-02-28']);
    expect(range('2000-02')).toEqual(['2000-02-01', '2000-02-29']);
  });

  it('stays inside December', () => {
    expect(range('2023-12')).toEqual(['2023-12-01', '2023-12-31']);
  });

  it('covers 30- and 31-day months', () => {
    expect(range('2023-04')).toEqual(['2023-04-01', '2023-04-30']);
    expect(range('2023-01')).toEqual(['2023-01-01', '2023-01-31']);
  });

  it('accepts slashes, unpadded months and surrounding spaces', () => {
    expect(range('2023/04')).toEqual(['2023-04-01', '2023-04-30']);
    expect(range(' 2023-1 ')).toEqual(['2023-01-01', '2023-01-31']);
  });

  it('ignores a trailing day', () => {
    expect(range('2023-02-15')).toEqual(['2023-02-01', '2023-02-28']);
  });

  it('rejects impossible months instead of wrapping', () => {
    expect(() => monthRange('2023-13')).toThrow(ParseError);
    expect(() => monthRange('2023-00')).toThrow(ParseError);
  });

  it('rejects malformed tokens', () => {
    expect(() => monthRange('2023')).toThrow(ParseError);
    expect(() => monthRange('')).toThrow(ParseError);
    expect(() => monthRange('2023-')).toThrow(ParseError);
    expect(() => monthRange('abcd-ef')).toThrow(ParseError);
    expect(() => monthRange('2023-1.5')).toThrow(ParseError);
  });

  it('rejects non-string tokens', () => {
    expect(() => monthRange(202302)).toThrow(InvalidTypeError);
    expect(() => monthRange(null)).toThrow(InvalidTypeError);
  });
});

describe('month helpers', () => {
  it('normalizeMonth: canonical YYYY-MM', () => {
    expect(normalizeMonth('2023/4')).toBe('2023-04');
    expect(normalizeMonth('2023-12-25')).toBe('2023-12');
    expect(() => normalizeMonth('2023-13')).toThrow(ParseError);
  });

  it('monthOf: month of a day', () => {
    expect(monthOf({ year: 2024, month: 7, day: 31 })).toBe('2024-07');
  });

  it('currentMonth: formats correctly', () => {
    expect(currentMonth(new Date(2025, 0, 15))).toBe('2025-01');
    expect(currentMonth(new Date(2025, 11, 1))).toBe('2025-12');
  });

  it('lastNMonths: crosses year boundaries', () => {
    expect(lastNMonths(3, new Date(2025, 0, 31))).toEqual(['2024-11', '2024-12', '2025-01']);
    expect(lastNMonths(1, new Date(2025, 5, 1))).toEqual(['2025-06']);
    expect(lastNMonths(0)).toEqual([]);
  });
});
