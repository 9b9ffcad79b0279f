import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';
import {
  MAX_AMOUNT,
  amountToString,
  classifyAmount,
  formatAmount,
  fromCents,
  normalizeNumericString,
  parseAmount,
  parseAmountOrZero,
  toCents,
} from '../domain/amount.js';
import { InvalidTypeError, ParseError } from '../domain/errors.js';

function parsed(value: unknown): string {
  return amountToString(parseAmount(value));
}

describe('classifyAmount', () => {
  it('tags each accepted input kind', () => {
    expect(classifyAmount('12').kind).toBe('text');
    expect(classifyAmount(12).kind).toBe('integer');
    expect(classifyAmount(12n).kind).toBe('integer');
    expect(classifyAmount(12.5).kind).toBe('float');
    expect(classifyAmount(new Decimal('12.5')).kind).toBe('decimal');
  });

  it('rejects other types', () => {
    expect(() => classifyAmount([1])).toThrow(InvalidTypeError);
    expect(() => classifyAmount({ amount: 1 })).toThrow(InvalidTypeError);
    expect(() => classifyAmount(true)).toThrow(InvalidTypeError);
  });
});

describe('parseAmount: numeric input', () => {
  it('quantizes decimals half-up to the cent', () => {
    expect(parsed(new Decimal('1234.565'))).toBe('1234.57');
    expect(parsed(new Decimal('1234.564'))).toBe('1234.56');
    expect(parsed(new Decimal('-0.005'))).toBe('-0.01');
  });

  it('pads integers to two decimals', () => {
    expect(parsed(10)).toBe('10.00');
    expect(parsed(-3)).toBe('-3.00');
    expect(parsed(12345678901234567890n)).toBe('12345678901234567890.00');
  });

  it('reads floats through their decimal string', () => {
    expect(parsed(19.999999999999996)).toBe('20.00');
    expect(parsed(0.1 + 0.2)).toBe('0.30');
    // 2.675 is stored as 2.67499999... in binary
    expect(parsed(2.675)).toBe('2.68');
  });

  it('rejects non-finite numbers', () => {
    expect(() => parseAmount(Number.NaN)).toThrow(ParseError);
    expect(() => parseAmount(Number.POSITIVE_INFINITY)).toThrow(ParseError);
    expect(() => parseAmount(new Decimal(Number.NaN))).toThrow(ParseError);
  });

  it('never returns negative zero', () => {
    expect(parsed(new Decimal('-0.001'))).toBe('0.00');
    expect(parsed('-0')).toBe('0.00');
  });
});

describe('parseAmount: text input', () => {
  it('strips currency symbols and thousands separators', () => {
    expect(parsed('$1,234.56')).toBe('1234.56');
    expect(parseAmount('$1,234.56').equals(parseAmount('1234.56'))).toBe(true);
    expect(parsed('USD 99.999')).toBe('100.00');
    expect(parsed('  1000 ')).toBe('1000.00');
  });

  it('reads European notation by separator position', () => {
    expect(parsed('1.234,56')).toBe('1234.56');
    expect(parsed('€1.234.567,8')).toBe('1234567.80');
    expect(parsed('1,234,567.89')).toBe('1234567.89');
  });

  it('treats a lone comma as a thousands separator', () => {
    expect(parsed('1,234')).toBe('1234.00');
    expect(parsed('12,5')).toBe('125.00');
  });

  it('reads parentheses as a negative amount', () => {
    expect(parsed('(1,234.56)')).toBe('-1234.56');
    expect(parsed('(-5)')).toBe('-5.00');
    expect(parsed('-1234.5')).toBe('-1234.50');
  });

  it('accepts a bare trailing or leading decimal point', () => {
    expect(parsed('5.')).toBe('5.00');
    expect(parsed('.5')).toBe('0.50');
  });

  it('fails on strings without a number', () => {
    for (const input of ['', '   ', '.', '-', 'abc', '$', '()']) {
      expect(() => parseAmount(input), input).toThrow(ParseError);
    }
  });

  it('fails on malformed numbers', () => {
    expect(() => parseAmount('1.2.3')).toThrow(ParseError);
    expect(() => parseAmount('(5')).toThrow(ParseError);
    expect(() => parseAmount('5-')).toThrow(ParseError);
    expect(() => parseAmount('--5')).toThrow(ParseError);
  });

  it('names the original input in the error', () => {
    expect(() => parseAmount('1.2.3')).toThrow("could not convert '1.2.3' to a decimal");
  });

  it('fails on missing values', () => {
    expect(() => parseAmount(null)).toThrow(ParseError);
    expect(() => parseAmount(undefined)).toThrow('amount is missing');
  });
});

describe('normalizeNumericString', () => {
  it('returns a plain decimal literal', () => {
    expect(normalizeNumericString('$1,234.56')).toBe('1234.56');
    expect(normalizeNumericString('(1.234,56)')).toBe('-1234.56');
  });
});

describe('parseAmountOrZero', () => {
  it('falls back to 0.00', () => {
    for (const input of ['', '.', '-', '  ', 'abc', null, undefined, [], {}]) {
      expect(amountToString(parseAmountOrZero(input))).toBe('0.00');
    }
  });

  it('parses valid input normally', () => {
    expect(amountToString(parseAmountOrZero('12.5'))).toBe('12.50');
    expect(amountToString(parseAmountOrZero('(7)'))).toBe('-7.00');
  });
});

describe('formatAmount', () => {
  it('groups thousands and pads to two decimals', () => {
    expect(formatAmount(new Decimal('1234.5'), '$')).toBe('$1,234.50');
    expect(formatAmount(1234567.891)).toBe('1,234,567.89');
    expect(formatAmount(0)).toBe('0.00');
    expect(formatAmount(999.995)).toBe('1,000.00');
    expect(formatAmount(5n, '$')).toBe('$5.00');
  });

  it('puts the sign before the currency prefix', () => {
    expect(formatAmount(-1234567.891, '€', '.')).toBe('-€1.234.567.89');
    expect(formatAmount(new Decimal('-0.5'), '$')).toBe('-$0.50');
  });

  it('does not render -0.00', () => {
    expect(formatAmount(-0.001)).toBe('0.00');
  });

  it('rejects non-finite numbers', () => {
    expect(() => formatAmount(Number.NaN)).toThrow(InvalidTypeError);
    expect(() => formatAmount(new Decimal(Number.POSITIVE_INFINITY))).toThrow(InvalidTypeError);
  });

  it('parses back to the same amount', () => {
    for (const value of ['0.00', '0.01', '-0.99', '1234.56', '-1234567.89', '1000000.00']) {
      const d = new Decimal(value);
      expect(parseAmount(formatAmount(d)).equals(d), value).toBe(true);
    }
  });
});

describe('cents conversion', () => {
  it('stores amounts as integer cents', () => {
    expect(toCents(parseAmount('12.34'))).toBe(1234);
    expect(toCents(parseAmount('-0.05'))).toBe(-5);
    expect(amountToString(fromCents(1234))).toBe('12.34');
    expect(amountToString(fromCents(7))).toBe('0.07');
  });

  it('holds the largest record amount exactly', () => {
    expect(toCents(MAX_AMOUNT)).toBe(999999999999);
  });

  it('refuses amounts beyond safe integer cents', () => {
    expect(() => toCents(parseAmount('90071992547409.93'))).toThrow(ParseError);
    expect(() => toCents(parseAmount('-90071992547409.93'))).toThrow('amount too large to store: -90071992547409.93');
  });
});
