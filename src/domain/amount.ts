/**
 * Monetary amount parsing and formatting.
 * Pure functions: no DB, no IO.
 *
 * Amounts are exact decimals rounded half-up to the cent. Binary floats are
 * only ever read through their shortest decimal string.
 */
import { Decimal } from 'decimal.js';
import { InvalidTypeError, ParseError, describeType } from './errors.js';

export type Amount = Decimal;

/** Every accepted input shape, resolved once at the boundary */
export type AmountInput =
  | { kind: 'text'; value: string }
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'float'; value: number }
  | { kind: 'decimal'; value: Decimal };

const CENT_PLACES = 2;

// Anything that is not a digit, sign, separator or parenthesis
const NON_NUMERIC_RE = /[^\d\-.,()]+/g;

const GROUP_RE = /\B(?=(\d{3})+(?!\d))/g;

export const ZERO_AMOUNT: Amount = new Decimal(0).toDecimalPlaces(CENT_PLACES);

/** Largest amount a record may hold: twelve digits, two after the point */
export const MAX_AMOUNT: Amount = new Decimal('9999999999.99');

function quantize(value: Decimal): Amount {
  const rounded = value.toDecimalPlaces(CENT_PLACES, Decimal.ROUND_HALF_UP);
  // decimal.js keeps negative zero ("-0.00"); amounts never do
  return rounded.isZero() ? rounded.abs() : rounded;
}

/**
 * Resolve a raw value into one of the accepted amount inputs.
 * null/undefined are treated as missing content, not as a wrong type.
 */
export function classifyAmount(value: unknown): AmountInput {
  if (value === null || value === undefined) {
    throw new ParseError('amount is missing', value);
  }
  if (typeof value === 'string') return { kind: 'text', value };
  if (typeof value === 'bigint') return { kind: 'integer', value };
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'float', value };
  }
  if (Decimal.isDecimal(value)) return { kind: 'decimal', value };
  throw new InvalidTypeError(`unsupported amount type: ${describeType(value)}`);
}

/**
 * Turn a human-entered number into a literal `new Decimal()` accepts.
 *
 *   "$1,234.56"  -> "1234.56"
 *   "1.234,56"   -> "1234.56"
 *   "(1,234.56)" -> "-1234.56"
 *
 * Whichever of '.' and ',' appears first is the thousands separator.
 * A string with only commas is read as comma-grouped ("1,234" -> "1234").
 */
export function normalizeNumericString(raw: string): string {
  const original = raw.trim();
  if (original === '') {
    throw new ParseError('empty amount string', raw);
  }

  let cleaned = original.replace(NON_NUMERIC_RE, '');

  let negative = false;
  if (cleaned.includes('(') && cleaned.includes(')')) {
    negative = true;
    cleaned = cleaned.replace(/[()]/g, '');
  }

  if (cleaned === '') {
    throw new ParseError(`no numeric content in '${original}'`, raw);
  }

  const firstDot = cleaned.indexOf('.');
  const firstComma = cleaned.indexOf(',');
  if (firstDot !== -1 && firstComma !== -1) {
    cleaned = firstDot < firstComma
      ? cleaned.replace(/\./g, '').replace(/,/g, '.')
      : cleaned.replace(/,/g, '');
  } else if (firstComma !== -1) {
    cleaned = cleaned.replace(/,/g, '');
  }

  if (cleaned === '' || cleaned === '.' || cleaned === '-') {
    throw new ParseError(`cannot parse numeric value from '${original}'`, raw);
  }

  if (negative && !cleaned.startsWith('-')) {
    cleaned = `-${cleaned}`;
  }
  return cleaned;
}

function decimalFromLiteral(literal: string, original: unknown): Decimal {
  try {
    return new Decimal(literal);
  } catch {
    throw new ParseError(`could not convert '${String(original)}' to a decimal`, original);
  }
}

/**
 * Parse a user-provided amount into an exact decimal with two fractional
 * digits. Accepts strings, integers, floats, bigints and Decimals.
 *
 * @throws ParseError when the content is not a number
 * @throws InvalidTypeError when the value is not an accepted type
 */
export function parseAmount(value: unknown): Amount {
  const input = classifyAmount(value);
  switch (input.kind) {
    case 'decimal':
      if (!input.value.isFinite()) {
        throw new ParseError(`amount is not finite: ${input.value.toString()}`, value);
      }
      return quantize(input.value);
    case 'integer':
      return quantize(new Decimal(input.value.toString()));
    case 'float':
      if (!Number.isFinite(input.value)) {
        throw new ParseError(`invalid float amount: ${input.value}`, value);
      }
      return quantize(decimalFromLiteral(String(input.value), value));
    case 'text':
      return quantize(decimalFromLiteral(normalizeNumericString(input.value), value));
  }
}

/** Like parseAmount, but blank, missing or invalid input becomes 0.00 */
export function parseAmountOrZero(value: unknown): Amount {
  if (typeof value === 'string' && value.trim() === '') return ZERO_AMOUNT;
  try {
    return parseAmount(value);
  } catch (error) {
    if (error instanceof ParseError || error instanceof InvalidTypeError) {
      return ZERO_AMOUNT;
    }
    throw error;
  }
}

function coerceDecimal(amount: Decimal | number | bigint): Decimal {
  if (typeof amount === 'bigint') return new Decimal(amount.toString());
  if (typeof amount === 'number') {
    if (!Number.isFinite(amount)) {
      throw new InvalidTypeError('amount must be a finite number or Decimal');
    }
    return new Decimal(String(amount));
  }
  if (!amount.isFinite()) {
    throw new InvalidTypeError('amount must be a finite number or Decimal');
  }
  return amount;
}

/**
 * Format an amount for display: sign, currency prefix, grouped integer
 * part and exactly two decimals.
 *
 *   formatAmount(new Decimal('1234.5'), '$') -> '$1,234.50'
 *   formatAmount(-42, '€', '.')               -> '-€42.00'
 */
export function formatAmount(
  amount: Decimal | number | bigint,
  currency = '',
  thousandsSeparator = ',',
): string {
  const rounded = quantize(coerceDecimal(amount));
  const sign = rounded.isNegative() ? '-' : '';
  const [intPart, fracPart] = rounded.abs().toFixed(CENT_PLACES).split('.');
  const grouped = intPart.replace(GROUP_RE, thousandsSeparator);
  return `${sign}${currency}${grouped}.${fracPart}`;
}

/** Canonical two-decimal string, as stored and sent over the wire */
export function amountToString(amount: Amount): string {
  return quantize(amount).toFixed(CENT_PLACES);
}

/**
 * Exact integer cents for storage.
 * @throws ParseError when the cents do not fit a safe integer
 */
export function toCents(amount: Amount): number {
  const n = quantize(amount).times(100).toNumber();
  if (!Number.isSafeInteger(n)) {
    throw new ParseError(`amount too large to store: ${amountToString(amount)}`, amount);
  }
  return n;
}

export function fromCents(cents: number | bigint): Amount {
  return quantize(new Decimal(cents.toString()).dividedBy(100));
}
