/** Error types raised by the normalization helpers. */

/** Input type is accepted but its content cannot be interpreted. */
export class ParseError extends Error {
  readonly input: unknown;

  constructor(message: string, input?: unknown) {
    super(message);
    this.name = 'ParseError';
    this.input = input;
  }
}

/** Input is of a type the function does not accept at all. */
export class InvalidTypeError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTypeError';
  }
}

/** Short human-readable name for a value's runtime type */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'Date';
  return typeof value;
}
