// Value converters usable as `ParameterSpec.valueType`

const NUMERIC_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_LITERAL = /^[+-]?\d+$/;

/**
 * True for integer and floating point literals such as `-100`, `2.5`, `.5`
 * or `1e3`. Tokens like these are values, never flags.
 */
export function isNumericLiteral(token: string): boolean {
  return NUMERIC_LITERAL.test(token);
}

/** Parses a base-10 integer, rejecting fractions and trailing garbage. */
export function integer(raw: string): number {
  const trimmed = raw.trim();
  if (!INTEGER_LITERAL.test(trimmed)) {
    throw new Error(`"${raw}" is not an integer`);
  }
  const result = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(result)) {
    throw new Error(`"${raw}" is too large to be an integer`);
  }
  return result;
}

export function decimal(raw: string): number {
  const trimmed = raw.trim();
  if (!isNumericLiteral(trimmed)) {
    throw new Error(`"${raw}" is not a number`);
  }
  return Number(trimmed);
}

export function text(raw: string): string {
  return raw;
}
