export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  undefined: undefined;
};

/**
 * Creates a guard for a built-in primitive `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The primitive type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/**
 * Guard verifying the value is `null` or `undefined`.
 *
 * Optional configuration fields treat both the same way: an absent value.
 *
 * @param value
 *   Candidate runtime value to test.
 * @returns
 *   `true` iff {@link value} is `null` or `undefined`.
 */
export function isNil(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Guard verifying the value is a safe integer.
 *
 * Semantics:
 * - true  for:  0, 1, -1, 1000
 * - false for:  1.5, NaN, Infinity, numeric strings, bigint
 *
 * @param value
 *   Candidate runtime value to test.
 * @returns
 *   `true` iff {@link value} is a number holding a safe integer.
 */
export function isInteger(value: unknown): value is number {
  return isNumber(value) && Number.isSafeInteger(value);
}

/**
 * Pattern for the textual form of an integer (optional sign, decimal digits).
 *
 * Surrounding whitespace is tolerated by {@link parseIntegerText}, mirroring
 * what configuration files usually carry.
 */
const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Parses the textual form of an integer.
 *
 * @param text
 *   Candidate text, e.g. the token of a numeric literal.
 * @returns
 *   The parsed integer, or `null` when `text` is not an integer.
 */
export function parseIntegerText(text: string): number | null {
  const trimmed = text.trim();
  if (!INTEGER_TEXT.test(trimmed)) return null;

  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}
