/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is T[]`). Note: `T` is not validated at runtime.
 *
 * @typeParam T  Assumed element type (defaults to `unknown`).
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Many guards in this package start from `unknown` (classifier input, AST
 * nodes, extracted static values). This helper is the safe first step: it
 * checks that the value is a non-null object so properties can be read
 * without runtime errors and without type assertions.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either `Object.prototype` or `null`.
 *
 * This is how the classifier tells a configuration mapping apart from class
 * instances, arrays, and other host objects; AST nodes and constructed kinds
 * are plain too, so callers check those shapes first.
 *
 * @typeParam T
 *   The (assumed) type of the object's property values after a successful check.
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<string, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}
