/**
 * A value the extractor could decode.
 *
 * `value` may legitimately be `undefined` (the `undefined` identifier); that
 * is distinct from a failed resolution.
 */
export type StaticSuccess<T> = {
  success: true;
  value: T;
};

/**
 * A subtree that depends on runtime state (identifiers, calls, spreads) or
 * uses syntax the extractor does not decode. Carries no value.
 */
export type StaticFailure = {
  success: false;
};

/**
 * Outcome of a static resolution attempt; branch on `success`.
 */
export type StaticResult<T = unknown> = StaticSuccess<T> | StaticFailure;

/**
 * Shared failure result.
 */
export const UNRESOLVED: StaticFailure = { success: false } as const;

export function resolved<T>(value: T): StaticSuccess<T> {
  return { success: true, value };
}
