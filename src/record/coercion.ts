import { z } from 'zod';

import type { IssueReportingCoercers } from '../architecture';

/**
 * Outcome of coercing one field value.
 *
 * Same shape as a Standard Schema result: either the coerced `value` or an
 * `issue` message. Coercers never throw (see {@link IssueReportingCoercers});
 * the record schema turns an issue into a validation issue at the field's
 * path.
 */
export type Coercion<T> = { value: T } | { issue: string };

export type Coercer<T> = (value: unknown) => Coercion<T>;

export function accept<T>(value: T): Coercion<T> {
  return { value };
}

export function reject(issue: string): Coercion<never> {
  return { issue };
}

/**
 * Wraps a coercer as a zod field schema.
 */
export function fieldSchema<T>(coerce: Coercer<T>) {
  return z.unknown().transform((input, ctx): T => {
    const result = coerce(input);
    if ('issue' in result) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.issue });
      return z.NEVER;
    }
    return result.value;
  });
}

/**
 * Rejects an absent value before `coerce` sees it.
 */
export function required<T>(coerce: Coercer<T>): Coercer<T> {
  return value => (value === undefined ? reject('Required') : coerce(value));
}
