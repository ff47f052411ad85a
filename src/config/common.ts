import { z } from 'zod';

import type { Coercer } from '../record/coercion';

import { ConfigurationError } from '../errors';
import { isPlainObject } from '../guards';
import { accept, fieldSchema, reject } from '../record/coercion';
import { isInteger, isString, parseIntegerText } from '../utils/type-guards';

const concurrentTasks: Coercer<number> = value => {
  const tasks = isString(value) ? parseIntegerText(value) : value;
  if (!isInteger(tasks) || tasks <= 0) {
    return reject(
      `The number of concurrent tasks must be an integer value greater than 0. '${String(tasks ?? value)}' was provided`
    );
  }
  return accept(tasks);
};

/**
 * Validates a concurrency setting (`concurrent_tasks`,
 * `ddl_concurrent_tasks`, `backfill_concurrent_tasks`).
 *
 * Integer text is parsed first, so `'4'` is accepted.
 *
 * @throws {ConfigurationError} Unless the value is an integer greater than 0.
 */
export function coerceConcurrentTasks(value: unknown): number {
  const result = concurrentTasks(value);
  if ('issue' in result) throw new ConfigurationError(result.issue);
  return result.value;
}

/**
 * Turns a header mapping into `[name, value]` pairs. Other values (already
 * paired headers, `undefined`) pass through.
 */
export function normalizeHttpHeaders(value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  return Object.entries(value);
}

export const concurrentTasksSchema = fieldSchema(concurrentTasks);

export const httpHeadersSchema = z.preprocess(
  normalizeHttpHeaders,
  z.array(z.tuple([z.string(), z.unknown()])).optional()
);
