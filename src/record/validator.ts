import type { StandardSchemaV1 } from '@standard-schema/spec';

import { ConfigurationError } from '../errors';

/**
 * Formats the path of a Standard Schema issue as a dotted string.
 *
 * Path segments are either plain keys or `{ key }` objects; both are
 * accepted by Standard Schema.
 */
function formatIssuePath(issue: StandardSchemaV1.Issue): string {
  if (!issue.path || issue.path.length === 0) return '';

  return issue.path
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}

/**
 * Validates and transforms input using a Standard Schema V1 compliant validator.
 *
 * The record schemas of this package are written with zod, but they are
 * only ever consumed through the `~standard` property, so any compliant
 * library (Valibot, ArkType, ...) can define a record.
 *
 * Schema Object Layout:
 * ```ts
 * const schema = {
 *   // 1. Universal Adapter (Result Pattern):
 *   //    - Returns an object ({ value } or { issues }).
 *   //    - Does NOT throw for invalid input.
 *   "~standard": {
 *     validate: (input) => Result
 *   },
 *
 *   // 2. Library-Specific Internals (Ignored):
 *   parse,
 *   ...otherLibrarySpecificProps
 * };
 * ```
 *
 * Field coercers report through issues rather than throwing (see
 * `fieldSchema`), so every field failure arrives here as an issue.
 *
 * @param schema - The schema instance (must contain `~standard`).
 * @param input - The raw input (mapping, AST properties, ...).
 * @param recordName - The record name used in error messages.
 * @returns The validated (and transformed) output.
 *
 * @throws {ConfigurationError}
 * - If the schema object is invalid (missing `~standard`).
 * - If the validator returns a Promise (async validation is not supported).
 * - If validation fails (issues reported by the schema).
 */
export function validateWithSchema<Output>(
  schema: StandardSchemaV1<unknown, Output>,
  input: unknown,
  recordName: string
): Output {
  // Guards against plain objects being passed where a schema is expected.
  if (!('~standard' in schema)) {
    throw new ConfigurationError(
      `The schema for "${recordName}" is invalid. Expected an object with the "~standard" property (e.g. Zod, Valibot), but received a plain object.`
    );
  }

  const result = schema['~standard'].validate(input);

  // Construction is strictly synchronous.
  if (result instanceof Promise) {
    throw new ConfigurationError(
      `Async schema validation is not supported for "${recordName}".`
    );
  }

  if (result.issues) {
    const [firstIssue] = result.issues;
    const issuePath = firstIssue ? formatIssuePath(firstIssue) : '';
    const location = issuePath ? ` at "${issuePath}"` : '';

    throw new ConfigurationError(
      `Invalid ${recordName}${location}: ${firstIssue?.message ?? 'validation failed'}`,
      { issues: result.issues }
    );
  }

  return result.value;
}
