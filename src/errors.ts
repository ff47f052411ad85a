import type { StandardSchemaV1 } from '@standard-schema/spec';

/**
 * The single error kind surfaced by this package.
 *
 * Raised eagerly at construction time for every classification or
 * validation failure (unknown kind tags, empty time columns, invalid batch
 * sizes, broken cross-field invariants, malformed kind clauses). No variant
 * can exist in an invalid state, so callers only ever see either a fully
 * valid object or this error.
 *
 * When the failure was reported by a record schema, `issues` carries the
 * complete issue list of the Standard Schema result; the message describes
 * the first one.
 */
export class ConfigurationError extends Error {
  readonly issues: readonly StandardSchemaV1.Issue[];

  constructor(
    message: string,
    options: { issues?: readonly StandardSchemaV1.Issue[]; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ConfigurationError';
    this.issues = options.issues ?? [];
  }
}
