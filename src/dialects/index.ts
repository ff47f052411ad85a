import timeMappings from './time-mappings.json';

import type { CanonicalTimeFormats } from '../architecture';

import { ConfigurationError } from '../errors';
import { isRecord } from '../guards';
import { isString } from '../utils/type-guards';
import { type TimeMapping, formatTime, invertTimeMapping } from './time-format';

export { formatTime, invertTimeMapping } from './time-format';
export type { TimeMapping } from './time-format';

/**
 * Time-format conventions of a SQL dialect.
 *
 * Formats are stored canonically (`strftime` notation, e.g.
 * `%Y-%m-%d`). A dialect describes how to move between its own notation and
 * the canonical one:
 * - `timeMapping`: dialect token -> canonical token (used when reading).
 * - `inverseTimeMapping`: canonical token -> dialect token (used when rendering).
 *
 * See {@link CanonicalTimeFormats}.
 */
export type Dialect = {
  readonly name: string;
  readonly timeMapping: TimeMapping;
  readonly inverseTimeMapping: TimeMapping;
};

/**
 * The canonical dialect (`''`): formats are already in strftime notation and
 * pass through unchanged.
 */
export const CANONICAL_DIALECT: Dialect = Object.freeze({
  name: '',
  timeMapping: Object.freeze({}),
  inverseTimeMapping: Object.freeze({})
});

function toTimeMapping(value: unknown, dialectName: string): TimeMapping {
  if (!isRecord(value)) {
    throw new ConfigurationError(
      `Time mapping for dialect '${dialectName}' must be an object.`
    );
  }

  const mapping: Record<string, string> = {};
  for (const [key, token] of Object.entries(value)) {
    if (!isString(token)) {
      throw new ConfigurationError(
        `Time mapping for dialect '${dialectName}' has a non-string value for '${key}'.`
      );
    }
    mapping[key] = token;
  }
  return Object.freeze(mapping);
}

function loadDialects(): ReadonlyMap<string, Dialect> {
  const dialects = new Map<string, Dialect>([['', CANONICAL_DIALECT]]);

  for (const [name, table] of Object.entries(timeMappings.dialects)) {
    const timeMapping = toTimeMapping(table, name);
    dialects.set(
      name,
      Object.freeze({
        name,
        timeMapping,
        inverseTimeMapping: Object.freeze(invertTimeMapping(timeMapping))
      })
    );
  }

  for (const [alias, target] of Object.entries(timeMappings.aliases)) {
    const dialect = dialects.get(target);
    if (dialect) dialects.set(alias, dialect);
  }

  return dialects;
}

const DIALECTS = loadDialects();

/**
 * Names accepted by {@link getDialect}, aliases included.
 */
export function dialectNames(): string[] {
  return [...DIALECTS.keys()].filter(name => name !== '');
}

/**
 * Resolves a dialect by name (case-insensitive).
 *
 * @param name
 *   Dialect name or alias. `''` and `undefined` select {@link CANONICAL_DIALECT}.
 * @throws {ConfigurationError} When the dialect is unknown.
 */
export function getDialect(name: string | undefined = ''): Dialect {
  const dialect = DIALECTS.get(name.toLowerCase());
  if (!dialect) {
    throw new ConfigurationError(`Unknown dialect '${name}'`);
  }
  return dialect;
}

/**
 * Converts a format written in `dialect`'s notation to canonical notation.
 */
export function toCanonicalTimeFormat(format: string, dialect?: string): string {
  return formatTime(format, getDialect(dialect).timeMapping);
}

/**
 * Converts a canonical format to `dialect`'s notation.
 */
export function toDialectTimeFormat(format: string, dialect?: string): string {
  return formatTime(format, getDialect(dialect).inverseTimeMapping);
}
