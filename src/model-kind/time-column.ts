import type { Column, Property, Tuple } from '../expressions/types';
import type { DumpOptions } from '../record';

import { isPlainObject } from '../guards';
import { defineRecord } from '../record';
import { isExpression, nameOf } from '../expressions/guards';
import {
  property,
  stringLiteral,
  toColumn,
  tuple
} from '../expressions/builders';
import { toCanonicalTimeFormat, toDialectTimeFormat } from '../dialects';
import { isNil, isString } from '../utils/type-guards';
import { type Coercion, accept, fieldSchema, reject } from '../record/coercion';

/**
 * The column an incremental model is partitioned by, with the format of its
 * values when the column is textual.
 *
 * `format` is always stored in canonical strftime notation (`%Y-%m-%d`);
 * dialect notations are converted on the way in and out.
 */
export type TimeColumn = {
  readonly column: string;
  readonly format?: string;
};

export type TimeColumnOptions = {
  /**
   * Dialect the format is written in. Canonical notation when omitted.
   */
  dialect?: string;
};

const EMPTY_COLUMN = 'Time Column cannot be empty.';

function timeColumnOf(column: unknown, format: unknown): Coercion<TimeColumn> {
  if (isNil(column) || column === '') return reject(EMPTY_COLUMN);
  if (!isString(column)) return reject('Time Column must be a string');

  if (isNil(format) || format === '') return accept(Object.freeze({ column }));
  if (!isString(format)) return reject('Time Column format must be a string');

  return accept(Object.freeze({ column, format }));
}

/**
 * Normalizes every accepted time column shape.
 *
 * 1. Tuple node of one or two elements: `(column[, format])`, by name.
 * 2. Any other expression: its name is the column.
 * 3. String: the column.
 * 4. Mapping with `column` and optional `format` (including an existing
 *    {@link TimeColumn}).
 */
export function coerceTimeColumn(value: unknown): Coercion<TimeColumn> {
  if (isExpression(value)) {
    if (value.type !== 'Tuple') return timeColumnOf(nameOf(value), undefined);

    const [column, format, ...rest] = value.expressions;
    if (!column || rest.length > 0) {
      return reject('Time Column must be a column or a (column, format) pair');
    }
    return timeColumnOf(nameOf(column), format && nameOf(format));
  }

  if (isString(value)) return timeColumnOf(value, undefined);

  if (isPlainObject(value)) {
    const extra = Object.keys(value).filter(
      key => key !== 'column' && key !== 'format'
    );
    if (extra.length > 0) {
      return reject(`Unrecognized key(s) in Time Column: '${extra.join("', '")}'`);
    }
    return timeColumnOf(value.column, value.format);
  }

  return reject(EMPTY_COLUMN);
}

export function isTimeColumn(value: unknown): value is TimeColumn {
  return (
    isPlainObject(value) &&
    isString(value.column) &&
    (value.format === undefined || isString(value.format))
  );
}

export const TimeColumnRecord = defineRecord<TimeColumn>({
  name: 'TimeColumn',
  schema: fieldSchema(coerceTimeColumn),
  fields: {
    column: { required: true },
    format: { required: false }
  }
});

/**
 * Parses a time column from any accepted shape.
 *
 * @throws {ConfigurationError} When the column is empty or the shape is not
 *   accepted.
 *
 * @example
 * ```ts
 * parseTimeColumn(parseExpression("(ds, 'yyyy-MM-dd')"), { dialect: 'spark' });
 * // { column: 'ds', format: '%Y-%m-%d' }
 * ```
 */
export function parseTimeColumn(
  value: unknown,
  options: TimeColumnOptions = {}
): TimeColumn {
  const timeColumn = TimeColumnRecord.parse(value);
  return canonicalTimeColumn(timeColumn, options.dialect);
}

/**
 * Converts the format of an already parsed time column from `dialect`'s
 * notation to canonical notation.
 */
export function canonicalTimeColumn(
  timeColumn: TimeColumn,
  dialect: string | undefined
): TimeColumn {
  if (!dialect || timeColumn.format === undefined) return timeColumn;

  return TimeColumnRecord.parse({
    column: timeColumn.column,
    format: toCanonicalTimeFormat(timeColumn.format, dialect)
  });
}

/**
 * Renders a time column: a bare column reference without a format,
 * `(column, 'format')` with one, the format written in `dialect`'s notation.
 */
export function timeColumnToExpression(
  timeColumn: TimeColumn,
  dialect?: string
): Column | Tuple {
  const column = toColumn(timeColumn.column);
  if (!timeColumn.format) return column;

  return tuple([
    column,
    stringLiteral(toDialectTimeFormat(timeColumn.format, dialect))
  ]);
}

export function timeColumnToProperty(
  timeColumn: TimeColumn,
  dialect?: string
): Property {
  return property('time_column', timeColumnToExpression(timeColumn, dialect));
}

export function dumpTimeColumn(value: unknown, options: DumpOptions): unknown {
  return isTimeColumn(value) ? TimeColumnRecord.dump(value, options) : value;
}
