import type { Expression } from '../expressions/types';
import type { Coercer } from '../record/coercion';

import { isArray } from '../guards';
import { isExpression, nameOf } from '../expressions/guards';
import { toSql } from '../expressions/generator';
import { accept, reject } from '../record/coercion';
import {
  isBoolean,
  isInteger,
  isNil,
  isNumber,
  isString,
  parseIntegerText
} from '../utils/type-guards';

/**
 * Reads an integer from an expression token or a raw value.
 *
 * Expressions contribute their name (`10` for the literal `10`); strings are
 * parsed; numbers must already be integers.
 */
function integerOf(value: unknown): number | null {
  if (isExpression(value)) return parseIntegerText(nameOf(value));
  if (isString(value)) return parseIntegerText(value);
  if (isInteger(value)) return value;
  return null;
}

function describe(value: unknown): string {
  if (isExpression(value)) return toSql(value);
  return String(value);
}

/**
 * Optional non-negative integer of an incremental kind (`batch_size`,
 * `lookback`).
 */
export function nonNegativeInteger(
  field: string
): Coercer<number | undefined> {
  return value => {
    if (isNil(value)) return accept(undefined);

    const number = integerOf(value);
    if (number === null || number < 0) {
      return reject(
        `Invalid value ${number ?? describe(value)} for ${field}. The value should be a non-negative integer`
      );
    }
    return accept(number);
  };
}

/**
 * Batch size of a seed: an integer literal or a raw integer, strictly
 * positive, `1000` when absent.
 *
 * Unlike incremental integers, text is not parsed: `'5'` is rejected.
 */
export const seedBatchSize: Coercer<number> = value => {
  if (value === undefined) return accept(1000);

  let number: number | null = null;
  if (isExpression(value)) {
    if (value.type === 'Literal' && !value.isString) {
      number = parseIntegerText(value.value);
    }
  } else if (isInteger(value)) {
    number = value;
  }

  if (number === null) return reject('Seed batch size must be an integer value');
  if (number <= 0) return reject('Seed batch size must be a positive integer');
  return accept(number);
};

/**
 * Name of a single key: expressions contribute their name, anything else is
 * stringified.
 */
function keyName(value: unknown): string {
  return isExpression(value) ? nameOf(value) : String(value);
}

/**
 * Ordered, non-empty list of key column names.
 *
 * - identifier / column / other single expression -> `[name]`
 * - tuple -> element names
 * - sequence -> element names (expressions) or their text
 * - string -> `[string]`
 */
export const uniqueKey: Coercer<readonly string[]> = value => {
  let keys: string[];

  if (isExpression(value)) {
    keys =
      value.type === 'Tuple'
        ? value.expressions.map(keyName)
        : [nameOf(value)];
  } else if (isArray(value)) {
    keys = value.map(keyName);
  } else if (isString(value)) {
    keys = [value];
  } else if (isNil(value)) {
    keys = [];
  } else {
    return reject('unique_key must be a column name or a list of column names');
  }

  if (keys.length === 0 || keys.some(key => key === '')) {
    return reject('unique_key cannot be empty');
  }
  return accept(Object.freeze(keys));
};

function expressionTruthiness(expression: Expression): boolean {
  switch (expression.type) {
    case 'Boolean':
      return expression.value;
    case 'Null':
      return false;
    case 'Literal':
      return expression.isString
        ? expression.value !== ''
        : Number(expression.value) !== 0;
    case 'Tuple':
      return expression.expressions.length > 0;
    default:
      return nameOf(expression) !== '';
  }
}

/**
 * Boolean flag of a view: `TRUE`/`FALSE` nodes, the truthiness of any other
 * expression, or of a raw value. Absent means `false`.
 */
export const materialized: Coercer<boolean> = value => {
  if (isExpression(value)) return accept(expressionTruthiness(value));
  if (isBoolean(value)) return accept(value);
  return accept(Boolean(value));
};

/**
 * Seed file path: a string literal's contents, the SQL text of any other
 * expression, or the raw value stringified.
 */
export const seedPath: Coercer<string> = value => {
  if (isExpression(value)) {
    return accept(
      value.type === 'Literal' && value.isString ? value.value : toSql(value)
    );
  }
  if (isString(value) || isNumber(value)) return accept(String(value));
  return reject('Seed path must be a string');
};
