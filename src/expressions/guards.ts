import type {
  BooleanLiteral,
  Column,
  Expression,
  ExpressionType,
  Identifier,
  Literal,
  ModelKindNode,
  NullLiteral,
  Property,
  Tuple,
  Var
} from './types';

import { isRecord } from '../guards';

const EXPRESSION_TYPES: ReadonlySet<string> = new Set<ExpressionType>([
  'Identifier',
  'Column',
  'Literal',
  'Boolean',
  'Null',
  'Var',
  'Tuple',
  'Property',
  'ModelKind'
]);

/**
 * Checks whether a runtime value is an expression node.
 *
 * This is a shallow discriminant check: the value must be an object whose
 * `type` is one of the known node types. Children are not validated.
 *
 * @param value
 *   Runtime value to test.
 * @returns
 *   `true` if `value` carries a known expression `type`.
 */
export function isExpression(value: unknown): value is Expression {
  return (
    isRecord(value) &&
    typeof value.type === 'string' &&
    EXPRESSION_TYPES.has(value.type)
  );
}

/**
 * Per-node type guards, keyed like the node types they narrow to.
 *
 * @example
 * ```ts
 * if (is.tuple(value)) value.expressions.length;
 * ```
 */
export const is = {
  identifier: (value: unknown): value is Identifier =>
    isExpression(value) && value.type === 'Identifier',
  column: (value: unknown): value is Column =>
    isExpression(value) && value.type === 'Column',
  literal: (value: unknown): value is Literal =>
    isExpression(value) && value.type === 'Literal',
  boolean: (value: unknown): value is BooleanLiteral =>
    isExpression(value) && value.type === 'Boolean',
  null: (value: unknown): value is NullLiteral =>
    isExpression(value) && value.type === 'Null',
  var: (value: unknown): value is Var =>
    isExpression(value) && value.type === 'Var',
  tuple: (value: unknown): value is Tuple =>
    isExpression(value) && value.type === 'Tuple',
  property: (value: unknown): value is Property =>
    isExpression(value) && value.type === 'Property',
  modelKind: (value: unknown): value is ModelKindNode =>
    isExpression(value) && value.type === 'ModelKind'
};

/**
 * Returns the textual name of an expression.
 *
 * - Identifier / Var: the name.
 * - Column: the column part of the reference (the table is dropped).
 * - Literal: the token text (string contents without quotes).
 * - Property: the key.
 * - ModelKind: the tag.
 * - Boolean / Null / Tuple: `''` (they have no single name).
 */
export function nameOf(expression: Expression): string {
  switch (expression.type) {
    case 'Identifier':
    case 'Var':
      return expression.name;
    case 'Column':
      return expression.name.name;
    case 'Literal':
      return expression.value;
    case 'Property':
      return expression.key;
    case 'ModelKind':
      return expression.name;
    case 'Boolean':
    case 'Null':
    case 'Tuple':
      return '';
  }
}
