import type { Expression, Identifier } from './types';

function quoteIdentifier(node: Identifier): string {
  if (!node.quoted) return node.name;
  return `"${node.name.replaceAll('"', '""')}"`;
}

function quoteString(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

/**
 * Renders an expression node as SQL text.
 *
 * Output is single-line and canonical:
 * - identifiers are quoted only when their `quoted` flag is set,
 * - string literals use single quotes with `''` escaping,
 * - booleans and `NULL` are upper-case keywords,
 * - a kind clause without properties renders as its bare tag.
 *
 * The output of this function is accepted by `parseExpression` /
 * `parseModelKind`, which return an equal node.
 *
 * @example
 * ```ts
 * toSql(modelKindNode('SEED', [property('path', stringLiteral('a.csv'))]));
 * // "SEED (path 'a.csv')"
 * ```
 */
export function toSql(expression: Expression): string {
  switch (expression.type) {
    case 'Identifier':
      return quoteIdentifier(expression);
    case 'Column':
      return expression.table
        ? `${quoteIdentifier(expression.table)}.${quoteIdentifier(expression.name)}`
        : quoteIdentifier(expression.name);
    case 'Literal':
      return expression.isString
        ? quoteString(expression.value)
        : expression.value;
    case 'Boolean':
      return expression.value ? 'TRUE' : 'FALSE';
    case 'Null':
      return 'NULL';
    case 'Var':
      return expression.name;
    case 'Tuple':
      return `(${expression.expressions.map(toSql).join(', ')})`;
    case 'Property':
      return `${expression.key} ${toSql(expression.value)}`;
    case 'ModelKind':
      return expression.properties.length === 0
        ? expression.name
        : `${expression.name} (${expression.properties.map(toSql).join(', ')})`;
  }
}
