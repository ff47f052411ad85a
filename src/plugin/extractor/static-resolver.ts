import { is, type types } from 'estree-toolkit';

import { type StaticResult, UNRESOLVED, resolved } from './constants';

/**
 * Literal tokens that can appear in a kind declaration.
 *
 * Strings, numbers, booleans and `null`. Regular expressions and bigints are
 * not configuration values and stay unresolved.
 */
function tryResolveLiteral(node: types.Node): StaticResult {
  if (!is.literal(node)) return UNRESOLVED;

  switch (typeof node.value) {
    case 'string':
    case 'number':
    case 'boolean':
      return resolved(node.value);
    case 'object':
      return node.value === null ? resolved(null) : UNRESOLVED;
    default:
      return UNRESOLVED;
  }
}

/**
 * Global constants written as identifiers. Any other identifier refers to a
 * binding and is dynamic.
 */
function tryResolveIdentifier(node: types.Node): StaticResult {
  if (!is.identifier(node)) return UNRESOLVED;

  switch (node.name) {
    case 'undefined':
      return resolved(undefined);
    case 'NaN':
      return resolved(NaN);
    case 'Infinity':
      return resolved(Infinity);
    default:
      return UNRESOLVED;
  }
}

/**
 * Signed numbers: `-1` parses as a unary expression over the literal `1`.
 *
 * Only `-` and `+` over a static number resolve, so that a negative
 * `lookback` reaches validation instead of being treated as dynamic.
 */
function tryResolveSignedNumber(node: types.Node): StaticResult {
  if (!is.unaryExpression(node)) return UNRESOLVED;
  if (node.operator !== '-' && node.operator !== '+') return UNRESOLVED;

  const operand = tryResolveLiteral(node.argument);
  if (!operand.success || typeof operand.value !== 'number') return UNRESOLVED;

  return resolved(node.operator === '-' ? -operand.value : operand.value);
}

/**
 * Template literals whose interpolations are all static, joined the way the
 * runtime would (`${value}` stringification).
 *
 * A quasi with an invalid escape has no cooked text and makes the whole
 * template unresolved.
 */
function tryResolveTemplate(node: types.Node): StaticResult {
  if (!is.templateLiteral(node)) return UNRESOLVED;

  const parts: string[] = [];
  for (const [index, quasi] of node.quasis.entries()) {
    const text = quasi.value.cooked;
    if (typeof text !== 'string') return UNRESOLVED;
    parts.push(text);

    const expression = node.expressions[index];
    if (index < node.expressions.length) {
      if (!expression) return UNRESOLVED;
      const result = tryResolveStaticValue(expression);
      if (!result.success) return UNRESOLVED;
      parts.push(`${result.value}`);
    }
  }

  return resolved(parts.join(''));
}

/**
 * Resolves a leaf node to the value it evaluates to.
 *
 * Containers (arrays, objects) are handled by the extractor; this resolver
 * only covers atoms:
 * 1. literals and the constant identifiers,
 * 2. signed numbers,
 * 3. templates over static parts.
 *
 * Everything else (bindings, calls, member access, operators) is dynamic.
 */
export function tryResolveStaticValue(node: types.Node): StaticResult {
  let result: StaticResult;

  if ((result = tryResolveLiteral(node)).success) return result;
  if ((result = tryResolveIdentifier(node)).success) return result;
  if ((result = tryResolveSignedNumber(node)).success) return result;
  if ((result = tryResolveTemplate(node)).success) return result;

  return UNRESOLVED;
}
