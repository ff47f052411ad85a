import { is, type types } from 'estree-toolkit';

import { type StaticResult, UNRESOLVED, resolved } from './constants';
import { extractPropertyKey } from './key-extractor';
import { tryResolveStaticValue } from './static-resolver';

export type { StaticFailure, StaticResult, StaticSuccess } from './constants';
export { extractPropertyKey } from './key-extractor';
export { tryResolveStaticValue } from './static-resolver';

/**
 * Arrays: every element must be static.
 *
 * Spreads and holes make the array dynamic; a kind's `unique_key` list with a
 * missing entry would otherwise validate as a different key.
 */
function extractArray(node: types.ArrayExpression): StaticResult<unknown[]> {
  const values: unknown[] = [];

  for (const element of node.elements) {
    if (element === null || is.spreadElement(element)) return UNRESOLVED;

    const result = extractStaticValue(element);
    if (!result.success) return UNRESOLVED;
    values.push(result.value);
  }

  return resolved(values);
}

/**
 * Objects: every entry must be static.
 *
 * Unlike a best-effort subset, a kind mapping with one dynamic entry is
 * dynamic as a whole: dropping `path: seedPath` would change which error the
 * classifier reports, not whether the declaration is valid.
 */
function extractObject(
  node: types.ObjectExpression
): StaticResult<Record<string, unknown>> {
  const values: Record<string, unknown> = {};

  for (const property of node.properties) {
    if (is.spreadElement(property)) return UNRESOLVED;

    const key = extractPropertyKey(property);
    if (key === null) return UNRESOLVED;

    const result = extractStaticValue(property.value);
    if (!result.success) return UNRESOLVED;
    values[key] = result.value;
  }

  return resolved(values);
}

/**
 * Decodes an expression into the plain value it evaluates to.
 *
 * 1. Atoms go through {@link tryResolveStaticValue}.
 * 2. Arrays and objects recurse; any dynamic part makes the whole container
 *    dynamic.
 * 3. Anything else is dynamic.
 *
 * @example
 * ```ts
 * // node of `{ name: 'SEED', path: `seeds/${'a'}.csv` }`
 * extractStaticValue(node);
 * // { success: true, value: { name: 'SEED', path: 'seeds/a.csv' } }
 * ```
 */
export function extractStaticValue(node: types.Node): StaticResult {
  const atom = tryResolveStaticValue(node);
  if (atom.success) return atom;

  if (is.arrayExpression(node)) return extractArray(node);
  if (is.objectExpression(node)) return extractObject(node);

  return UNRESOLVED;
}
