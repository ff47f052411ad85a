import { is, type NodePath, type types } from 'estree-toolkit';

import { extractPropertyKey } from './extractor';

/**
 * A model declaration call whose first argument carries a kind.
 *
 * For `defineModel({ name: 'db.events', kind: 'FULL' })`:
 * - `calleeName` is `'defineModel'`,
 * - `kindProperty` is the `kind: 'FULL'` property node, read for
 *   extraction and rewritten in place.
 */
export type ModelCallMatch = {
  calleeName: string;
  kindProperty: types.Property;
};

export type ResolveModelCall = (
  path: NodePath<types.CallExpression>
) => ModelCallMatch | null;

/**
 * Name of the called function, for plain and member calls.
 *
 * - `defineModel(...)` -> `'defineModel'`
 * - `models.defineModel(...)` -> `'defineModel'`
 * - `models[name](...)`, `factory()(...)` -> `null`
 */
function calleeNameOf(callee: types.Node): string | null {
  if (is.identifier(callee)) return callee.name;

  if (
    is.memberExpression(callee) &&
    !callee.computed &&
    is.identifier(callee.property)
  ) {
    return callee.property.name;
  }

  return null;
}

/**
 * Finds the last property named `key` in an object literal, as the runtime
 * keeps the last of duplicate keys. Spreads are skipped: a key they might
 * contribute is unknown.
 */
function findProperty(
  node: types.ObjectExpression,
  key: string
): types.Property | null {
  let found: types.Property | null = null;

  for (const property of node.properties) {
    if (is.spreadElement(property)) continue;
    if (extractPropertyKey(property) === key) found = property;
  }

  return found;
}

/**
 * Creates the matcher for model declaration calls.
 *
 * A call matches when:
 * 1. its callee name is one of `callees`,
 * 2. its first argument is an object literal,
 * 3. that object has a static `kindKey` property.
 *
 * Every other call is skipped (`null`).
 */
export function createModelCallResolver(
  callees: readonly string[],
  kindKey: string
): ResolveModelCall {
  const calleeNames = new Set(callees);

  return path => {
    const node = path.node;
    if (!node) return null;

    const calleeName = calleeNameOf(node.callee);
    if (calleeName === null || !calleeNames.has(calleeName)) return null;

    const [config] = node.arguments;
    if (!config || !is.objectExpression(config)) return null;

    const kindProperty = findProperty(config, kindKey);
    if (!kindProperty) return null;

    return { calleeName, kindProperty };
  };
}
