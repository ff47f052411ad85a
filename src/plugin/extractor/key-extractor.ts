import { is, type types } from 'estree-toolkit';

import { tryResolveStaticValue } from './static-resolver';

/**
 * Resolves the key of an object property to a string.
 *
 * Accepted keys:
 * - identifiers (`{ kind: ... }`), unless computed;
 * - static string or number keys (`{ 'batch_size': 1 }`, `{ [`kind`]: ... }`),
 *   numbers converted to their string form as the runtime does.
 *
 * Computed identifiers (`{ [key]: ... }`), symbols and other dynamic keys
 * yield `null`.
 */
export function extractPropertyKey(property: types.Property): string | null {
  if (!property.computed && is.identifier(property.key)) {
    return property.key.name;
  }

  const resolution = tryResolveStaticValue(property.key);
  if (!resolution.success) return null;

  const { value } = resolution;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}
