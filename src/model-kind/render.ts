import type { Expression, ModelKindNode, Property } from '../expressions/types';
import type { ModelKind } from './kinds';
import type { KindRoundTrip } from '../architecture';

import {
  booleanLiteral,
  modelKindNode,
  numberLiteral,
  property,
  stringLiteral,
  toColumn,
  tuple
} from '../expressions/builders';
import { toSql } from '../expressions/generator';
import { timeColumnToProperty } from './time-column';

function incrementalProperties(kind: {
  readonly batchSize?: number;
  readonly lookback?: number;
}): Property[] {
  const properties: Property[] = [];
  if (kind.batchSize !== undefined) {
    properties.push(property('batch_size', numberLiteral(kind.batchSize)));
  }
  if (kind.lookback !== undefined) {
    properties.push(property('lookback', numberLiteral(kind.lookback)));
  }
  return properties;
}

function uniqueKeyExpression(keys: readonly string[]): Expression {
  const [first] = keys;
  if (keys.length === 1 && first !== undefined) return toColumn(first);
  return tuple(keys.map(toColumn));
}

/**
 * Renders a kind as the node the classifier accepts.
 *
 * Every field that differs from what the classifier would assume is
 * emitted, so classifying the result yields an equal kind (see
 * {@link KindRoundTrip}).
 *
 * @param dialect
 *   Notation for the time column format; canonical when omitted.
 */
export function modelKindToExpression(
  kind: ModelKind,
  dialect?: string
): ModelKindNode {
  switch (kind.variant) {
    case 'ModelKind':
      return modelKindNode(kind.name);
    case 'IncrementalByTimeRangeKind':
      return modelKindNode(kind.name, [
        timeColumnToProperty(kind.timeColumn, dialect),
        ...incrementalProperties(kind)
      ]);
    case 'IncrementalByUniqueKeyKind':
      return modelKindNode(kind.name, [
        property('unique_key', uniqueKeyExpression(kind.uniqueKey)),
        ...incrementalProperties(kind)
      ]);
    case 'ViewKind':
      return modelKindNode(
        kind.name,
        kind.materialized
          ? [property('materialized', booleanLiteral(true))]
          : []
      );
    case 'SeedKind':
      return modelKindNode(kind.name, [
        property('path', stringLiteral(kind.path)),
        property('batch_size', numberLiteral(kind.batchSize))
      ]);
  }
}

export type RenderOptions = {
  /**
   * Notation for the time column format; canonical when omitted.
   */
  dialect?: string;
};

/**
 * Renders a kind as the text of a kind clause.
 *
 * @example
 * ```ts
 * renderModelKind(createSeedKind({ path: 'a.csv' }));
 * // "SEED (path 'a.csv', batch_size 1000)"
 * ```
 */
export function renderModelKind(
  kind: ModelKind,
  options: RenderOptions = {}
): string {
  return toSql(modelKindToExpression(kind, options.dialect));
}
