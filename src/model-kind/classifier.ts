import type { Expression, ModelKindNode } from '../expressions/types';
import type {
  KindInputShapes,
  StructuredTagFallback
} from '../architecture';
import type { ModelKind } from './kinds';

import { ConfigurationError } from '../errors';
import { isPlainObject } from '../guards';
import { is, isExpression, nameOf } from '../expressions/guards';
import { isString } from '../utils/type-guards';
import { isModelKind, parseModelKindAs, variantForName } from './kinds';
import { parseModelKindName } from './name';
import { canonicalTimeColumn } from './time-column';

/**
 * Kind configuration arriving as structured data: wire names to values, with
 * the tag under `name`.
 */
export type ModelKindMapping = Readonly<Record<string, unknown>>;

/**
 * Every shape the classifier accepts.
 */
export type ModelKindInput = ModelKind | Expression | ModelKindMapping | string;

/**
 * The classifier input, tagged by shape (see {@link KindInputShapes}).
 *
 * - `typed`: an already constructed kind.
 * - `node`: a kind clause node (`SEED (path 'a.csv')`).
 * - `mapping`: structured configuration.
 * - `scalar`: the text of a bare tag (from a string or any other expression).
 */
export type KindSource =
  | { shape: 'typed'; kind: ModelKind }
  | { shape: 'node'; node: ModelKindNode }
  | { shape: 'mapping'; mapping: ModelKindMapping }
  | { shape: 'scalar'; text: string };

export type ClassifyOptions = {
  /**
   * Dialect the time column format is written in. Formats are converted to
   * canonical notation; canonical input is assumed when omitted.
   */
  dialect?: string;
};

/**
 * Tags a classifier input by shape.
 *
 * Order matters: kinds and nodes are plain objects too, so the brand and the
 * node discriminant are checked before the mapping fallback.
 */
export function describeKindInput(input: ModelKindInput): KindSource {
  if (isString(input)) return { shape: 'scalar', text: input };
  if (isModelKind(input)) return { shape: 'typed', kind: input };
  if (is.modelKind(input)) return { shape: 'node', node: input };
  if (isExpression(input)) return { shape: 'scalar', text: nameOf(input) };
  if (isPlainObject(input)) return { shape: 'mapping', mapping: input };

  throw new ConfigurationError(`Invalid model kind '${String(input)}'`);
}

/**
 * Collects node properties as a wire-form mapping; keys are lower-cased.
 */
function propertiesOf(node: ModelKindNode): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  for (const { key, value } of node.properties) {
    properties[key.toLowerCase()] = value;
  }
  return properties;
}

function fromStructured(
  name: unknown,
  fields: Record<string, unknown>,
  dialect: string | undefined
): ModelKind {
  const kind = parseModelKindAs(variantForName(name), fields);
  if (kind.variant !== 'IncrementalByTimeRangeKind' || !dialect) return kind;

  const timeColumn = canonicalTimeColumn(kind.timeColumn, dialect);
  if (timeColumn === kind.timeColumn) return kind;

  return parseModelKindAs(kind.variant, {
    time_column: timeColumn,
    batch_size: kind.batchSize,
    lookback: kind.lookback
  });
}

function fromScalar(text: string): ModelKind {
  const name = parseModelKindName(text.toUpperCase());
  if (name === null) {
    throw new ConfigurationError(`Invalid model kind '${text}'`);
  }
  return parseModelKindAs('ModelKind', { name });
}

/**
 * Resolves any accepted input to exactly one constructed kind.
 *
 * 1. A constructed kind is returned unchanged (same reference).
 * 2. `null`/`undefined` give `undefined`.
 * 3. A kind clause node: its properties become the fields of the variant its
 *    tag selects; tags without a variant of their own build a bare kind
 *    named by the tag.
 * 4. A mapping: same dispatch on its `name` entry (exact match).
 * 5. A string or any other expression: its text, upper-cased, must be a tag;
 *    the result is a bare kind.
 *
 * Structured input with an unknown tag builds a bare kind, whose `name`
 * validation then rejects it (see {@link StructuredTagFallback}).
 *
 * @throws {ConfigurationError} When the input names no tag or the selected
 *   variant rejects its fields.
 *
 * @example
 * ```ts
 * classifyModelKind(parseModelKind('VIEW (materialized TRUE)'));
 * // ViewKind { name: 'VIEW', materialized: true }
 * classifyModelKind('full'); // BareModelKind { name: 'FULL' }
 * ```
 */
export function classifyModelKind(
  input: null | undefined,
  options?: ClassifyOptions
): undefined;
export function classifyModelKind(
  input: ModelKindInput,
  options?: ClassifyOptions
): ModelKind;
export function classifyModelKind(
  input: ModelKindInput | null | undefined,
  options?: ClassifyOptions
): ModelKind | undefined;
export function classifyModelKind(
  input: ModelKindInput | null | undefined,
  options: ClassifyOptions = {}
): ModelKind | undefined {
  if (input === null || input === undefined) return undefined;

  const source = describeKindInput(input);

  switch (source.shape) {
    case 'typed':
      return source.kind;
    case 'node': {
      const fields = propertiesOf(source.node);
      const variant = variantForName(source.node.name);
      if (variant === 'ModelKind') fields.name = source.node.name;
      return fromStructured(source.node.name, fields, options.dialect);
    }
    case 'mapping':
      return fromStructured(
        source.mapping.name,
        { ...source.mapping },
        options.dialect
      );
    case 'scalar':
      return fromScalar(source.text);
  }
}
