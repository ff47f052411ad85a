import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { TwoPhaseConstruction } from '../architecture';

import { isNil } from '../utils/type-guards';
import { validateWithSchema } from './validator';

export { validateWithSchema } from './validator';
export {
  accept,
  fieldSchema,
  reject,
  required
} from './coercion';
export type { Coercer, Coercion } from './coercion';

/**
 * Options shared by {@link RecordDefinition.dump} and
 * {@link RecordDefinition.json}.
 */
export type DumpOptions = {
  /**
   * Emit wire names (aliases) instead of property names.
   *
   * @default true
   */
  byAlias?: boolean;

  /**
   * Omit fields whose value is `undefined` or `null`.
   *
   * @default true
   */
  excludeNone?: boolean;

  /**
   * Omit fields whose value equals their declared default.
   *
   * @default false
   */
  excludeDefaults?: boolean;

  /**
   * Only emit these fields (property names or aliases).
   */
  include?: readonly string[];

  /**
   * Never emit these fields (property names or aliases).
   */
  exclude?: readonly string[];
};

export type JsonOptions = DumpOptions & {
  /**
   * Indentation passed to `JSON.stringify`; compact output when omitted.
   */
  indent?: number;
};

/**
 * Metadata of a single record field.
 *
 * Schemas validate values; this metadata carries what a schema cannot
 * express on its own: the wire name, requiredness for diagnostics, the
 * default used by `excludeDefaults`, and how to dump nested values.
 */
export type FieldDefinition = {
  /**
   * Wire name used in mappings, AST properties and dumps (`batch_size` for
   * `batchSize`). Defaults to the property name.
   */
  alias?: string;

  /**
   * Whether the field must be provided on input.
   */
  required: boolean;

  /**
   * Default applied when the field is absent; only compared, never applied
   * here (the schema applies it).
   */
  default?: string | number | boolean;

  /**
   * Dumps a nested value (e.g. a nested record) with the same options,
   * without `include` and `exclude`.
   */
  dump?: (value: unknown, options: DumpOptions) => unknown;
};

/**
 * Field metadata keyed by property name.
 *
 * `K` is usually every string key of the record; records that carry
 * structural metadata (such as a discriminant) list only their data fields.
 */
export type FieldDefinitions<K extends string> = {
  readonly [P in K]: FieldDefinition;
};

/**
 * Configuration accepted by {@link defineRecord}.
 */
export type RecordConfig<
  T extends object,
  K extends keyof T & string = keyof T & string
> = {
  /**
   * Record name used in error messages (e.g. `'SeedKind'`).
   */
  name: string;

  /**
   * Phase 1: field-level coercion and structural validation.
   *
   * Receives the wire-form input (keys are aliases) and produces the record.
   */
  schema: StandardSchemaV1<unknown, T>;

  /**
   * Field metadata, keyed by property name, in dump order.
   */
  fields: FieldDefinitions<K>;

  /**
   * Phase 2: whole-object invariant, run on the record produced by the
   * schema. Throws to reject.
   */
  invariant?: (record: T) => void;
};

/**
 * A typed, validated record kind.
 */
export type RecordDefinition<
  T extends object,
  K extends keyof T & string = keyof T & string
> = {
  readonly name: string;
  readonly fields: FieldDefinitions<K>;

  /**
   * Validates wire-form input and returns a frozen record.
   */
  parse(input: unknown): T;

  /**
   * Validates property-named input (`{ batchSize: 10 }`) by translating it to
   * wire names first.
   */
  fromFields(values: Readonly<Partial<Record<K, unknown>>>): T;

  /**
   * Exports the record as a plain mapping.
   */
  dump(record: T, options?: DumpOptions): Record<string, unknown>;

  /**
   * Exports the record as JSON text, in the same shape as {@link dump}.
   */
  json(record: T, options?: JsonOptions): string;

  /**
   * Wire names of every declared field.
   */
  allFields(): Set<string>;

  /**
   * Wire names of the fields that must be provided.
   */
  requiredFields(): Set<string>;

  /**
   * Required wire names absent from `provided`.
   */
  missingRequiredFields(provided: Iterable<string>): Set<string>;

  /**
   * Names in `provided` that are not declared fields.
   */
  extraFields(provided: Iterable<string>): Set<string>;
};

function fieldEntries<K extends string>(
  fields: FieldDefinitions<K>
): Array<[string, FieldDefinition]> {
  return Object.entries<FieldDefinition>(fields);
}

function wireName(key: string, field: FieldDefinition): string {
  return field.alias ?? key;
}

/**
 * Defines a validated record kind.
 *
 * Construction is two-phase and explicit:
 * 1. `schema` coerces and validates each field (and rejects unknown ones).
 * 2. `invariant` checks cross-field rules on the coerced record.
 *
 * Only after both phases succeed is the record frozen and returned (see
 * {@link TwoPhaseConstruction}).
 *
 * @example
 * ```ts
 * const Point = defineRecord({
 *   name: 'Point',
 *   schema: z.object({ x: z.number(), y: z.number() }).strict(),
 *   fields: { x: { required: true }, y: { required: true } }
 * });
 * Point.parse({ x: 1, y: 2 });
 * ```
 */
export function defineRecord<
  T extends object,
  K extends keyof T & string = keyof T & string
>(config: RecordConfig<T, K>): RecordDefinition<T, K> {
  const entries = fieldEntries(config.fields);

  const parse = (input: unknown): T => {
    const record = validateWithSchema(config.schema, input, config.name);
    config.invariant?.(record);
    Object.freeze(record);
    return record;
  };

  const dump = (record: T, options: DumpOptions = {}) => {
    const byAlias = options.byAlias ?? true;
    const excludeNone = options.excludeNone ?? true;
    // Field selection applies to this level only.
    const nested: DumpOptions = {
      ...options,
      include: undefined,
      exclude: undefined
    };
    const output: Record<string, unknown> = {};

    for (const [key, field] of entries) {
      const name = wireName(key, field);
      const matches = (n: string) => n === key || n === name;
      if (options.include && !options.include.some(matches)) continue;
      if (options.exclude?.some(matches)) continue;

      const value: unknown = Reflect.get(record, key);
      if (excludeNone && isNil(value)) continue;
      if (
        options.excludeDefaults &&
        field.default !== undefined &&
        value === field.default
      ) {
        continue;
      }

      const dumped = field.dump ? field.dump(value, nested) : value;
      output[byAlias ? name : key] = Array.isArray(dumped)
        ? [...dumped]
        : dumped;
    }

    return output;
  };

  const allFields = () =>
    new Set(entries.map(([key, field]) => wireName(key, field)));

  const requiredFields = () =>
    new Set(
      entries
        .filter(([, field]) => field.required)
        .map(([key, field]) => wireName(key, field))
    );

  return {
    name: config.name,
    fields: config.fields,
    parse,
    fromFields(values) {
      const wire: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(values)) {
        const field: FieldDefinition | undefined = Reflect.get(
          config.fields,
          key
        );
        wire[field ? wireName(key, field) : key] = value;
      }
      return parse(wire);
    },
    dump,
    json(record, options = {}) {
      return JSON.stringify(dump(record, options), null, options.indent);
    },
    allFields,
    requiredFields,
    missingRequiredFields(provided) {
      const given = new Set(provided);
      return new Set([...requiredFields()].filter(name => !given.has(name)));
    },
    extraFields(provided) {
      const known = allFields();
      return new Set([...provided].filter(name => !known.has(name)));
    }
  };
}
