import { z } from 'zod';

import type { TimeColumn } from './time-column';
import type { WireAndRecordForm } from '../architecture';

import { ConfigurationError } from '../errors';
import { isRecord } from '../guards';
import {
  type DumpOptions,
  type JsonOptions,
  type RecordDefinition,
  defineRecord
} from '../record';
import { fieldSchema, required } from '../record/coercion';
import { ModelKindName, isModelKindName } from './name';
import {
  materialized,
  nonNegativeInteger,
  seedBatchSize,
  seedPath,
  uniqueKey
} from './fields';
import { coerceTimeColumn, dumpTimeColumn } from './time-column';

/**
 * Brand carried by every constructed kind.
 *
 * 1. Runtime identity: `Symbol.for` returns the same symbol for every copy
 *    of this package loaded into one process, so a kind built by one copy is
 *    still recognized by the classifier of another.
 * 2. Classification: a value carrying the brand was produced by a record
 *    definition below, so it is returned as is without validating again.
 */
export const MODEL_KIND = Symbol.for('model-kinds.model_kind');

type Branded = {
  readonly __kind: typeof MODEL_KIND;
};

/**
 * A kind without fields of its own: `FULL`, `EMBEDDED`, `EXTERNAL`, or any
 * tag reached by a bare name.
 */
export type BareModelKind = Branded & {
  readonly variant: 'ModelKind';
  readonly name: ModelKindName;
};

type IncrementalFields = {
  readonly batchSize?: number;
  readonly lookback?: number;
};

export type IncrementalByTimeRangeKind = Branded &
  IncrementalFields & {
    readonly variant: 'IncrementalByTimeRangeKind';
    readonly name: typeof ModelKindName.INCREMENTAL_BY_TIME_RANGE;
    readonly timeColumn: TimeColumn;
  };

export type IncrementalByUniqueKeyKind = Branded &
  IncrementalFields & {
    readonly variant: 'IncrementalByUniqueKeyKind';
    readonly name: typeof ModelKindName.INCREMENTAL_BY_UNIQUE_KEY;
    readonly uniqueKey: readonly string[];
  };

export type ViewKind = Branded & {
  readonly variant: 'ViewKind';
  readonly name: typeof ModelKindName.VIEW;
  readonly materialized: boolean;
};

export type SeedKind = Branded & {
  readonly variant: 'SeedKind';
  readonly name: typeof ModelKindName.SEED;
  readonly path: string;
  readonly batchSize: number;
};

/**
 * Every constructed model kind. `variant` discriminates; `name` is the tag.
 */
export type ModelKind =
  | BareModelKind
  | IncrementalByTimeRangeKind
  | IncrementalByUniqueKeyKind
  | ViewKind
  | SeedKind;

export type ModelKindVariant = ModelKind['variant'];

/**
 * Field names (camelCase) of a variant, without structural metadata (see
 * {@link WireAndRecordForm}).
 */
type DataKey<T> = Exclude<keyof T & string, 'variant' | '__kind'>;

export type ModelKindFields<T extends ModelKind> = {
  readonly [K in DataKey<T>]?: unknown;
};

const incrementalInteger = (field: string) =>
  fieldSchema(nonNegativeInteger(field));

/**
 * Phase 2 of both incremental kinds.
 *
 * `0` is a set value: `batch_size 0` with `lookback 1` is rejected.
 */
function incrementalInvariant(kind: IncrementalFields): void {
  const { batchSize, lookback } = kind;
  if (batchSize !== undefined && lookback !== undefined && batchSize < lookback) {
    throw new ConfigurationError('batch_size cannot be less than lookback');
  }
}

export const BareModelKindRecord = defineRecord({
  name: 'ModelKind',
  schema: z
    .object({ name: z.nativeEnum(ModelKindName) })
    .strict()
    .transform(
      (wire): BareModelKind => ({
        __kind: MODEL_KIND,
        variant: 'ModelKind',
        name: wire.name
      })
    ),
  fields: {
    name: { required: true }
  }
});

export const IncrementalByTimeRangeKindRecord = defineRecord({
  name: 'IncrementalByTimeRangeKind',
  schema: z
    .object({
      name: z
        .literal(ModelKindName.INCREMENTAL_BY_TIME_RANGE)
        .default(ModelKindName.INCREMENTAL_BY_TIME_RANGE),
      time_column: fieldSchema(required(coerceTimeColumn)),
      batch_size: incrementalInteger('batch_size'),
      lookback: incrementalInteger('lookback')
    })
    .strict()
    .transform(
      (wire): IncrementalByTimeRangeKind => ({
        __kind: MODEL_KIND,
        variant: 'IncrementalByTimeRangeKind',
        name: wire.name,
        timeColumn: wire.time_column,
        batchSize: wire.batch_size,
        lookback: wire.lookback
      })
    ),
  fields: {
    name: { required: false },
    timeColumn: { alias: 'time_column', required: true, dump: dumpTimeColumn },
    batchSize: { alias: 'batch_size', required: false },
    lookback: { required: false }
  },
  invariant: incrementalInvariant
});

export const IncrementalByUniqueKeyKindRecord = defineRecord({
  name: 'IncrementalByUniqueKeyKind',
  schema: z
    .object({
      name: z
        .literal(ModelKindName.INCREMENTAL_BY_UNIQUE_KEY)
        .default(ModelKindName.INCREMENTAL_BY_UNIQUE_KEY),
      unique_key: fieldSchema(required(uniqueKey)),
      batch_size: incrementalInteger('batch_size'),
      lookback: incrementalInteger('lookback')
    })
    .strict()
    .transform(
      (wire): IncrementalByUniqueKeyKind => ({
        __kind: MODEL_KIND,
        variant: 'IncrementalByUniqueKeyKind',
        name: wire.name,
        uniqueKey: wire.unique_key,
        batchSize: wire.batch_size,
        lookback: wire.lookback
      })
    ),
  fields: {
    name: { required: false },
    uniqueKey: { alias: 'unique_key', required: true },
    batchSize: { alias: 'batch_size', required: false },
    lookback: { required: false }
  },
  invariant: incrementalInvariant
});

export const ViewKindRecord = defineRecord({
  name: 'ViewKind',
  schema: z
    .object({
      name: z.literal(ModelKindName.VIEW).default(ModelKindName.VIEW),
      materialized: fieldSchema(materialized)
    })
    .strict()
    .transform(
      (wire): ViewKind => ({
        __kind: MODEL_KIND,
        variant: 'ViewKind',
        name: wire.name,
        materialized: wire.materialized
      })
    ),
  fields: {
    name: { required: false },
    materialized: { required: false, default: false }
  }
});

export const SeedKindRecord = defineRecord({
  name: 'SeedKind',
  schema: z
    .object({
      name: z.literal(ModelKindName.SEED).default(ModelKindName.SEED),
      path: fieldSchema(required(seedPath)),
      batch_size: fieldSchema(seedBatchSize)
    })
    .strict()
    .transform(
      (wire): SeedKind => ({
        __kind: MODEL_KIND,
        variant: 'SeedKind',
        name: wire.name,
        path: wire.path,
        batchSize: wire.batch_size
      })
    ),
  fields: {
    name: { required: false },
    path: { required: true },
    batchSize: { alias: 'batch_size', required: false, default: 1000 }
  }
});

/**
 * Field introspection shared by every kind record.
 */
export type KindRecordInfo = Pick<
  RecordDefinition<object>,
  'name' | 'allFields' | 'requiredFields' | 'missingRequiredFields' | 'extraFields'
>;

const KIND_RECORDS: Readonly<Record<ModelKindVariant, KindRecordInfo>> = {
  ModelKind: BareModelKindRecord,
  IncrementalByTimeRangeKind: IncrementalByTimeRangeKindRecord,
  IncrementalByUniqueKeyKind: IncrementalByUniqueKeyKindRecord,
  ViewKind: ViewKindRecord,
  SeedKind: SeedKindRecord
};

/**
 * Checks whether a value is a constructed model kind (carries the brand).
 */
export function isModelKind(value: unknown): value is ModelKind {
  return (
    isRecord(value) &&
    value.__kind === MODEL_KIND &&
    typeof value.variant === 'string' &&
    value.variant in KIND_RECORDS &&
    isModelKindName(value.name)
  );
}

/**
 * The variant a tag is constructed as. Tags without fields of their own
 * build a {@link BareModelKind}.
 */
export function variantForName(name: unknown): ModelKindVariant {
  switch (name) {
    case ModelKindName.INCREMENTAL_BY_TIME_RANGE:
      return 'IncrementalByTimeRangeKind';
    case ModelKindName.INCREMENTAL_BY_UNIQUE_KEY:
      return 'IncrementalByUniqueKeyKind';
    case ModelKindName.SEED:
      return 'SeedKind';
    case ModelKindName.VIEW:
      return 'ViewKind';
    default:
      return 'ModelKind';
  }
}

/**
 * Validates wire-form input (snake_case keys) as the given variant.
 */
export function parseModelKindAs(
  variant: ModelKindVariant,
  input: unknown
): ModelKind {
  switch (variant) {
    case 'ModelKind':
      return BareModelKindRecord.parse(input);
    case 'IncrementalByTimeRangeKind':
      return IncrementalByTimeRangeKindRecord.parse(input);
    case 'IncrementalByUniqueKeyKind':
      return IncrementalByUniqueKeyKindRecord.parse(input);
    case 'ViewKind':
      return ViewKindRecord.parse(input);
    case 'SeedKind':
      return SeedKindRecord.parse(input);
  }
}

/**
 * Builds a kind without fields of its own.
 *
 * @throws {ConfigurationError} When `name` is not a tag.
 */
export function createModelKind(name: ModelKindName): BareModelKind {
  return BareModelKindRecord.fromFields({ name });
}

export function createIncrementalByTimeRangeKind(
  fields: ModelKindFields<IncrementalByTimeRangeKind>
): IncrementalByTimeRangeKind {
  return IncrementalByTimeRangeKindRecord.fromFields(fields);
}

export function createIncrementalByUniqueKeyKind(
  fields: ModelKindFields<IncrementalByUniqueKeyKind>
): IncrementalByUniqueKeyKind {
  return IncrementalByUniqueKeyKindRecord.fromFields(fields);
}

export function createViewKind(
  fields: ModelKindFields<ViewKind> = {}
): ViewKind {
  return ViewKindRecord.fromFields(fields);
}

export function createSeedKind(fields: ModelKindFields<SeedKind>): SeedKind {
  return SeedKindRecord.fromFields(fields);
}

/**
 * Exports a kind as a plain mapping (wire names, unset fields omitted by
 * default).
 *
 * @example
 * ```ts
 * dumpModelKind(createSeedKind({ path: 'seeds/a.csv' }));
 * // { name: 'SEED', path: 'seeds/a.csv', batch_size: 1000 }
 * ```
 */
export function dumpModelKind(
  kind: ModelKind,
  options?: DumpOptions
): Record<string, unknown> {
  switch (kind.variant) {
    case 'ModelKind':
      return BareModelKindRecord.dump(kind, options);
    case 'IncrementalByTimeRangeKind':
      return IncrementalByTimeRangeKindRecord.dump(kind, options);
    case 'IncrementalByUniqueKeyKind':
      return IncrementalByUniqueKeyKindRecord.dump(kind, options);
    case 'ViewKind':
      return ViewKindRecord.dump(kind, options);
    case 'SeedKind':
      return SeedKindRecord.dump(kind, options);
  }
}

export function modelKindToJson(kind: ModelKind, options: JsonOptions = {}): string {
  return JSON.stringify(dumpModelKind(kind, options), null, options.indent);
}

/**
 * Field introspection of a kind's record, by kind or by variant name.
 *
 * @example
 * ```ts
 * modelKindFields('SeedKind').requiredFields(); // Set { 'path' }
 * ```
 */
export function modelKindFields(
  subject: ModelKind | ModelKindVariant
): KindRecordInfo {
  return KIND_RECORDS[typeof subject === 'string' ? subject : subject.variant];
}
