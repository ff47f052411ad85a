export { ConfigurationError } from './errors';

export {
  MODEL_KIND_NAMES,
  ModelKindName,
  isEmbedded,
  isExternal,
  isFull,
  isIncrementalByTimeRange,
  isIncrementalByUniqueKey,
  isMaterialized,
  isModelKindName,
  isSeed,
  isSymbolic,
  isView,
  modelKindName,
  onlyLatest,
  parseModelKindName
} from './model-kind/name';
export type { ModelKindSubject } from './model-kind/name';

export {
  TimeColumnRecord,
  canonicalTimeColumn,
  isTimeColumn,
  parseTimeColumn,
  timeColumnToExpression,
  timeColumnToProperty
} from './model-kind/time-column';
export type { TimeColumn, TimeColumnOptions } from './model-kind/time-column';

export {
  BareModelKindRecord,
  IncrementalByTimeRangeKindRecord,
  IncrementalByUniqueKeyKindRecord,
  MODEL_KIND,
  SeedKindRecord,
  ViewKindRecord,
  createIncrementalByTimeRangeKind,
  createIncrementalByUniqueKeyKind,
  createModelKind,
  createSeedKind,
  createViewKind,
  dumpModelKind,
  isModelKind,
  modelKindFields,
  modelKindToJson
} from './model-kind/kinds';
export type {
  BareModelKind,
  IncrementalByTimeRangeKind,
  IncrementalByUniqueKeyKind,
  KindRecordInfo,
  ModelKind,
  ModelKindFields,
  ModelKindVariant,
  SeedKind,
  ViewKind
} from './model-kind/kinds';

export { modelKindToExpression, renderModelKind } from './model-kind/render';
export type { RenderOptions } from './model-kind/render';

export { classifyModelKind, describeKindInput } from './model-kind/classifier';
export type {
  ClassifyOptions,
  KindSource,
  ModelKindInput,
  ModelKindMapping
} from './model-kind/classifier';

export { defineRecord, validateWithSchema } from './record';
export type {
  DumpOptions,
  FieldDefinition,
  FieldDefinitions,
  JsonOptions,
  RecordConfig,
  RecordDefinition
} from './record';

export {
  CANONICAL_DIALECT,
  dialectNames,
  formatTime,
  getDialect,
  invertTimeMapping,
  toCanonicalTimeFormat,
  toDialectTimeFormat
} from './dialects';
export type { Dialect, TimeMapping } from './dialects';

export * from './expressions';

export {
  coerceConcurrentTasks,
  concurrentTasksSchema,
  httpHeadersSchema,
  normalizeHttpHeaders
} from './config/common';

export { recmaModelKinds } from './plugin';
export type { ModelKindCallsite, PluginOptions } from './plugin';
