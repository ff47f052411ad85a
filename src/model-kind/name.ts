/**
 * The closed set of model kind tags.
 *
 * A tag decides how a model is computed and stored in the warehouse. The
 * object doubles as the runtime enumeration; {@link ModelKindName} (the type)
 * is the union of its values.
 */
export const ModelKindName = {
  INCREMENTAL_BY_TIME_RANGE: 'INCREMENTAL_BY_TIME_RANGE',
  INCREMENTAL_BY_UNIQUE_KEY: 'INCREMENTAL_BY_UNIQUE_KEY',
  FULL: 'FULL',
  VIEW: 'VIEW',
  EMBEDDED: 'EMBEDDED',
  SEED: 'SEED',
  EXTERNAL: 'EXTERNAL'
} as const;

export type ModelKindName = (typeof ModelKindName)[keyof typeof ModelKindName];

/**
 * Every tag, in declaration order.
 */
export const MODEL_KIND_NAMES: readonly ModelKindName[] = Object.freeze(
  Object.values(ModelKindName)
);

const NAMES: ReadonlySet<string> = new Set(MODEL_KIND_NAMES);

export function isModelKindName(value: unknown): value is ModelKindName {
  return typeof value === 'string' && NAMES.has(value);
}

/**
 * Resolves tag text. The comparison is exact: callers upper-case
 * case-insensitive input themselves.
 *
 * @returns The tag, or `null` when `text` names none.
 */
export function parseModelKindName(text: string): ModelKindName | null {
  return isModelKindName(text) ? text : null;
}

/**
 * Anything a predicate can be asked about: a bare tag, or a kind that
 * carries one.
 */
export type ModelKindSubject = ModelKindName | { readonly name: ModelKindName };

/**
 * Returns the tag of a subject. A tag is its own name; a kind delegates to
 * its `name`.
 */
export function modelKindName(subject: ModelKindSubject): ModelKindName {
  return typeof subject === 'string' ? subject : subject.name;
}

export function isIncrementalByTimeRange(subject: ModelKindSubject): boolean {
  return modelKindName(subject) === ModelKindName.INCREMENTAL_BY_TIME_RANGE;
}

export function isIncrementalByUniqueKey(subject: ModelKindSubject): boolean {
  return modelKindName(subject) === ModelKindName.INCREMENTAL_BY_UNIQUE_KEY;
}

export function isFull(subject: ModelKindSubject): boolean {
  return modelKindName(subject) === ModelKindName.FULL;
}

export function isView(subject: ModelKindSubject): boolean {
  return modelKindName(subject) === ModelKindName.VIEW;
}

export function isEmbedded(subject: ModelKindSubject): boolean {
  return modelKindName(subject) === ModelKindName.EMBEDDED;
}

export function isSeed(subject: ModelKindSubject): boolean {
  return modelKindName(subject) === ModelKindName.SEED;
}

export function isExternal(subject: ModelKindSubject): boolean {
  return modelKindName(subject) === ModelKindName.EXTERNAL;
}

/**
 * A symbolic model never executes: it is inlined (`EMBEDDED`) or managed
 * outside the project (`EXTERNAL`).
 */
export function isSymbolic(subject: ModelKindSubject): boolean {
  return isEmbedded(subject) || isExternal(subject);
}

/**
 * Whether the model writes a physical table.
 */
export function isMaterialized(subject: ModelKindSubject): boolean {
  return !(isSymbolic(subject) || isView(subject));
}

/**
 * Whether only the latest interval matters when rendering the model.
 */
export function onlyLatest(subject: ModelKindSubject): boolean {
  return isView(subject) || isFull(subject);
}
