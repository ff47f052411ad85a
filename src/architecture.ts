import type { classifyModelKind } from './model-kind/classifier';
import type { defineRecord } from './record';

/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * RATIONALE
 * 1. One Concept, Four Shapes
 *
 * DEFINITION
 * 2. Wire Form and Record Form
 * 3. Canonical Time Formats
 *
 * POLICY
 * 4. Two-Phase Construction
 * 5. Issue-Reporting Coercers
 * 6. Unknown Tags in Structured Input
 *
 * LIFECYCLE
 * 7. Kind Round-Trip
 *
 * STRATEGY
 * 8. Build-Time Validation of Model Files
 *
 * Recommended reading flow:
 * RATIONALE -> DEFINITION -> POLICY -> LIFECYCLE -> STRATEGY
 */

/**
 * HEADER TAXONOMY
 *
 * - RATIONALE: the problem a design answers.
 * - DEFINITION: meaning and scope of a term.
 * - POLICY: a `must` / `must not` rule and where it is enforced.
 * - LIFECYCLE: a process flow across modules.
 * - STRATEGY: the approach chosen to satisfy the policies.
 */

/**
 * ARCHITECTURAL RATIONALE (1)
 * One Concept, Four Shapes
 *
 * ---
 *
 * A model kind declares how a model is materialized. The same declaration
 * reaches this package in four shapes:
 *
 * 1. A kind clause node parsed from model text:
 *
 *      INCREMENTAL_BY_TIME_RANGE (time_column (ds, '%Y-%m-%d'), lookback 2)
 *
 * 2. A mapping from structured configuration:
 *
 *      { name: 'INCREMENTAL_BY_TIME_RANGE', time_column: 'ds', lookback: 2 }
 *
 * 3. A bare tag, as text or as a single expression: `'full'`, `FULL`.
 *
 * 4. A kind constructed earlier.
 *
 * {@link classifyModelKind} first tags its input with its shape (`KindSource`)
 * and then matches the shape exhaustively. Nothing downstream inspects raw
 * input: each variant's record receives wire-form fields only.
 */
export type KindInputShapes = never;

/**
 * DEFINITION (2)
 * Wire Form and Record Form
 *
 * ---
 *
 * - **Wire form**: snake_case keys (`time_column`, `batch_size`,
 *   `unique_key`). Used by mappings, kind clause properties, and dumps.
 * - **Record form**: camelCase properties of the frozen record
 *   (`timeColumn`, `batchSize`, `uniqueKey`).
 *
 * Field metadata maps one to the other (`alias`). Record schemas read wire
 * form; direct constructors (`createSeedKind({ batchSize })`) translate their
 * record-form input first.
 *
 * Constructed kinds additionally carry:
 * - `variant`: the discriminant of the `ModelKind` union;
 * - `__kind`: the `Symbol.for('model-kinds.model_kind')` brand the classifier
 *   recognizes.
 *
 * Neither is a field: neither is dumped, and neither appears in
 * `allFields()`.
 */
export type WireAndRecordForm = never;

/**
 * DEFINITION (3)
 * Canonical Time Formats
 *
 * ---
 *
 * A time column's `format` is stored in one notation, strftime (`%Y-%m-%d`).
 * Dialects write the same format differently:
 *
 *   | dialect    | notation              |
 *   | ---------- | --------------------- |
 *   | canonical  | `%Y-%m-%d %H:%M:%S`   |
 *   | spark      | `yyyy-MM-dd HH:mm:ss` |
 *   | postgres   | `YYYY-MM-DD HH24:MI:SS` |
 *   | mysql      | `%Y-%m-%d %T`         |
 *
 * Reading with a dialect converts through its `timeMapping`; rendering for a
 * dialect converts back through its `inverseTimeMapping`. Both rewrite by
 * longest match, so `MM` is never read as two `M` tokens.
 *
 * Mappings are not always bijective (spark `y` and `yyyy` both read as `%Y`);
 * rendering then picks the token the dialect table lists last.
 */
export type CanonicalTimeFormats = never;

/**
 * POLICY (4)
 * Two-Phase Construction
 *
 * ---
 *
 * Every record is built by {@link defineRecord} in two explicit phases:
 *
 * 1. Field phase (schema): each field is coerced on its own. Unknown keys and
 *    missing required fields are rejected here.
 * 2. Object phase (invariant): cross-field rules run on the fully coerced
 *    record, e.g. `batch_size >= lookback` of the incremental kinds.
 *
 * The record is frozen only after both phases pass. A caller therefore sees
 * either a valid, immutable record or a `ConfigurationError`, never a
 * partially valid object.
 */
export type TwoPhaseConstruction = never;

/**
 * POLICY (5)
 * Issue-Reporting Coercers
 *
 * ---
 *
 * Field coercers must not throw. They return `{ value }` or `{ issue }`;
 * `fieldSchema` records an issue on the field's path.
 *
 * Enforcement:
 * Schemas are consumed through the Standard Schema `~standard.validate`
 * adapter, which retries a schema that throws synchronously as an async
 * parse. A throwing coercer would surface as "async validation is not
 * supported" instead of its own message.
 *
 * Resulting messages name the record and the field:
 *
 *   Invalid SeedKind at "batch_size": Seed batch size must be a positive integer
 *
 * Invariants (phase 2) run outside the schema and throw `ConfigurationError`
 * directly.
 */
export type IssueReportingCoercers = never;

/**
 * POLICY (6)
 * Unknown Tags in Structured Input
 *
 * ---
 *
 * - Bare tags (shape 3) must name a tag:
 *   `Invalid model kind '<text>'`.
 * - Nodes and mappings (shapes 1 and 2) with a tag that selects no variant
 *   build a bare kind. Its `name` schema then rejects unknown tags:
 *
 *   Invalid ModelKind at "name": Invalid enum value. ...
 *
 * Both paths reject; only the message differs. Fields given to a bare kind
 * are rejected as unrecognized keys.
 */
export type StructuredTagFallback = never;

/**
 * LIFECYCLE (7)
 * Kind Round-Trip
 *
 * ---
 *
 *   text --parseModelKind--> node --classifyModelKind--> kind
 *     ^                                                    |
 *     +------toSql------ node <---modelKindToExpression----+
 *
 * Rendering emits every field the classifier would not infer on its own
 * (`batch_size`, `lookback`, a materialized view), so that for every kind `v`:
 *
 *   classifyModelKind(modelKindToExpression(v)) equals v
 *
 * With a dialect, the format is rendered in the dialect's notation and read
 * back with the same dialect.
 */
export type KindRoundTrip = never;

/**
 * STRATEGY (8)
 * Build-Time Validation of Model Files
 *
 * ---
 *
 * The `recmaModelKinds` plugin runs on the ESTree of compiled model files and
 * never executes them. For each `defineModel({ kind })` call:
 *
 * 1. Extract: the kind value is decoded statically. Containers are strict:
 *    one dynamic entry makes the whole value dynamic.
 * 2. Dynamic kinds are reported as `dynamic-kind` messages on the file and
 *    left as written.
 * 3. Static kinds are classified; failures throw and stop the build.
 * 4. With `applyTransforms`, the value is replaced by the kind's canonical
 *    mapping, so the runtime receives validated data.
 */
export type BuildTimeValidation = never;
