/**
 * SQL-like expression nodes used by model definitions.
 *
 * These are the shapes the kind clause of a `MODEL (...)` block parses into
 * and renders from. Every node carries a string `type` discriminant, so
 * narrowing works with a plain `switch` or the guards in `./guards`.
 */

/** A (possibly quoted) SQL identifier, e.g. `ds` or `"event date"`. */
export type Identifier = {
  type: 'Identifier';
  name: string;
  quoted: boolean;
};

/** A column reference, optionally qualified by a table: `ds`, `events.ds`. */
export type Column = {
  type: 'Column';
  name: Identifier;
  table?: Identifier;
};

/**
 * A literal token.
 *
 * `value` keeps the token text as written: numbers stay unparsed (`'10'`) so
 * that integer checks can reject `1.5` or `1e3` on their own terms.
 */
export type Literal = {
  type: 'Literal';
  value: string;
  isString: boolean;
};

/** `TRUE` / `FALSE`. */
export type BooleanLiteral = {
  type: 'Boolean';
  value: boolean;
};

/** `NULL`. */
export type NullLiteral = {
  type: 'Null';
};

/** A bare keyword-like name that is not a column reference. */
export type Var = {
  type: 'Var';
  name: string;
};

/** A parenthesized, comma-separated list: `(ds, '%Y-%m-%d')`. */
export type Tuple = {
  type: 'Tuple';
  expressions: Expression[];
};

/** A named property inside a kind clause: `time_column ds`. */
export type Property = {
  type: 'Property';
  key: string;
  value: Expression;
};

/**
 * The kind clause itself: a tag followed by zero or more properties.
 *
 * ```sql
 * INCREMENTAL_BY_TIME_RANGE (time_column ds, batch_size 10)
 * ```
 */
export type ModelKindNode = {
  type: 'ModelKind';
  name: string;
  properties: Property[];
};

export type Expression =
  | Identifier
  | Column
  | Literal
  | BooleanLiteral
  | NullLiteral
  | Var
  | Tuple
  | Property
  | ModelKindNode;

export type ExpressionType = Expression['type'];
