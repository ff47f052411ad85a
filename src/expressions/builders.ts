import type {
  BooleanLiteral,
  Column,
  Expression,
  Identifier,
  Literal,
  ModelKindNode,
  NullLiteral,
  Property,
  Tuple,
  Var
} from './types';

/**
 * Names that can be written without quotes.
 *
 * Anything else (spaces, dashes, leading digits, ...) and the literal
 * keywords are emitted as quoted identifiers so that the rendered SQL parses
 * back to the same name.
 */
const SAFE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Words the parser reads as literals, in any case. */
const RESERVED_WORDS: ReadonlySet<string> = new Set(['TRUE', 'FALSE', 'NULL']);

function needsQuotes(name: string): boolean {
  return !SAFE_IDENTIFIER.test(name) || RESERVED_WORDS.has(name.toUpperCase());
}

export function identifier(
  name: string,
  quoted = needsQuotes(name)
): Identifier {
  return { type: 'Identifier', name, quoted };
}

export function column(name: string | Identifier, table?: Identifier): Column {
  const node: Column = {
    type: 'Column',
    name: typeof name === 'string' ? identifier(name) : name
  };
  if (table) node.table = table;
  return node;
}

/**
 * Builds a column reference for a stored column name.
 *
 * The whole name becomes a single identifier: `'event date'` renders as
 * `"event date"`, never as a table-qualified reference.
 */
export function toColumn(name: string): Column {
  return column(identifier(name));
}

export function stringLiteral(value: string): Literal {
  return { type: 'Literal', value, isString: true };
}

export function numberLiteral(value: number | string): Literal {
  return { type: 'Literal', value: String(value), isString: false };
}

export function booleanLiteral(value: boolean): BooleanLiteral {
  return { type: 'Boolean', value };
}

export function nullLiteral(): NullLiteral {
  return { type: 'Null' };
}

export function variable(name: string): Var {
  return { type: 'Var', name };
}

export function tuple(expressions: Expression[]): Tuple {
  return { type: 'Tuple', expressions };
}

export function property(key: string, value: Expression): Property {
  return { type: 'Property', key, value };
}

export function modelKindNode(
  name: string,
  properties: Property[] = []
): ModelKindNode {
  return { type: 'ModelKind', name, properties };
}
