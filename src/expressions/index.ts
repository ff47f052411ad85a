export type {
  BooleanLiteral,
  Column,
  Expression,
  ExpressionType,
  Identifier,
  Literal,
  ModelKindNode,
  NullLiteral,
  Property,
  Tuple,
  Var
} from './types';

export {
  booleanLiteral,
  column,
  identifier,
  modelKindNode,
  nullLiteral,
  numberLiteral,
  property,
  stringLiteral,
  toColumn,
  tuple,
  variable
} from './builders';

export { is as isNode, isExpression, nameOf } from './guards';
export { toSql } from './generator';
export { parseExpression, parseModelKind } from './parser';
