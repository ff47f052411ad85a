import type { Expression, Identifier, ModelKindNode, Property } from './types';

import { ConfigurationError } from '../errors';
import {
  booleanLiteral,
  column,
  identifier,
  modelKindNode,
  nullLiteral,
  numberLiteral,
  property,
  stringLiteral,
  tuple
} from './builders';

type TokenKind =
  | 'name'
  | 'quoted'
  | 'string'
  | 'number'
  | 'lparen'
  | 'rparen'
  | 'comma'
  | 'dot'
  | 'eof';

type Token = {
  kind: TokenKind;
  text: string;
  offset: number;
};

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

const PUNCTUATION: Readonly<Record<string, TokenKind>> = {
  '(': 'lparen',
  ')': 'rparen',
  ',': 'comma',
  '.': 'dot'
};

function syntaxError(source: string, offset: number, message: string): never {
  throw new ConfigurationError(
    `${message} at position ${offset} in ${JSON.stringify(source)}`
  );
}

/**
 * Reads a delimited token (`'...'` or `"..."`) where a doubled delimiter
 * stands for the delimiter itself.
 *
 * @returns The unescaped contents and the offset just past the closing delimiter.
 */
function readDelimited(
  source: string,
  start: number,
  delimiter: string
): { text: string; end: number } {
  let text = '';
  let index = start + 1;

  while (index < source.length) {
    const char = source[index];
    if (char === delimiter) {
      if (source[index + 1] === delimiter) {
        text += delimiter;
        index += 2;
        continue;
      }
      return { text, end: index + 1 };
    }
    text += char;
    index += 1;
  }

  return syntaxError(source, start, 'Unterminated quoted text');
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source.charAt(index);

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation) {
      tokens.push({ kind: punctuation, text: char, offset: index });
      index += 1;
      continue;
    }

    if (char === "'" || char === '"') {
      const { text, end } = readDelimited(source, index, char);
      tokens.push({
        kind: char === "'" ? 'string' : 'quoted',
        text,
        offset: index
      });
      index = end;
      continue;
    }

    // Numbers keep their token text; signs are part of the literal.
    const signed =
      (char === '-' || char === '+') && DIGIT.test(source.charAt(index + 1));
    if (DIGIT.test(char) || signed) {
      let end = index + 1;
      while (end < source.length && /[0-9.eE]/.test(source.charAt(end))) {
        end += 1;
      }
      tokens.push({
        kind: 'number',
        text: source.slice(index, end),
        offset: index
      });
      index = end;
      continue;
    }

    if (NAME_START.test(char)) {
      let end = index + 1;
      while (end < source.length && NAME_PART.test(source.charAt(end))) {
        end += 1;
      }
      tokens.push({
        kind: 'name',
        text: source.slice(index, end),
        offset: index
      });
      index = end;
      continue;
    }

    syntaxError(source, index, `Unexpected character '${char}'`);
  }

  tokens.push({ kind: 'eof', text: '', offset: source.length });
  return tokens;
}

/**
 * Recursive-descent reader over the token stream of a single input.
 */
class Reader {
  private position = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: readonly Token[]
  ) {}

  private peek(): Token {
    // The stream always ends with an `eof` token; reads past it stay there.
    return this.tokens[Math.min(this.position, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.position += 1;
    return token;
  }

  private expect(kind: TokenKind, description: string): Token {
    const token = this.next();
    if (token.kind !== kind) {
      syntaxError(
        this.source,
        token.offset,
        `Expected ${description} but found ${token.kind === 'eof' ? 'end of input' : `'${token.text}'`}`
      );
    }
    return token;
  }

  end(): void {
    this.expect('eof', 'end of input');
  }

  modelKind(): ModelKindNode {
    const tag = this.expect('name', 'a model kind name');
    const properties: Property[] = [];

    if (this.peek().kind === 'lparen') {
      this.next();
      while (this.peek().kind !== 'rparen') {
        properties.push(this.property());
        if (this.peek().kind !== 'comma') break;
        this.next();
      }
      this.expect('rparen', "')'");
    }

    return modelKindNode(tag.text.toUpperCase(), properties);
  }

  property(): Property {
    const key = this.expect('name', 'a property name');
    return property(key.text.toLowerCase(), this.value());
  }

  value(): Expression {
    const token = this.next();

    switch (token.kind) {
      case 'lparen': {
        const expressions: Expression[] = [this.value()];
        while (this.peek().kind === 'comma') {
          this.next();
          expressions.push(this.value());
        }
        this.expect('rparen', "')'");
        return tuple(expressions);
      }
      case 'string':
        return stringLiteral(token.text);
      case 'number':
        return numberLiteral(token.text);
      case 'quoted':
        return this.columnFrom(identifier(token.text, true));
      case 'name': {
        const keyword = token.text.toUpperCase();
        if (keyword === 'TRUE' || keyword === 'FALSE') {
          return booleanLiteral(keyword === 'TRUE');
        }
        if (keyword === 'NULL') return nullLiteral();
        return this.columnFrom(identifier(token.text, false));
      }
      default:
        return syntaxError(
          this.source,
          token.offset,
          `Expected a value but found ${token.kind === 'eof' ? 'end of input' : `'${token.text}'`}`
        );
    }
  }

  private columnFrom(first: Identifier): Expression {
    if (this.peek().kind !== 'dot') return column(first);

    this.next();
    const part = this.next();
    if (part.kind === 'name') return column(identifier(part.text, false), first);
    if (part.kind === 'quoted') return column(identifier(part.text, true), first);

    return syntaxError(
      this.source,
      part.offset,
      "Expected a column name after '.'"
    );
  }
}

/**
 * Parses a single value expression: a column reference, literal, boolean,
 * `NULL`, or a parenthesized tuple of values.
 *
 * @throws {ConfigurationError} On malformed input or trailing tokens.
 *
 * @example
 * ```ts
 * parseExpression("(ds, '%Y-%m-%d')"); // Tuple [Column ds, Literal '%Y-%m-%d']
 * ```
 */
export function parseExpression(source: string): Expression {
  const reader = new Reader(source, tokenize(source));
  const expression = reader.value();
  reader.end();
  return expression;
}

/**
 * Parses the kind clause of a model definition.
 *
 * Grammar:
 * ```
 * kind     := NAME [ '(' [ property (',' property)* [','] ] ')' ]
 * property := KEY value
 * ```
 *
 * The tag is upper-cased and property keys are lower-cased; SQL keywords are
 * case-insensitive, while the rest of the package compares them exactly.
 *
 * @throws {ConfigurationError} On malformed input or trailing tokens.
 *
 * @example
 * ```ts
 * parseModelKind('incremental_by_time_range (time_column ds, lookback 2)');
 * ```
 */
export function parseModelKind(source: string): ModelKindNode {
  const reader = new Reader(source, tokenize(source));
  const node = reader.modelKind();
  reader.end();
  return node;
}
