/**
 * Equation Parser
 *
 * Tokenizes and parses the equation mini-language into an expression tree:
 *
 *   expression := additive
 *   additive   := multiplicative (('+' | '-') multiplicative)*
 *   multiplicative := unary (('*' | '/' | '%') unary)*
 *   unary      := '-' unary | power
 *   power      := primary ('**' unary)?
 *   primary    := NUMBER | NAME | NAME '(' arguments? ')' | '(' expression ')'
 *   arguments  := argument (',' argument)*
 *   argument   := NAME '=' expression | expression
 *
 * `**` is right-associative and binds tighter than unary minus, so `-2**2`
 * is `-(2**2)`. Keyword arguments must follow positional ones.
 */

import { ParseError } from '../errors.js';

// ============================================================================
// Tokens
// ============================================================================

export type TokenKind = 'number' | 'name' | 'punct' | 'end';

export interface Token {
  kind: TokenKind;
  text: string;
  position: number;
}

const NUMBER_PATTERN = /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const NAME_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;
const PUNCTUATION = ['**', '+', '-', '*', '/', '%', '(', ')', ',', '='] as const;

/**
 * Split equation text into tokens
 *
 * @throws ParseError on characters outside the language
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  while (position < text.length) {
    const char = text[position];
    if (/\s/.test(char)) {
      position++;
      continue;
    }

    NUMBER_PATTERN.lastIndex = position;
    const number = NUMBER_PATTERN.exec(text);
    if (number) {
      tokens.push({ kind: 'number', text: number[0], position });
      position += number[0].length;
      continue;
    }

    NAME_PATTERN.lastIndex = position;
    const name = NAME_PATTERN.exec(text);
    if (name) {
      tokens.push({ kind: 'name', text: name[0], position });
      position += name[0].length;
      continue;
    }

    const punct = PUNCTUATION.find((p) => text.startsWith(p, position));
    if (punct === undefined) {
      throw new ParseError(`Unexpected character '${char}'`, position);
    }
    tokens.push({ kind: 'punct', text: punct, position });
    position += punct.length;
  }

  tokens.push({ kind: 'end', text: '', position });
  return tokens;
}

// ============================================================================
// Expression Tree
// ============================================================================

export type BinaryOperator = '+' | '-' | '*' | '/' | '**' | '%';

export interface NumberExpression {
  kind: 'number';
  value: number;
  position: number;
}

export interface NameExpression {
  kind: 'name';
  name: string;
  position: number;
}

export interface BinaryExpression {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
  position: number;
}

export interface UnaryExpression {
  kind: 'unary';
  operator: '-';
  operand: Expression;
  position: number;
}

export interface CallExpression {
  kind: 'call';
  callee: string;
  args: Expression[];
  kwargs: Array<[string, Expression]>;
  position: number;
}

export type Expression =
  | NumberExpression
  | NameExpression
  | BinaryExpression
  | UnaryExpression
  | CallExpression;

// ============================================================================
// Parser
// ============================================================================

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Expression {
    const expression = this.parseAdditive();
    const rest = this.peek();
    if (rest.kind !== 'end') {
      throw new ParseError(`Unexpected '${rest.text}'`, rest.position);
    }
    return expression;
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    for (let token = this.peek(); this.isPunct(token, '+', '-'); token = this.peek()) {
      this.index++;
      const right = this.parseMultiplicative();
      left = { kind: 'binary', operator: asBinary(token.text), left, right, position: token.position };
    }
    return left;
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    for (let token = this.peek(); this.isPunct(token, '*', '/', '%'); token = this.peek()) {
      this.index++;
      const right = this.parseUnary();
      left = { kind: 'binary', operator: asBinary(token.text), left, right, position: token.position };
    }
    return left;
  }

  private parseUnary(): Expression {
    const token = this.peek();
    if (this.isPunct(token, '-')) {
      this.index++;
      return { kind: 'unary', operator: '-', operand: this.parseUnary(), position: token.position };
    }
    return this.parsePower();
  }

  private parsePower(): Expression {
    const base = this.parsePrimary();
    const token = this.peek();
    if (this.isPunct(token, '**')) {
      this.index++;
      const exponent = this.parseUnary();
      return { kind: 'binary', operator: '**', left: base, right: exponent, position: token.position };
    }
    return base;
  }

  private parsePrimary(): Expression {
    const token = this.next();

    if (token.kind === 'number') {
      return { kind: 'number', value: Number(token.text), position: token.position };
    }

    if (token.kind === 'name') {
      if (this.isPunct(this.peek(), '(')) {
        this.index++;
        return this.parseCall(token);
      }
      return { kind: 'name', name: token.text, position: token.position };
    }

    if (this.isPunct(token, '(')) {
      const inner = this.parseAdditive();
      this.expect(')');
      return inner;
    }

    if (token.kind === 'end') {
      throw new ParseError('Unexpected end of input', token.position);
    }
    throw new ParseError(`Unexpected '${token.text}'`, token.position);
  }

  private parseCall(callee: Token): CallExpression {
    const call: CallExpression = {
      kind: 'call',
      callee: callee.text,
      args: [],
      kwargs: [],
      position: callee.position,
    };

    if (this.isPunct(this.peek(), ')')) {
      this.index++;
      return call;
    }

    for (;;) {
      const token = this.peek();
      if (token.kind === 'name' && this.isPunct(this.peek(1), '=')) {
        this.index += 2;
        if (call.kwargs.some(([key]) => key === token.text)) {
          throw new ParseError(`Duplicate keyword '${token.text}'`, token.position);
        }
        call.kwargs.push([token.text, this.parseAdditive()]);
      } else {
        if (call.kwargs.length > 0) {
          throw new ParseError('Positional argument follows keyword argument', token.position);
        }
        call.args.push(this.parseAdditive());
      }

      const separator = this.next();
      if (this.isPunct(separator, ')')) return call;
      if (!this.isPunct(separator, ',')) {
        throw new ParseError("Expected ',' or ')'", separator.position);
      }
    }
  }

  private peek(offset: number = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'end') this.index++;
    return token;
  }

  private expect(text: string): void {
    const token = this.next();
    if (!this.isPunct(token, text)) {
      throw new ParseError(`Expected '${text}'`, token.position);
    }
  }

  private isPunct(token: Token, ...texts: string[]): boolean {
    return token.kind === 'punct' && texts.includes(token.text);
  }
}

const BINARY_OPERATORS: readonly BinaryOperator[] = ['+', '-', '*', '/', '**', '%'];

function asBinary(text: string): BinaryOperator {
  const operator = BINARY_OPERATORS.find((candidate) => candidate === text);
  if (operator === undefined) {
    throw new Error(`Not a binary operator: ${text}`);
  }
  return operator;
}

/**
 * Parse equation text into an expression tree
 *
 * @throws ParseError on malformed input
 */
export function parseEquation(text: string): Expression {
  return new Parser(tokenize(text)).parse();
}
