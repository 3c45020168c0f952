// src/parser.ts - Recursive descent parser that evaluates as it parses
//
//   expr   -> term (('+' | '-') term)*
//   term   -> factor (('*' | '/') factor)*
//   factor -> ('+' | '-') factor | atom
//   atom   -> NUMBER | '(' expr ')'
import {
  DEFAULT_MAX_DEPTH,
  EvaluateOptions,
  NumberValue,
  Operator,
  Token,
} from './types';
import { ParseError } from './errors';
import {
  add,
  divide,
  multiply,
  negate,
  parseNumberLiteral,
  subtract,
} from './numbers';

class Parser {
  private tokens: Token[];
  private pos: number = 0;
  private depth: number = 0;
  private maxDepth: number;
  constructor(tokens: Token[], options: EvaluateOptions = {}) {
    this.tokens = tokens;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }
  parse(): NumberValue {
    const result = this.parseExpr();
    const trailing = this.peek();
    if (trailing) {
      throw new ParseError(
        `Unexpected token: '${trailing.value}'`,
        trailing.position
      );
    }
    return result;
  }
  private parseExpr(): NumberValue {
    let left = this.parseTerm();
    let op = this.peekOperator('+', '-');
    while (op) {
      this.advance();
      const right = this.parseTerm();
      left = op === '+' ? add(left, right) : subtract(left, right);
      op = this.peekOperator('+', '-');
    }
    return left;
  }
  private parseTerm(): NumberValue {
    let left = this.parseFactor();
    let op = this.peekOperator('*', '/');
    while (op) {
      const token = this.advance();
      const right = this.parseFactor();
      left =
        op === '*' ? multiply(left, right) : divide(left, right, token?.position);
      op = this.peekOperator('*', '/');
    }
    return left;
  }
  private parseFactor(): NumberValue {
    const op = this.peekOperator('+', '-');
    if (!op) return this.parseAtom();
    const token = this.advance();
    this.enter(token);
    const operand = this.parseFactor();
    this.depth--;
    return op === '-' ? negate(operand) : operand;
  }
  private parseAtom(): NumberValue {
    const token = this.peek();
    if (!token) {
      throw new ParseError('Unexpected end of expression');
    }
    if (token.type === 'lparen') {
      this.advance();
      this.enter(token);
      const result = this.parseExpr();
      this.expectClose();
      this.depth--;
      return result;
    }
    if (token.type === 'number') {
      this.advance();
      return parseNumberLiteral(token.value, token.position);
    }
    throw new ParseError(`Unexpected token: '${token.value}'`, token.position);
  }
  private enter(token: Token | undefined): void {
    this.depth++;
    if (this.depth > this.maxDepth) {
      throw new ParseError(
        `Maximum nesting depth of ${this.maxDepth} exceeded`,
        token?.position
      );
    }
  }
  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }
  private peekOperator<T extends Operator>(...ops: T[]): T | undefined {
    const token = this.peek();
    if (token?.type !== 'operator') return undefined;
    return ops.find((op) => op === token.value);
  }
  private advance(): Token | undefined {
    const token = this.peek();
    this.pos++;
    return token;
  }
  private expectClose(): void {
    const token = this.advance();
    if (token?.type === 'rparen') return;
    if (!token) {
      throw new ParseError("Expected ')', got end of expression");
    }
    throw new ParseError(
      `Expected ')', got '${token.value}'`,
      token.position
    );
  }
}

export function parse(tokens: Token[], options?: EvaluateOptions): NumberValue {
  const parser = new Parser(tokens, options);
  try {
    return parser.parse();
  } catch (e: unknown) {
    // Call stack exhausted before maxDepth was reached
    if (e instanceof RangeError) {
      throw new ParseError('Expression nested too deeply');
    }
    throw e;
  }
}
