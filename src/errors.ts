// src/errors.ts - Error kinds raised by the lexer and parser
import { EvalError } from './types';

export abstract class CalcError extends Error {
  abstract readonly type: EvalError['type'];
  readonly position?: number;

  constructor(message: string, position?: number) {
    super(message);
    this.name = new.target.name;
    this.position = position;
  }

  toEvalError(): EvalError {
    const error: EvalError = { type: this.type, message: this.message };
    if (this.position !== undefined) error.position = this.position;
    return error;
  }
}

/**
 * Unrecognized character while scanning.
 */
export class LexError extends CalcError {
  readonly type = 'lex';
  readonly character: string;
  declare readonly position: number;

  constructor(character: string, position: number) {
    super(`Unexpected character: '${character}' at position ${position}`, position);
    this.character = character;
  }
}

/**
 * Grammar violation, malformed literal, or division by zero.
 */
export class ParseError extends CalcError {
  readonly type = 'parse';
}
