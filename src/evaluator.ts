// src/evaluator.ts - lex → parse pipeline over a single input string
import { EvalResult, EvaluateOptions, NumberValue } from './types';
import { CalcError } from './errors';
import { lex } from './lexer';
import { parse } from './parser';
import { formatNumber } from './numbers';

/**
 * Evaluate an expression, throwing LexError or ParseError on the first problem.
 */
export function evaluate(input: string, options?: EvaluateOptions): NumberValue {
  const tokens = lex(input);
  return parse(tokens, options);
}

/**
 * Same as {@link evaluate}, but lexer and parser failures come back as values.
 */
export function tryEvaluate(input: string, options?: EvaluateOptions): EvalResult {
  try {
    return { ok: true, value: evaluate(input, options) };
  } catch (e: unknown) {
    if (e instanceof CalcError) {
      return { ok: false, error: e.toEvalError() };
    }
    throw e;
  }
}

export function calculate(input: string, options?: EvaluateOptions): string {
  return formatNumber(evaluate(input, options));
}
