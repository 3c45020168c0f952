// src/types.ts - Core interfaces and types for the expression evaluator

/**
 * Binary and unary operator symbols.
 */
export const operators = ['+', '-', '*', '/'] as const;
export type Operator = (typeof operators)[number];

/**
 * Token: Basic unit from lexing, with type, original text, and position.
 */
export type Token =
  | { type: 'operator'; value: Operator; position: number }
  | { type: 'lparen'; value: '('; position: number }
  | { type: 'rparen'; value: ')'; position: number }
  | { type: 'number'; value: string; position: number }; // Literal text, unconverted

/**
 * Numeric value: exact integer or double. Division always yields a float.
 */
export type NumberValue =
  | { kind: 'int'; value: bigint }
  | { kind: 'float'; value: number };

/**
 * Evaluation Error: Structured error details.
 */
export interface EvalError {
  type: 'lex' | 'parse';
  message: string;
  position?: number; // Zero-based, in code points
}

/**
 * Evaluation Result: Output from the non-throwing evaluator.
 */
export type EvalResult =
  | { ok: true; value: NumberValue }
  | { ok: false; error: EvalError };

export interface EvaluateOptions {
  maxDepth?: number; // Nested parens plus unary prefixes
}

export const DEFAULT_MAX_DEPTH = 1000;
