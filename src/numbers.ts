// src/numbers.ts - Tagged int/float arithmetic and result formatting
import { NumberValue } from './types';
import { ParseError } from './errors';

const literalPattern = /^(\d+\.?\d*|\.\d+)$/;

export const int = (value: bigint): NumberValue => ({ kind: 'int', value });
export const float = (value: number): NumberValue => ({ kind: 'float', value });

export function toNumber(n: NumberValue): number {
  return n.kind === 'int' ? Number(n.value) : n.value;
}

export function isZero(n: NumberValue): boolean {
  return n.kind === 'int' ? n.value === 0n : n.value === 0; // -0.0 included
}

/**
 * Literal text without a decimal point is an int, anything else a float.
 */
export function parseNumberLiteral(text: string, position?: number): NumberValue {
  if (!literalPattern.test(text)) {
    throw new ParseError(`Invalid number: '${text}'`, position);
  }
  return text.includes('.') ? float(Number(text)) : int(BigInt(text));
}

export function add(left: NumberValue, right: NumberValue): NumberValue {
  if (left.kind === 'int' && right.kind === 'int') {
    return int(left.value + right.value);
  }
  return float(toNumber(left) + toNumber(right));
}

export function subtract(left: NumberValue, right: NumberValue): NumberValue {
  if (left.kind === 'int' && right.kind === 'int') {
    return int(left.value - right.value);
  }
  return float(toNumber(left) - toNumber(right));
}

export function multiply(left: NumberValue, right: NumberValue): NumberValue {
  if (left.kind === 'int' && right.kind === 'int') {
    return int(left.value * right.value);
  }
  return float(toNumber(left) * toNumber(right));
}

// True division: the result is a float even when both sides are ints.
export function divide(
  left: NumberValue,
  right: NumberValue,
  position?: number
): NumberValue {
  if (isZero(right)) {
    throw new ParseError('Division by zero', position);
  }
  return float(toNumber(left) / toNumber(right));
}

export function negate(n: NumberValue): NumberValue {
  return n.kind === 'int' ? int(-n.value) : float(-n.value);
}

function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  // Whole floats print without a decimal point
  if (Number.isInteger(value)) return BigInt(value).toString();
  if (Math.abs(value) < 1e-4) {
    // 1e-5 -> 1e-05
    return value
      .toExponential()
      .replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);
  }
  return String(value);
}

export function formatNumber(n: NumberValue): string {
  return n.kind === 'int' ? n.value.toString() : formatFloat(n.value);
}
