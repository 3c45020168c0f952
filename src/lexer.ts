// src/lexer.ts - Arithmetic expression tokenizer
import { Operator, Token } from './types';
import { LexError } from './errors';

// ASCII digits only: other Unicode decimal digits (U+0663 and the like) are
// rejected as unexpected characters. Whitespace is whatever /\s/ matches, so
// the U+001C..U+001F separators and U+0085 are not skipped.
const isDigit = (c: string) => /[0-9]/.test(c);
const isOperator = (c: string): c is Operator =>
  c === '+' || c === '-' || c === '*' || c === '/';

export function lex(input: string): Token[] {
  const tokens: Token[] = [];
  // Positions count code points, not UTF-16 units
  const chars = Array.from(input);
  let pos = 0;
  while (pos < chars.length) {
    const char = chars[pos];
    // Skip whitespace
    if (/\s/.test(char)) {
      pos++;
      continue;
    }
    if (isOperator(char)) {
      tokens.push({ type: 'operator', value: char, position: pos });
      pos++;
      continue;
    }
    if (char === '(') {
      tokens.push({ type: 'lparen', value: char, position: pos });
      pos++;
      continue;
    }
    if (char === ')') {
      tokens.push({ type: 'rparen', value: char, position: pos });
      pos++;
      continue;
    }
    // Number: digits with at most one dot. A second dot starts a new literal.
    if (isDigit(char) || char === '.') {
      const start = pos;
      let hasDot = char === '.';
      pos++;
      while (
        pos < chars.length &&
        (isDigit(chars[pos]) || (chars[pos] === '.' && !hasDot))
      ) {
        if (chars[pos] === '.') hasDot = true;
        pos++;
      }
      tokens.push({
        type: 'number',
        value: chars.slice(start, pos).join(''),
        position: start,
      });
      continue;
    }
    throw new LexError(char, pos);
  }
  return tokens;
}
