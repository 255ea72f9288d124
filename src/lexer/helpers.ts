/**
 * Character classes for Grove source text
 */

import { peek, type LexerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isIdentifierStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/** Newlines are plain whitespace: statements end with `;` */
export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

/** `.` followed by a digit continues a number literal */
export function atFraction(state: LexerState): boolean {
  return peek(state) === '.' && isDigit(peek(state, 1));
}

/** `e`/`E`, optional sign, then a digit */
export function atExponent(state: LexerState): boolean {
  const marker = peek(state);
  if (marker !== 'e' && marker !== 'E') return false;
  const next = peek(state, 1);
  if (next === '+' || next === '-') return isDigit(peek(state, 2));
  return isDigit(next);
}
