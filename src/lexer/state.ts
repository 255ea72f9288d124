/**
 * Lexer State
 * Cursor over the source text plus token construction at the cursor
 */

import type { SourceLocation } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return { source, pos: 0, line: 1, column: 1 };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

/** Character `offset` places ahead, or '' past the end */
export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

/** Next `length` characters without consuming them */
export function lookahead(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function advance(state: LexerState): string {
  const ch = peek(state);
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

/** Token ending at the cursor */
export function finishToken(
  state: LexerState,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  return { type, value, span: { start, end: currentLocation(state) } };
}

/** Consume `length` characters as one token of `type` */
export function consumeToken(
  state: LexerState,
  length: number,
  type: TokenType
): Token {
  const start = currentLocation(state);
  const value = lookahead(state, length);
  for (let i = 0; i < length; i++) advance(state);
  return finishToken(state, type, value, start);
}
