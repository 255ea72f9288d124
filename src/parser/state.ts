/**
 * Parser State
 * Core state management and token navigation utilities
 */

import { ParseError } from '../error-classes.js';
import { GROVE_ERROR_CODES } from '../error-registry.js';
import type { SourceLocation, SourceSpan } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
}

export function createParserState(tokens: Token[]): ParserState {
  return { tokens, pos: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Human-readable token text for error messages */
export function describeToken(token: Token): string {
  return token.type === TOKEN_TYPES.EOF ? 'end of input' : token.value;
}

/**
 * Consume a token of `type` or throw.
 * `expected` describes the token for the error message, e.g. "')'".
 *
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const message = `Expected ${expected}, got: ${describeToken(token)}`;
  const hint = generateHint(type, token);
  throw new ParseError(
    GROVE_ERROR_CODES.UNEXPECTED_TOKEN,
    hint ? `${message}. ${hint}` : message,
    token.span.start,
    { expected, actual: describeToken(token) }
  );
}

// ============================================================
// ERROR HINTS
// ============================================================

const TYPO_HINTS: Readonly<Record<string, string>> = {
  var: 'let',
  const: 'let',
  fun: 'fn',
  func: 'fn',
  function: 'fn',
  def: 'fn',
  elif: 'else if',
  retrun: 'return',
  pritn: 'print',
  tru: 'true',
  fasle: 'false',
};

/** Suggest a keyword for a likely misspelling */
export function keywordHint(word: string): string | null {
  const suggestion = Object.hasOwn(TYPO_HINTS, word)
    ? TYPO_HINTS[word]
    : undefined;
  return suggestion ? `Hint: Did you mean '${suggestion}'?` : null;
}

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(expectedType: TokenType, actualToken: Token): string | null {
  const actual = actualToken.type;

  if (expectedType === TOKEN_TYPES.RPAREN && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed parenthesis';
  }
  if (expectedType === TOKEN_TYPES.LBRACE) {
    return 'Hint: Bodies of if, else, while and fn need braces';
  }
  if (actual === TOKEN_TYPES.IDENTIFIER) {
    return keywordHint(actualToken.value);
  }
  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Span from `start` to the end of the most recently consumed token */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  const previous = state.tokens[state.pos - 1];
  return makeSpan(start, previous ? previous.span.end : start);
}
