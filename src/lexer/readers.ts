/**
 * Token Readers
 * Functions to read specific token types from source
 */

import { LexerError } from '../error-classes.js';
import { GROVE_ERROR_CODES } from '../error-registry.js';
import { INTEGER_MAX } from '../runtime/core/values.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  atExponent,
  atFraction,
  isDigit,
  isIdentifierChar,
} from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  finishToken,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Process escape sequence and return the unescaped character */
function processEscape(state: LexerState): string {
  const location = currentLocation(state);
  const escaped = advance(state);
  switch (escaped) {
    case 'n':
      return '\n';
    case 'r':
      return '\r';
    case 't':
      return '\t';
    case '\\':
      return '\\';
    case '"':
      return '"';
    default:
      throw new LexerError(
        GROVE_ERROR_CODES.INVALID_ESCAPE,
        `Invalid escape sequence: \\${escaped}`,
        location,
        { char: escaped }
      );
  }
}

/** Double-quoted string on a single line */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (peek(state) !== '"') {
    if (isAtEnd(state) || peek(state) === '\n') {
      throw new LexerError(
        GROVE_ERROR_CODES.UNTERMINATED_STRING,
        'Unterminated string literal',
        start
      );
    }
    if (peek(state) === '\\') {
      advance(state);
      value += processEscape(state);
    } else {
      value += advance(state);
    }
  }
  advance(state); // consume closing "

  return finishToken(state, TOKEN_TYPES.STRING, value, start);
}

function readDigits(state: LexerState): string {
  let digits = '';
  while (isDigit(peek(state))) {
    digits += advance(state);
  }
  return digits;
}

/**
 * Integer or float literal. Unary minus is handled by the parser, so
 * integer literals must fit the positive 64-bit range.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let text = readDigits(state);
  let isFloat = false;

  if (atFraction(state)) {
    isFloat = true;
    text += advance(state);
    text += readDigits(state);
  }

  if (atExponent(state)) {
    isFloat = true;
    text += advance(state);
    if (!isDigit(peek(state))) text += advance(state);
    text += readDigits(state);
  }

  if (isFloat) {
    return finishToken(state, TOKEN_TYPES.FLOAT, text, start);
  }

  if (BigInt(text) > INTEGER_MAX) {
    throw new LexerError(
      GROVE_ERROR_CODES.INVALID_NUMBER,
      `Invalid number literal: ${text}`,
      start,
      { value: text }
    );
  }
  return finishToken(state, TOKEN_TYPES.INTEGER, text, start);
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';
  while (isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const keyword = Object.hasOwn(KEYWORDS, value) ? KEYWORDS[value] : undefined;
  return finishToken(state, keyword ?? TOKEN_TYPES.IDENTIFIER, value, start);
}
