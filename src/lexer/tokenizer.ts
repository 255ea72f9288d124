/**
 * Tokenizer
 * Main tokenization logic
 */

import { LexerError } from '../error-classes.js';
import { GROVE_ERROR_CODES } from '../error-registry.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { isDigit, isIdentifierStart, isWhitespace } from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  consumeToken,
  createLexerState,
  currentLocation,
  finishToken,
  isAtEnd,
  type LexerState,
  lookahead,
  peek,
} from './state.js';

/** Skip whitespace and `//` line comments */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    if (isWhitespace(peek(state))) {
      advance(state);
    } else if (lookahead(state, 2) === '//') {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
    } else {
      return;
    }
  }
}

function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    return finishToken(state, TOKEN_TYPES.EOF, '', currentLocation(state));
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  // Number (positive only - unary minus handled by parser)
  if (isDigit(ch)) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  const twoCharType = TWO_CHAR_OPERATORS[lookahead(state, 2)];
  if (twoCharType) {
    return consumeToken(state, 2, twoCharType);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return consumeToken(state, 1, singleCharType);
  }

  throw new LexerError(
    GROVE_ERROR_CODES.INVALID_CHARACTER,
    `Unexpected character: ${ch}`,
    start,
    { char: ch }
  );
}

export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
