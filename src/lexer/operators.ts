/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '&&': TOKEN_TYPES.AND,
  '||': TOKEN_TYPES.OR,
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
  '!': TOKEN_TYPES.BANG,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
};

/** Keyword lookup table */
export const KEYWORDS: Readonly<Record<string, TokenType>> = {
  let: TOKEN_TYPES.LET,
  if: TOKEN_TYPES.IF,
  else: TOKEN_TYPES.ELSE,
  while: TOKEN_TYPES.WHILE,
  fn: TOKEN_TYPES.FN,
  return: TOKEN_TYPES.RETURN,
  print: TOKEN_TYPES.PRINT,
  input: TOKEN_TYPES.INPUT,
  true: TOKEN_TYPES.TRUE,
  false: TOKEN_TYPES.FALSE,
  not: TOKEN_TYPES.BANG,
};
