/**
 * Grove Lexer
 * Converts source text into tokens
 */

export { tokenize } from './tokenizer.js';
