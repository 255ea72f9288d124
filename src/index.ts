/**
 * Grove Module
 * Exports lexer, parser, runtime, errors and AST types
 */

export { tokenize } from './lexer/index.js';
export { parse } from './parser/index.js';
export * from './runtime/index.js';

export {
  createError,
  createRuntimeError,
  getCallStack,
  GroveError,
  LexerError,
  ParseError,
  RuntimeError,
  type CallFrame,
  type GroveErrorData,
} from './error-classes.js';

export {
  ERROR_REGISTRY,
  GROVE_ERROR_CODES,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  type GroveErrorCode,
} from './error-registry.js';

export type { SourceLocation, SourceSpan } from './source-location.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export type * from './ast-nodes.js';
