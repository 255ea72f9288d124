/**
 * Grove Parser
 * Main entry point and re-exports
 */

import type { ScriptNode } from '../ast-nodes.js';
import { tokenize } from '../lexer/index.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';
import './parser-literals.js';

/**
 * Parse Grove source code into an AST.
 *
 * Throws LexerError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('let x = 1 + 2;\nprint(x);');
 * ```
 */
export function parse(source: string): ScriptNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens);
  return parser.parse();
}

export { Parser } from './parser.js';
