/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ScriptNode } from '../ast-nodes.js';
import type { Token } from '../token-types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: script, statements, assignments, I/O statements
 * - parser-control.ts: if/else, while, blocks, return
 * - parser-functions.ts: function declarations and calls
 * - parser-expr.ts: precedence chain, unary operators
 * - parser-literals.ts: primary expressions and literals
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  parse(): ScriptNode {
    return this.parseScript();
  }
}
