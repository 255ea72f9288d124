/**
 * Parser Extension: Functions
 * Declarations and calls
 */

import type {
  ExpressionNode,
  FunctionCallNode,
  FunctionDeclarationNode,
} from '../ast-nodes.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Parser } from './parser.js';
import { advance, check, expect, spanFrom } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseFunctionDeclaration(): FunctionDeclarationNode;
    parseFunctionCall(name: Token): FunctionCallNode;
  }
}

/**
 * fn NAME ( [NAME {, NAME}] ) block
 * Duplicate parameter names are left to the runtime, which rejects them
 * when the call frame is built.
 */
Parser.prototype.parseFunctionDeclaration = function (
  this: Parser
): FunctionDeclarationNode {
  const start = expect(this.state, TOKEN_TYPES.FN, "'fn'").span.start;
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'function name');
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");

  const params: string[] = [];
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    do {
      params.push(
        expect(this.state, TOKEN_TYPES.IDENTIFIER, 'parameter name').value
      );
    } while (check(this.state, TOKEN_TYPES.COMMA) && advance(this.state));
  }
  expect(this.state, TOKEN_TYPES.RPAREN, "')'");

  const body = this.parseBlock();

  return {
    type: 'FunctionDeclaration',
    name: name.value,
    params,
    body,
    span: spanFrom(this.state, start),
  };
};

/** NAME ( [expr {, expr}] ), called with NAME already consumed */
Parser.prototype.parseFunctionCall = function (
  this: Parser,
  name: Token
): FunctionCallNode {
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");

  const args: ExpressionNode[] = [];
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    do {
      args.push(this.parseExpression());
    } while (check(this.state, TOKEN_TYPES.COMMA) && advance(this.state));
  }
  expect(this.state, TOKEN_TYPES.RPAREN, "')'");

  return {
    type: 'FunctionCall',
    name: name.value,
    args,
    span: spanFrom(this.state, name.span.start),
  };
};
