/**
 * Parser Extension: Primary Expressions
 * Literals, identifiers, calls and parenthesized expressions
 */

import type { ExpressionNode } from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { GROVE_ERROR_CODES } from '../error-registry.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Parser } from './parser.js';
import { advance, check, current, describeToken, expect } from './state.js';

declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
  }
}

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const { span } = token;

  switch (token.type) {
    case TOKEN_TYPES.INTEGER:
      advance(this.state);
      return { type: 'IntegerLiteral', value: BigInt(token.value), span };

    case TOKEN_TYPES.FLOAT:
      advance(this.state);
      return { type: 'FloatLiteral', value: Number(token.value), span };

    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span };

    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BooleanLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span,
      };

    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      if (check(this.state, TOKEN_TYPES.LPAREN)) {
        return this.parseFunctionCall(token);
      }
      return { type: 'Identifier', name: token.value, span };

    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const inner = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RPAREN, "')'");
      return inner;
    }

    default:
      throw new ParseError(
        GROVE_ERROR_CODES.EXPECTED_EXPRESSION,
        `Expected expression, got: ${describeToken(token)}`,
        span.start,
        { actual: describeToken(token) }
      );
  }
};
