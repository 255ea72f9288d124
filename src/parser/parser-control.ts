/**
 * Parser Extension: Control Flow Parsing
 * Conditionals, loops, blocks and return
 */

import type {
  ExpressionNode,
  IfElseNode,
  IfNode,
  ReturnNode,
  StatementNode,
  WhileNode,
} from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { GROVE_ERROR_CODES } from '../error-registry.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Parser } from './parser.js';
import { advance, check, expect, isAtEnd, spanFrom } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseIf(): IfNode | IfElseNode;
    parseWhile(): WhileNode;
    parseReturn(): ReturnNode;
    parseBlock(): StatementNode[];
    parseCondition(): ExpressionNode;
  }
}

// ============================================================
// CONDITIONALS
// ============================================================

/**
 * if ( expr ) block [ else block | else if … ]
 * `else if` becomes an IfElse whose else branch is the nested if.
 */
Parser.prototype.parseIf = function (this: Parser): IfNode | IfElseNode {
  const start = expect(this.state, TOKEN_TYPES.IF, "'if'").span.start;
  const condition = this.parseCondition();
  const thenBranch = this.parseBlock();

  if (!check(this.state, TOKEN_TYPES.ELSE)) {
    return {
      type: 'If',
      condition,
      thenBranch,
      span: spanFrom(this.state, start),
    };
  }

  advance(this.state); // consume else
  const elseBranch = check(this.state, TOKEN_TYPES.IF)
    ? [this.parseIf()]
    : this.parseBlock();

  return {
    type: 'IfElse',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhile = function (this: Parser): WhileNode {
  const start = expect(this.state, TOKEN_TYPES.WHILE, "'while'").span.start;
  const condition = this.parseCondition();
  const body = this.parseBlock();

  return {
    type: 'While',
    condition,
    body,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// SHARED PIECES
// ============================================================

/** ( expr ) */
Parser.prototype.parseCondition = function (this: Parser): ExpressionNode {
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  return condition;
};

/** { statement* } */
Parser.prototype.parseBlock = function (this: Parser): StatementNode[] {
  const open = expect(this.state, TOKEN_TYPES.LBRACE, "'{'");
  const statements: StatementNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    if (isAtEnd(this.state)) {
      throw new ParseError(
        GROVE_ERROR_CODES.UNCLOSED_DELIMITER,
        'Unclosed brace',
        open.span.start,
        { delimiter: 'brace' }
      );
    }
    statements.push(this.parseStatement());
  }
  advance(this.state); // consume }

  return statements;
};

/** return expr ; */
Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const start = expect(this.state, TOKEN_TYPES.RETURN, "'return'").span.start;
  const value = this.parseExpression();
  this.expectSemicolon('return');

  return { type: 'Return', value, span: spanFrom(this.state, start) };
};
