/**
 * Parser Extension: Script and Simple Statements
 */

import type {
  AssignmentNode,
  InputNode,
  PrintNode,
  ScriptNode,
  StatementNode,
  VariableDeclarationNode,
} from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { GROVE_ERROR_CODES } from '../error-registry.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Parser } from './parser.js';
import {
  advance,
  check,
  current,
  describeToken,
  expect,
  isAtEnd,
  keywordHint,
  peek,
  spanFrom,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseScript(): ScriptNode;
    parseStatement(): StatementNode;
    parseVariableDeclaration(): VariableDeclarationNode;
    parseAssignment(): AssignmentNode;
    parsePrint(): PrintNode;
    parseInput(): InputNode;
    expectSemicolon(statement: string): void;
  }
}

// ============================================================
// SCRIPT
// ============================================================

Parser.prototype.parseScript = function (this: Parser): ScriptNode {
  const start = current(this.state).span.start;
  const statements: StatementNode[] = [];

  while (!isAtEnd(this.state)) {
    statements.push(this.parseStatement());
  }

  return {
    type: 'Script',
    statements,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// STATEMENTS
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.LET:
      return this.parseVariableDeclaration();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.FN:
      return this.parseFunctionDeclaration();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.PRINT:
      return this.parsePrint();
    case TOKEN_TYPES.INPUT:
      return this.parseInput();
    case TOKEN_TYPES.IDENTIFIER:
      return this.parseAssignment();
    default:
      throw new ParseError(
        GROVE_ERROR_CODES.UNEXPECTED_TOKEN,
        `Expected statement, got: ${describeToken(token)}`,
        token.span.start,
        { expected: 'statement', actual: describeToken(token) }
      );
  }
};

/** let NAME = expr ; */
Parser.prototype.parseVariableDeclaration = function (
  this: Parser
): VariableDeclarationNode {
  const start = expect(this.state, TOKEN_TYPES.LET, "'let'").span.start;
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'variable name');
  expect(this.state, TOKEN_TYPES.ASSIGN, "'='");
  const value = this.parseExpression();
  this.expectSemicolon('variable declaration');

  return {
    type: 'VariableDeclaration',
    name: name.value,
    value,
    span: spanFrom(this.state, start),
  };
};

/** NAME = expr ; */
Parser.prototype.parseAssignment = function (this: Parser): AssignmentNode {
  const name = advance(this.state);
  const start = name.span.start;

  if (!check(this.state, TOKEN_TYPES.ASSIGN)) {
    const next = current(this.state);
    let hint = keywordHint(name.value);
    if (!hint && next.type === TOKEN_TYPES.LPAREN) {
      hint = 'Hint: A call is an expression, e.g. let result = f(...);';
    }
    const message = `Expected '=' after ${name.value}, got: ${describeToken(next)}`;
    throw new ParseError(
      GROVE_ERROR_CODES.UNEXPECTED_TOKEN,
      hint ? `${message}. ${hint}` : message,
      next.span.start,
      { expected: "'='", actual: describeToken(next) }
    );
  }
  advance(this.state);

  const value = this.parseExpression();
  this.expectSemicolon('assignment');

  return {
    type: 'Assignment',
    name: name.value,
    value,
    span: spanFrom(this.state, start),
  };
};

/** print ( expr ) ; */
Parser.prototype.parsePrint = function (this: Parser): PrintNode {
  const start = advance(this.state).span.start;
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  const value = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  this.expectSemicolon('print');

  return { type: 'Print', value, span: spanFrom(this.state, start) };
};

/** input ( NAME ) ; */
Parser.prototype.parseInput = function (this: Parser): InputNode {
  const start = advance(this.state).span.start;
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'variable name');
  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  this.expectSemicolon('input');

  return { type: 'Input', name: name.value, span: spanFrom(this.state, start) };
};

Parser.prototype.expectSemicolon = function (
  this: Parser,
  statement: string
): void {
  if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
    advance(this.state);
    return;
  }
  const token = current(this.state);
  const actual = describeToken(token);
  throw new ParseError(
    GROVE_ERROR_CODES.MISSING_SEMICOLON,
    `Expected ';' after ${statement}, got: ${actual}`,
    peek(this.state, -1).span.end,
    { statement, actual }
  );
};
