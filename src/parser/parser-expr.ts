/**
 * Parser Extension: Expression Parsing
 *
 * Precedence, lowest first:
 *   ||  &&  == !=  < > <= >=  + -  * / %  unary (- ! not)  primary
 * Binary operators are left-associative.
 */

import type { ExpressionNode } from '../ast-nodes.js';
import type { BinaryOperator } from '../runtime/core/operators.js';
import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Parser } from './parser.js';
import { advance, current, spanFrom } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseLogicalOr(): ExpressionNode;
    parseLogicalAnd(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseUnary(): ExpressionNode;
  }
}

type OperatorLevel = Partial<Record<TokenType, BinaryOperator>>;

const LOGICAL_OR: OperatorLevel = { [TOKEN_TYPES.OR]: '||' };
const LOGICAL_AND: OperatorLevel = { [TOKEN_TYPES.AND]: '&&' };
const EQUALITY: OperatorLevel = {
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
};
const COMPARISON: OperatorLevel = {
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GE]: '>=',
};
const ADDITIVE: OperatorLevel = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};
const MULTIPLICATIVE: OperatorLevel = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.PERCENT]: '%',
};

/** One left-associative precedence level */
function parseLevel(
  parser: Parser,
  operators: OperatorLevel,
  operand: () => ExpressionNode
): ExpressionNode {
  const start = current(parser.state).span.start;
  let left = operand();

  for (
    let op = operators[current(parser.state).type];
    op !== undefined;
    op = operators[current(parser.state).type]
  ) {
    advance(parser.state);
    const right = operand();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: spanFrom(parser.state, start),
    };
  }

  return left;
}

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseLogicalOr();
};

Parser.prototype.parseLogicalOr = function (this: Parser): ExpressionNode {
  return parseLevel(this, LOGICAL_OR, () => this.parseLogicalAnd());
};

Parser.prototype.parseLogicalAnd = function (this: Parser): ExpressionNode {
  return parseLevel(this, LOGICAL_AND, () => this.parseEquality());
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return parseLevel(this, EQUALITY, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  return parseLevel(this, COMPARISON, () => this.parseAdditive());
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  return parseLevel(this, ADDITIVE, () => this.parseMultiplicative());
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  return parseLevel(this, MULTIPLICATIVE, () => this.parseUnary());
};

/** - expr | ! expr | not expr */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  if (token.type === TOKEN_TYPES.MINUS || token.type === TOKEN_TYPES.BANG) {
    advance(this.state);
    const operand = this.parseUnary();
    return {
      type: 'UnaryExpr',
      op: token.type === TOKEN_TYPES.MINUS ? '-' : '!',
      operand,
      span: spanFrom(this.state, token.span.start),
    };
  }

  return this.parsePrimary();
};
