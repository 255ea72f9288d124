/**
 * Grove Parser Tests
 * AST shapes, precedence and syntax errors with hints.
 */

import { describe, expect, it } from 'vitest';
import { parse, ParseError, type ExpressionNode } from '../../src/index.js';

function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('Expected a ParseError');
}

/** Compact prefix form of an expression for shape assertions */
function shape(node: ExpressionNode): string {
  switch (node.type) {
    case 'IntegerLiteral':
      return node.value.toString();
    case 'FloatLiteral':
      return String(node.value);
    case 'BooleanLiteral':
      return String(node.value);
    case 'StringLiteral':
      return JSON.stringify(node.value);
    case 'Identifier':
      return node.name;
    case 'FunctionCall':
      return `${node.name}(${node.args.map(shape).join(' ')})`;
    case 'BinaryExpr':
      return `(${node.op} ${shape(node.left)} ${shape(node.right)})`;
    case 'UnaryExpr':
      return `(${node.op} ${shape(node.operand)})`;
  }
}

function expressionOf(source: string): string {
  const [statement] = parse(`print(${source});`).statements;
  if (statement?.type !== 'Print') throw new Error('Expected print');
  return shape(statement.value);
}

describe('Grove Parser', () => {
  describe('expressions', () => {
    it('applies precedence and left associativity', () => {
      expect(expressionOf('1 + 2 * 3')).toBe('(+ 1 (* 2 3))');
      expect(expressionOf('a - b - c')).toBe('(- (- a b) c)');
      expect(expressionOf('a || b && c')).toBe('(|| a (&& b c))');
      expect(expressionOf('a == b < c')).toBe('(== a (< b c))');
      expect(expressionOf('x % 2 == 0')).toBe('(== (% x 2) 0)');
    });

    it('parses unary chains and grouping', () => {
      expect(expressionOf('-(1 + 2)')).toBe('(- (+ 1 2))');
      expect(expressionOf('not !done')).toBe('(! (! done))');
      expect(expressionOf('-x * y')).toBe('(* (- x) y)');
    });

    it('parses calls with expression arguments', () => {
      expect(expressionOf('f()')).toBe('f()');
      expect(expressionOf('max(a + 1, g(b), "s")')).toBe('max((+ a 1) g(b) "s")');
    });

    it('keeps integer literals exact', () => {
      expect(expressionOf('9223372036854775807')).toBe('9223372036854775807');
    });
  });

  describe('statements', () => {
    it('parses every statement kind', () => {
      const source = [
        'let a = 1;',
        'a = 2;',
        'if (true) { }',
        'if (true) { } else { }',
        'while (false) { }',
        'fn f(x, y) { return x; }',
        'return a;',
        'print(a);',
        'input(a);',
      ].join('\n');
      expect(parse(source).statements.map((s) => s.type)).toEqual([
        'VariableDeclaration',
        'Assignment',
        'If',
        'IfElse',
        'While',
        'FunctionDeclaration',
        'Return',
        'Print',
        'Input',
      ]);
    });

    it('captures function names, parameters and bodies', () => {
      const [statement] = parse('fn add(a, b) { let s = a + b; return s; }').statements;
      expect(statement?.type).toBe('FunctionDeclaration');
      if (statement?.type === 'FunctionDeclaration') {
        expect(statement.name).toBe('add');
        expect(statement.params).toEqual(['a', 'b']);
        expect(statement.body.map((s) => s.type)).toEqual([
          'VariableDeclaration',
          'Return',
        ]);
      }
    });

    it('nests else if as an IfElse holding the inner if', () => {
      const [statement] = parse(
        'if (a) { } else if (b) { } else { print(1); }'
      ).statements;
      expect(statement?.type).toBe('IfElse');
      if (statement?.type === 'IfElse') {
        expect(statement.elseBranch).toHaveLength(1);
        const inner = statement.elseBranch[0];
        expect(inner?.type).toBe('IfElse');
        if (inner?.type === 'IfElse') {
          expect(inner.elseBranch.map((s) => s.type)).toEqual(['Print']);
        }
      }
    });

    it('records statement spans', () => {
      const [first, second] = parse('let a = 1;\n  print(a);').statements;
      expect(first?.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 11, offset: 10 },
      });
      expect(second?.span.start).toEqual({ line: 2, column: 3, offset: 13 });
    });

    it('accepts an empty program', () => {
      expect(parse('  // nothing here\n').statements).toEqual([]);
    });
  });

  describe('errors', () => {
    it('reports a missing semicolon after the last token', () => {
      const error = parseError('let x = 1');
      expect(error.errorId).toBe('GROVE-P004');
      expect(error.message).toBe(
        "Expected ';' after variable declaration, got: end of input at 1:10"
      );
    });

    it('reports an unclosed brace at the opening brace', () => {
      const error = parseError('if (true) { print(1);');
      expect(error.errorId).toBe('GROVE-P002');
      expect(error.message).toBe('Unclosed brace at 1:11');
    });

    it('reports a missing operand', () => {
      const error = parseError('print(1 + );');
      expect(error.errorId).toBe('GROVE-P003');
      expect(error.message).toBe('Expected expression, got: ) at 1:11');
    });

    it('suggests keywords for common misspellings', () => {
      const error = parseError('var x = 1;');
      expect(error.errorId).toBe('GROVE-P001');
      expect(error.message).toBe(
        "Expected '=' after var, got: x. Hint: Did you mean 'let'? at 1:5"
      );
    });

    it('explains that a bare call is not a statement', () => {
      expect(parseError('foo(1);').message).toBe(
        "Expected '=' after foo, got: (. Hint: A call is an expression, e.g. let result = f(...); at 1:4"
      );
    });

    it('requires braces around bodies', () => {
      expect(parseError('while (x) print(x);').message).toBe(
        "Expected '{', got: print. Hint: Bodies of if, else, while and fn need braces at 1:11"
      );
    });

    it('requires parentheses around conditions', () => {
      expect(parseError('if true { }').message).toBe(
        "Expected '(', got: true at 1:4"
      );
    });

    it('hints at an unclosed parenthesis at end of input', () => {
      expect(parseError('print((1);').message).toBe(
        "Expected ')', got: ; at 1:9"
      );
      expect(parseError('print(1').message).toBe(
        "Expected ')', got: end of input. Hint: Check for unclosed parenthesis at 1:8"
      );
    });

    it('rejects expressions in statement position', () => {
      const error = parseError('5;');
      expect(error.errorId).toBe('GROVE-P001');
      expect(error.message).toBe('Expected statement, got: 5 at 1:1');
    });
  });
});
