import type { SourceSpan } from './source-location.js';
import type { BinaryOperator, UnaryOperator } from './runtime/core/operators.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// SCRIPT STRUCTURE
// ============================================================

export interface ScriptNode extends BaseNode {
  readonly type: 'Script';
  readonly statements: StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

/** let NAME = value; */
export interface VariableDeclarationNode extends BaseNode {
  readonly type: 'VariableDeclaration';
  readonly name: string;
  readonly value: ExpressionNode;
}

/** NAME = value; (never creates a binding) */
export interface AssignmentNode extends BaseNode {
  readonly type: 'Assignment';
  readonly name: string;
  readonly value: ExpressionNode;
}

export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBranch: StatementNode[];
}

/**
 * if/else. `else if` parses to an IfElse whose elseBranch holds a single
 * If or IfElse node.
 */
export interface IfElseNode extends BaseNode {
  readonly type: 'IfElse';
  readonly condition: ExpressionNode;
  readonly thenBranch: StatementNode[];
  readonly elseBranch: StatementNode[];
}

export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly condition: ExpressionNode;
  readonly body: StatementNode[];
}

export interface FunctionDeclarationNode extends BaseNode {
  readonly type: 'FunctionDeclaration';
  readonly name: string;
  readonly params: string[];
  readonly body: StatementNode[];
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: ExpressionNode;
}

export interface PrintNode extends BaseNode {
  readonly type: 'Print';
  readonly value: ExpressionNode;
}

/** input(NAME); reads one line into an existing variable */
export interface InputNode extends BaseNode {
  readonly type: 'Input';
  readonly name: string;
}

export type StatementNode =
  | VariableDeclarationNode
  | AssignmentNode
  | IfNode
  | IfElseNode
  | WhileNode
  | FunctionDeclarationNode
  | ReturnNode
  | PrintNode
  | InputNode;

export type StatementKind = StatementNode['type'];

// ============================================================
// EXPRESSIONS
// ============================================================

export interface IntegerLiteralNode extends BaseNode {
  readonly type: 'IntegerLiteral';
  readonly value: bigint;
}

export interface FloatLiteralNode extends BaseNode {
  readonly type: 'FloatLiteral';
  readonly value: number;
}

export interface BooleanLiteralNode extends BaseNode {
  readonly type: 'BooleanLiteral';
  readonly value: boolean;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

export interface FunctionCallNode extends BaseNode {
  readonly type: 'FunctionCall';
  readonly name: string;
  readonly args: ExpressionNode[];
}

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOperator;
  readonly operand: ExpressionNode;
}

export type LiteralNode =
  | IntegerLiteralNode
  | FloatLiteralNode
  | BooleanLiteralNode
  | StringLiteralNode;

export type ExpressionNode =
  | LiteralNode
  | IdentifierNode
  | FunctionCallNode
  | BinaryExprNode
  | UnaryExprNode;

export type ASTNode = ScriptNode | StatementNode | ExpressionNode;

export type NodeType = ASTNode['type'];
