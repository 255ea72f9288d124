/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins, plus the node
 * dispatch that ties them together. Uses WeakMap caching to reuse
 * evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - scope swapping, locations, dispatch stubs
 * 2. LiteralsMixin - literal values
 * 3. VariablesMixin - identifiers, let, assignment
 * 4. ExpressionsMixin - binary and unary operators
 * 5. FunctionsMixin - function declaration and calls
 * 6. ControlFlowMixin - if, if/else, while, blocks, return
 * 7. IoMixin - print and input
 *
 * Each mixin sees the methods of the mixins below it. Calls back into
 * the dispatch (`evaluateExpression`, `executeStatements`) go through
 * the stubs on EvaluatorBase, which the Evaluator class overrides.
 *
 * @internal
 */

import type { ExpressionNode, StatementNode } from '../../../ast-nodes.js';
import { RuntimeError } from '../../../error-classes.js';
import type { RuntimeContext } from '../types.js';
import type { GroveValue } from '../values.js';
import { EvaluatorBase } from './base.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { FunctionsMixin } from './mixins/functions.js';
import { IoMixin } from './mixins/io.js';
import { LiteralsMixin } from './mixins/literals.js';
import { VariablesMixin } from './mixins/variables.js';

const EvaluatorLayers = IoMixin(
  ControlFlowMixin(
    FunctionsMixin(
      ExpressionsMixin(VariablesMixin(LiteralsMixin(EvaluatorBase)))
    )
  )
);

/**
 * Complete Evaluator.
 *
 * Runtime errors leaving a statement are tagged with that statement's
 * kind and the active call stack; kind and message are left untouched.
 * The innermost statement wins.
 */
export class Evaluator extends EvaluatorLayers {
  protected override async evaluateExpression(
    node: ExpressionNode
  ): Promise<GroveValue> {
    switch (node.type) {
      case 'IntegerLiteral':
      case 'FloatLiteral':
      case 'BooleanLiteral':
      case 'StringLiteral':
        return this.evaluateLiteral(node);
      case 'Identifier':
        return this.evaluateIdentifier(node);
      case 'FunctionCall':
        return this.evaluateFunctionCall(node);
      case 'BinaryExpr':
        return this.evaluateBinaryExpr(node);
      case 'UnaryExpr':
        return this.evaluateUnaryExpr(node);
    }
  }

  async executeStatement(node: StatementNode): Promise<void> {
    try {
      await this.dispatchStatement(node);
    } catch (error) {
      if (error instanceof RuntimeError) {
        throw error.withStatement(node.type, this.ctx.callStack);
      }
      throw error;
    }
  }

  protected override async executeStatements(
    statements: readonly StatementNode[]
  ): Promise<void> {
    for (const statement of statements) {
      await this.executeStatement(statement);
    }
  }

  private async dispatchStatement(node: StatementNode): Promise<void> {
    switch (node.type) {
      case 'VariableDeclaration':
        return this.executeVariableDeclaration(node);
      case 'Assignment':
        return this.executeAssignment(node);
      case 'If':
        return this.executeIf(node);
      case 'IfElse':
        return this.executeIfElse(node);
      case 'While':
        return this.executeWhile(node);
      case 'FunctionDeclaration':
        return this.executeFunctionDeclaration(node);
      case 'Return':
        return this.executeReturn(node);
      case 'Print':
        return this.executePrint(node);
      case 'Input':
        return this.executeInput(node);
    }
  }
}

/**
 * WeakMap cache for evaluator instances.
 * Entries disappear when their RuntimeContext is garbage collected.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
