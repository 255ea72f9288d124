/**
 * ControlFlowMixin: Conditionals, Loops, Blocks and Return
 *
 * Every branch and loop body runs in a child scope that is dropped when
 * the block completes. Conditions are evaluated in the enclosing scope
 * and must be Boolean.
 *
 * Error Handling:
 * - Non-Boolean conditions throw NonBooleanCondition
 * - ReturnSignal propagates up to the nearest call boundary
 *
 * @internal
 */

import type {
  ExpressionNode,
  IfElseNode,
  IfNode,
  ReturnNode,
  StatementNode,
  WhileNode,
} from '../../../../ast-nodes.js';
import { createRuntimeError } from '../../../../error-classes.js';
import { GROVE_ERROR_CODES } from '../../../../error-registry.js';
import { createChildContext } from '../../context.js';
import { ReturnSignal } from '../../signals.js';
import { typeName } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function ControlFlowMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class ControlFlowEvaluator extends Base {
    protected async evaluateCondition(node: ExpressionNode): Promise<boolean> {
      const value = await this.evaluateExpression(node);
      if (value.kind !== 'boolean') {
        throw createRuntimeError(
          GROVE_ERROR_CODES.NON_BOOLEAN_CONDITION,
          { actualType: typeName(value), value },
          this.getNodeLocation(node)
        );
      }
      return value.value;
    }

    /** Run statements in a fresh child of the current scope */
    protected async executeBlock(
      statements: readonly StatementNode[]
    ): Promise<void> {
      await this.withScope(createChildContext(this.ctx), () =>
        this.executeStatements(statements)
      );
    }

    protected async executeIf(node: IfNode): Promise<void> {
      if (await this.evaluateCondition(node.condition)) {
        await this.executeBlock(node.thenBranch);
      }
    }

    protected async executeIfElse(node: IfElseNode): Promise<void> {
      if (await this.evaluateCondition(node.condition)) {
        await this.executeBlock(node.thenBranch);
      } else {
        await this.executeBlock(node.elseBranch);
      }
    }

    /**
     * With the `shared` loop scope policy the body scope is created once,
     * so a `let` in the body fails on the second iteration.
     */
    protected async executeWhile(node: WhileNode): Promise<void> {
      if (this.ctx.loopScope === 'shared') {
        const bodyScope = createChildContext(this.ctx);
        while (await this.evaluateCondition(node.condition)) {
          await this.withScope(bodyScope, () =>
            this.executeStatements(node.body)
          );
        }
        return;
      }

      while (await this.evaluateCondition(node.condition)) {
        await this.executeBlock(node.body);
      }
    }

    protected async executeReturn(node: ReturnNode): Promise<never> {
      const value = await this.evaluateExpression(node.value);
      throw new ReturnSignal(value);
    }
  };
}
