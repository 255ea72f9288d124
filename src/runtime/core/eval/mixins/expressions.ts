/**
 * ExpressionsMixin: Binary and Unary Operations
 *
 * Both operands of a binary expression are always evaluated, left
 * first, before the operator table is consulted. `&&` and `||` do not
 * short-circuit.
 *
 * @internal
 */

import type { BinaryExprNode, UnaryExprNode } from '../../../../ast-nodes.js';
import { applyBinaryOperator, applyUnaryOperator } from '../../operators.js';
import type { GroveValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function ExpressionsMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class ExpressionsEvaluator extends Base {
    protected async evaluateBinaryExpr(
      node: BinaryExprNode
    ): Promise<GroveValue> {
      const left = await this.evaluateExpression(node.left);
      const right = await this.evaluateExpression(node.right);
      return applyBinaryOperator(
        node.op,
        left,
        right,
        this.getNodeLocation(node)
      );
    }

    protected async evaluateUnaryExpr(
      node: UnaryExprNode
    ): Promise<GroveValue> {
      const operand = await this.evaluateExpression(node.operand);
      return applyUnaryOperator(node.op, operand, this.getNodeLocation(node));
    }
  };
}
