/**
 * VariablesMixin: Variable Resolution and Binding
 *
 * Handles identifier reads, `let` declarations and assignments.
 * Declaration and assignment rules live in context.ts; this mixin only
 * evaluates the right-hand side and forwards.
 *
 * Error Handling:
 * - Unknown names throw UndefinedVariable
 * - Redeclaration throws NameAlreadyBound or ShadowingViolation
 *
 * @internal
 */

import type {
  AssignmentNode,
  IdentifierNode,
  VariableDeclarationNode,
} from '../../../../ast-nodes.js';
import {
  assignVariable,
  declareVariable,
  lookupVariable,
} from '../../context.js';
import type { GroveValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function VariablesMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class VariablesEvaluator extends Base {
    protected evaluateIdentifier(node: IdentifierNode): GroveValue {
      return lookupVariable(this.ctx, node.name, this.getNodeLocation(node));
    }

    protected async executeVariableDeclaration(
      node: VariableDeclarationNode
    ): Promise<void> {
      const value = await this.evaluateExpression(node.value);
      declareVariable(this.ctx, node.name, value, this.getNodeLocation(node));
    }

    /**
     * Assignment writes through to whichever enclosing scope owns the
     * name, so the change survives the end of the current block.
     */
    protected async executeAssignment(node: AssignmentNode): Promise<void> {
      const value = await this.evaluateExpression(node.value);
      assignVariable(this.ctx, node.name, value, this.getNodeLocation(node));
    }
  };
}
