/**
 * FunctionsMixin: User Function Declaration and Invocation
 *
 * A call runs the body in a fresh frame that cannot see the caller's
 * variables. The frame holds the parameters, the called function (for
 * recursion) and the return slot. Global functions stay reachable
 * through the frame's link to the program root.
 *
 * Call sequence:
 * 1. resolve the function
 * 2. check argument count against parameter count
 * 3. evaluate arguments left to right in the caller's scope
 * 4. bind parameters in the new frame and run the body
 * 5. yield the return slot, or Integer(0) if the body never returned
 *
 * @internal
 */

import type {
  FunctionCallNode,
  FunctionDeclarationNode,
} from '../../../../ast-nodes.js';
import { createRuntimeError } from '../../../../error-classes.js';
import { GROVE_ERROR_CODES } from '../../../../error-registry.js';
import {
  createFunctionFrame,
  declareFunction,
  declareVariable,
  lookupFunction,
} from '../../context.js';
import { ReturnSignal } from '../../signals.js';
import { DEFAULT_VALUE } from '../../values.js';
import type { GroveValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function FunctionsMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class FunctionsEvaluator extends Base {
    protected executeFunctionDeclaration(node: FunctionDeclarationNode): void {
      const location = this.getNodeLocation(node);
      declareFunction(
        this.ctx,
        {
          name: node.name,
          params: node.params,
          body: node.body,
          location,
        },
        location
      );
    }

    protected async evaluateFunctionCall(
      node: FunctionCallNode
    ): Promise<GroveValue> {
      const location = this.getNodeLocation(node);
      const definition = lookupFunction(this.ctx, node.name, location);

      if (node.args.length !== definition.params.length) {
        throw createRuntimeError(
          GROVE_ERROR_CODES.ARITY_MISMATCH,
          {
            name: node.name,
            expected: definition.params.length,
            actual: node.args.length,
          },
          location
        );
      }

      const args: GroveValue[] = [];
      for (const arg of node.args) {
        args.push(await this.evaluateExpression(arg));
      }

      const { callStack, maxCallDepth } = this.ctx;
      if (maxCallDepth !== undefined && callStack.length >= maxCallDepth) {
        throw createRuntimeError(
          GROVE_ERROR_CODES.CALL_DEPTH_EXCEEDED,
          { limit: maxCallDepth, name: node.name },
          location
        );
      }

      const frame = createFunctionFrame(this.ctx, definition);
      definition.params.forEach((param, index) => {
        const value = args[index] ?? DEFAULT_VALUE;
        declareVariable(frame, param, value, location);
      });

      callStack.push({ functionName: node.name, location });
      this.ctx.observability.onFunctionCall?.({
        name: node.name,
        args,
        depth: callStack.length,
      });
      const startTime = Date.now();

      try {
        await this.withScope(frame, () =>
          this.executeStatements(definition.body)
        );
      } catch (error) {
        if (!(error instanceof ReturnSignal)) throw error;
        frame.returnValue = error.value;
      } finally {
        callStack.pop();
      }

      const value = frame.returnValue ?? DEFAULT_VALUE;
      this.ctx.observability.onFunctionReturn?.({
        name: node.name,
        value,
        durationMs: Date.now() - startTime,
      });
      return value;
    }
  };
}
