/**
 * IoMixin: Print and Input Statements
 *
 * Both statements go through the host callbacks on the context, never
 * straight to the process streams.
 *
 * @internal
 */

import type { InputNode, PrintNode } from '../../../../ast-nodes.js';
import { createRuntimeError } from '../../../../error-classes.js';
import { GROVE_ERROR_CODES } from '../../../../error-registry.js';
import { assignVariable, lookupVariable } from '../../context.js';
import { parseInputLine } from '../../input.js';
import { typeName } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function IoMixin<TBase extends EvaluatorConstructor>(Base: TBase) {
  return class IoEvaluator extends Base {
    protected async executePrint(node: PrintNode): Promise<void> {
      const value = await this.evaluateExpression(node.value);
      this.ctx.callbacks.onPrint(value);
    }

    /**
     * Read one line, parse it and store it in an existing variable of the
     * same variant. End of input reads as an empty line.
     */
    protected async executeInput(node: InputNode): Promise<void> {
      const location = this.getNodeLocation(node);

      let line: string | null;
      try {
        line = await this.ctx.callbacks.onInput();
      } catch (error) {
        throw createRuntimeError(
          GROVE_ERROR_CODES.IO_FAILURE,
          { reason: error instanceof Error ? error.message : String(error) },
          location
        );
      }

      const parsed = parseInputLine(line ?? '');
      const current = lookupVariable(this.ctx, node.name, location);
      if (parsed.kind !== current.kind) {
        throw createRuntimeError(
          GROVE_ERROR_CODES.TYPE_MISMATCH,
          {
            name: node.name,
            expectedType: typeName(current),
            actualType: typeName(parsed),
          },
          location
        );
      }
      assignVariable(this.ctx, node.name, parsed, location);
    }
  };
}
