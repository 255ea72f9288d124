/**
 * LiteralsMixin: Literal Values
 *
 * Literals evaluate to themselves.
 *
 * @internal
 */

import type { LiteralNode } from '../../../../ast-nodes.js';
import type { GroveValue } from '../../values.js';
import { boolean, float, integer, string } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function LiteralsMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class LiteralsEvaluator extends Base {
    protected evaluateLiteral(node: LiteralNode): GroveValue {
      switch (node.type) {
        case 'IntegerLiteral':
          return integer(node.value);
        case 'FloatLiteral':
          return float(node.value);
        case 'BooleanLiteral':
          return boolean(node.value);
        case 'StringLiteral':
          return string(node.value);
      }
    }
  };
}
