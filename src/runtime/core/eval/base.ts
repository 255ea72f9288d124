/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared utilities and context access for all mixins.
 *
 * @internal
 */

import type {
  ASTNode,
  ExpressionNode,
  StatementNode,
} from '../../../ast-nodes.js';
import type { SourceLocation } from '../../../source-location.js';
import type { RuntimeContext } from '../types.js';
import type { GroveValue } from '../values.js';

/**
 * Base class for the evaluator.
 * `ctx` always points at the innermost scope of the statement being run;
 * mixins swap it with `withScope` and never assign it directly.
 */
export class EvaluatorBase {
  constructor(protected ctx: RuntimeContext) {}

  /** Source location of an AST node, for error reporting */
  protected getNodeLocation(node?: ASTNode): SourceLocation | undefined {
    return node?.span.start;
  }

  /**
   * Run `body` with `scope` as the current scope, restoring the previous
   * scope afterwards even when `body` throws.
   */
  protected async withScope<T>(
    scope: RuntimeContext,
    body: () => Promise<T>
  ): Promise<T> {
    const saved = this.ctx;
    this.ctx = scope;
    try {
      return await body();
    } finally {
      this.ctx = saved;
    }
  }

  /**
   * Evaluate any expression node.
   *
   * NOTE: Stub implementation - Evaluator provides the dispatch. Only
   * reachable when a mixin is used without the full composition.
   */
  protected evaluateExpression(_node: ExpressionNode): Promise<GroveValue> {
    throw new Error(
      'evaluateExpression requires the composed Evaluator'
    );
  }

  /**
   * Execute a statement list in the current scope.
   *
   * NOTE: Stub implementation - Evaluator provides the dispatch.
   */
  protected executeStatements(
    _statements: readonly StatementNode[]
  ): Promise<void> {
    throw new Error(
      'executeStatements requires the composed Evaluator'
    );
  }
}
