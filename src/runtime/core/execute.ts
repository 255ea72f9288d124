/**
 * Script Execution
 *
 * Public API for executing Grove programs.
 * Provides both full execution and step-by-step execution.
 */

import type { ScriptNode } from '../../ast-nodes.js';
import { getEvaluator } from './eval/evaluator.js';
import { ReturnSignal } from './signals.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import type { GroveValue } from './values.js';

/**
 * Execute a parsed Grove program.
 *
 * The first runtime error aborts the run and is rethrown to the caller.
 *
 * @param script The parsed AST (from parse())
 * @param context The program root scope (from createRuntimeContext())
 * @returns The top-level return value, if any, and the root bindings
 */
export async function execute(
  script: ScriptNode,
  context: RuntimeContext
): Promise<ExecutionResult> {
  const stepper = createStepper(script, context);
  while (!stepper.done) {
    await stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution of the
 * top-level statements. A top-level `return` finishes the stepper.
 */
export function createStepper(
  script: ScriptNode,
  context: RuntimeContext
): ExecutionStepper {
  const evaluator = getEvaluator(context);
  const statements = script.statements;
  const total = statements.length;
  let index = 0;
  let returned: GroveValue | undefined;
  let isDone = total === 0;

  const collectVariables = (): Record<string, GroveValue> => {
    const vars: Record<string, GroveValue> = {};
    for (const [name, value] of context.variables) {
      vars[name] = value;
    }
    return vars;
  };

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    async step(): Promise<StepResult> {
      const stmt = statements[index];
      if (isDone || !stmt) {
        throw new Error('Stepper is done: no statements left to execute');
      }

      const startTime = Date.now();
      context.observability.onStepStart?.({
        index,
        total,
        statement: stmt.type,
      });

      try {
        await evaluator.executeStatement(stmt);
      } catch (error) {
        if (error instanceof ReturnSignal) {
          returned = error.value;
          isDone = true;
          return {
            done: true,
            index,
            total,
            statement: stmt.type,
            returned,
          };
        }

        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }

      context.observability.onStepEnd?.({
        index,
        total,
        statement: stmt.type,
        durationMs: Date.now() - startTime,
      });

      index++;
      isDone = index >= total;
      return { done: isDone, index: index - 1, total, statement: stmt.type };
    },

    getResult(): ExecutionResult {
      return { value: returned, variables: collectVariables() };
    },
  };
}
