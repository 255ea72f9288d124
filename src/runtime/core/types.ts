/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These are the primary types host applications interact with.
 */

import type { StatementKind, StatementNode } from '../../ast-nodes.js';
import type { CallFrame } from '../../error-classes.js';
import type { SourceLocation } from '../../source-location.js';
import type { GroveValue } from './values.js';

/** I/O callbacks for Print and Input statements */
export interface RuntimeCallbacks {
  /** Called once per print statement with the evaluated value */
  onPrint: (value: GroveValue) => void;
  /**
   * Called once per input statement. Resolves to the next line without
   * its terminator, or null at end of input. Rejections become IoFailure.
   */
  onInput: () => Promise<string | null>;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before a user function body runs */
  onFunctionCall?: (event: FunctionCallEvent) => void;
  /** Called after a user function returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when a runtime error escapes a top-level statement */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  total: number;
  statement: StatementKind;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  index: number;
  total: number;
  statement: StatementKind;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted before a function call */
export interface FunctionCallEvent {
  name: string;
  args: GroveValue[];
  /** Number of user frames active, including this one */
  depth: number;
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  name: string;
  value: GroveValue;
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
  /** Statement index where error occurred (if available) */
  index?: number;
}

/**
 * Body scope policy for while loops.
 * - per-iteration: fresh child scope every iteration
 * - shared: one child scope reused by all iterations
 */
export type LoopScopePolicy = 'per-iteration' | 'shared';

/** A user-defined function as stored in a scope's function table */
export interface FunctionDefinition {
  readonly name: string;
  readonly params: readonly string[];
  readonly body: readonly StatementNode[];
  readonly location?: SourceLocation | undefined;
}

/**
 * One lexical scope. Program top level, if/else branches, loop bodies
 * and function-call frames each get their own.
 */
export interface RuntimeContext {
  /** Enclosing scope (undefined for the program root and call frames) */
  readonly parent: RuntimeContext | undefined;
  /** Program root, consulted by function lookup from inside call frames */
  readonly globals: RuntimeContext | undefined;
  /** Variables declared directly in this scope */
  readonly variables: Map<string, GroveValue>;
  /** Functions declared directly in this scope */
  readonly functions: Map<string, FunctionDefinition>;
  /** Variable names declared here or in any ancestor */
  readonly visibleVariables: Set<string>;
  /** Function names declared here or in any ancestor */
  readonly visibleFunctions: Set<string>;
  /** Return slot of a call frame */
  returnValue: GroveValue | undefined;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
  readonly loopScope: LoopScopePolicy;
  /** Maximum number of nested user function calls (undefined = unbounded) */
  readonly maxCallDepth: number | undefined;
  /** Active user function calls, shared by every scope of one run */
  readonly callStack: CallFrame[];
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Loop body scope policy (default: per-iteration) */
  loopScope?: LoopScopePolicy;
  /** Maximum nested user function calls */
  maxCallDepth?: number;
}

/** Result of script execution */
export interface ExecutionResult {
  /** Value of a top-level return, if the program executed one */
  value: GroveValue | undefined;
  /** Bindings of the program root scope */
  variables: Record<string, GroveValue>;
}

/** Result of a single step execution */
export interface StepResult {
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Index of the statement just executed (0-based) */
  index: number;
  total: number;
  statement: StatementKind;
  /** Set when the step was a top-level return */
  returned?: GroveValue | undefined;
}

/** Stepper for controlled execution */
export interface ExecutionStepper {
  readonly done: boolean;
  /** Index of the next statement (0-based) */
  readonly index: number;
  readonly total: number;
  /** The runtime context (for inspecting variables) */
  readonly context: RuntimeContext;
  /** Execute the next statement */
  step(): Promise<StepResult>;
  /** Get final result (only valid after done=true) */
  getResult(): ExecutionResult;
}
