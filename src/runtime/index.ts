/**
 * Grove Runtime
 *
 * Public API for executing Grove programs.
 *
 * Module Structure:
 * - core/types.ts: public types (RuntimeContext, RuntimeOptions, callbacks)
 * - core/values.ts: GroveValue and value utilities
 * - core/operators.ts: operator compatibility table
 * - core/context.ts: scope chain operations
 * - core/signals.ts: ReturnSignal
 * - core/input.ts: input line parsing
 * - core/line-reader.ts: line source over a readable stream
 * - core/execute.ts: execute, createStepper
 * - core/eval/: mixin-composed evaluator (internal)
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  FunctionCallEvent,
  FunctionDefinition,
  FunctionReturnEvent,
  LoopScopePolicy,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

export type {
  GroveBoolean,
  GroveFloat,
  GroveInteger,
  GroveNumeric,
  GroveString,
  GroveTypeName,
  GroveValue,
  GroveValueKind,
} from './core/values.js';

export type {
  BinaryOperator,
  OperandPair,
  OperatorFamily,
  OperatorRule,
  UnaryOperator,
} from './core/operators.js';

export type { LineReader } from './core/line-reader.js';

// ============================================================
// VALUES AND OPERATORS
// ============================================================

export {
  boolean,
  DEFAULT_VALUE,
  float,
  formatFloat,
  formatValue,
  integer,
  string,
  typeName,
  valuesEqual,
  VALUE_KINDS,
} from './core/values.js';

export {
  acceptsOperands,
  applyBinaryOperator,
  applyUnaryOperator,
  BINARY_OPERATORS,
  OPERATOR_TABLE,
} from './core/operators.js';

// ============================================================
// CONTEXT AND SCOPES
// ============================================================

export {
  assignVariable,
  createChildContext,
  createFunctionFrame,
  createRuntimeContext,
  declareFunction,
  declareVariable,
  getVariable,
  hasVariable,
  lookupFunction,
  lookupVariable,
} from './core/context.js';

// ============================================================
// EXECUTION
// ============================================================

export { execute, createStepper } from './core/execute.js';
export { ReturnSignal } from './core/signals.js';
export { parseInputLine } from './core/input.js';
export { createLineReader } from './core/line-reader.js';
