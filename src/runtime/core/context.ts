/**
 * Runtime Context Factory and Scope Operations
 *
 * Creates the program root scope and implements the scope chain:
 * declaration with shadow detection, lookup, write-through assignment,
 * child scopes and function-call frames.
 */

import { createRuntimeError } from '../../error-classes.js';
import { GROVE_ERROR_CODES } from '../../error-registry.js';
import type { SourceLocation } from '../../source-location.js';
import { createLineReader } from './line-reader.js';
import type { LineReader } from './line-reader.js';
import type {
  FunctionDefinition,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';
import { formatValue } from './values.js';
import type { GroveValue } from './values.js';

let stdinReader: LineReader | undefined;

const defaultCallbacks: RuntimeCallbacks = {
  onPrint: (value) => {
    console.log(formatValue(value));
  },
  onInput: () => {
    stdinReader ??= createLineReader(process.stdin);
    return stdinReader.readLine();
  },
};

/**
 * Create a runtime context for script execution.
 * The returned context is the program root scope.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const { maxCallDepth } = options;
  if (
    maxCallDepth !== undefined &&
    (!Number.isInteger(maxCallDepth) || maxCallDepth < 1)
  ) {
    throw new RangeError(
      `maxCallDepth must be a positive integer, got ${maxCallDepth}`
    );
  }

  return {
    parent: undefined,
    globals: undefined,
    variables: new Map<string, GroveValue>(),
    functions: new Map<string, FunctionDefinition>(),
    visibleVariables: new Set<string>(),
    visibleFunctions: new Set<string>(),
    returnValue: undefined,
    callbacks: {
      ...defaultCallbacks,
      ...options.callbacks,
    },
    observability: options.observability ?? {},
    loopScope: options.loopScope ?? 'per-iteration',
    maxCallDepth,
    callStack: [],
  };
}

/**
 * Create a child scope for a block.
 * Visible-name sets are copied so later declarations in the parent do
 * not leak into an existing child.
 */
export function createChildContext(parent: RuntimeContext): RuntimeContext {
  return {
    parent,
    globals: parent.globals,
    variables: new Map<string, GroveValue>(),
    functions: new Map<string, FunctionDefinition>(),
    visibleVariables: new Set(parent.visibleVariables),
    visibleFunctions: new Set(parent.visibleFunctions),
    returnValue: undefined,
    callbacks: parent.callbacks,
    observability: parent.observability,
    loopScope: parent.loopScope,
    maxCallDepth: parent.maxCallDepth,
    callStack: parent.callStack,
  };
}

/**
 * Create the frame for a call to `definition`.
 *
 * The frame has no parent: the body cannot see the caller's variables.
 * It is seeded with the called function so recursion resolves, and
 * keeps a link to the program root for calls to global functions.
 */
export function createFunctionFrame(
  caller: RuntimeContext,
  definition: FunctionDefinition
): RuntimeContext {
  const frame: RuntimeContext = {
    parent: undefined,
    globals: getProgramRoot(caller),
    variables: new Map<string, GroveValue>(),
    functions: new Map<string, FunctionDefinition>(),
    visibleVariables: new Set<string>(),
    visibleFunctions: new Set<string>(),
    returnValue: undefined,
    callbacks: caller.callbacks,
    observability: caller.observability,
    loopScope: caller.loopScope,
    maxCallDepth: caller.maxCallDepth,
    callStack: caller.callStack,
  };
  frame.functions.set(definition.name, definition);
  frame.visibleFunctions.add(definition.name);
  return frame;
}

/** Walk to the program root of a scope chain */
export function getProgramRoot(ctx: RuntimeContext): RuntimeContext {
  if (ctx.globals) return ctx.globals;
  let current = ctx;
  while (current.parent) {
    current = current.parent;
  }
  return current;
}

// ============================================================
// DECLARATION
// ============================================================

/**
 * Bind a new variable in this scope.
 *
 * @throws RuntimeError NameAlreadyBound if declared in this scope
 * @throws RuntimeError ShadowingViolation if declared in an enclosing scope
 */
export function declareVariable(
  ctx: RuntimeContext,
  name: string,
  value: GroveValue,
  location?: SourceLocation
): void {
  if (ctx.variables.has(name)) {
    throw createRuntimeError(
      GROVE_ERROR_CODES.NAME_ALREADY_BOUND,
      { entity: 'Variable', name },
      location
    );
  }
  if (ctx.visibleVariables.has(name)) {
    throw createRuntimeError(
      GROVE_ERROR_CODES.SHADOWING_VIOLATION,
      { entity: 'Variable', name },
      location
    );
  }
  ctx.variables.set(name, value);
  ctx.visibleVariables.add(name);
}

/**
 * Bind a new function in this scope. Function and variable namespaces
 * are independent.
 */
export function declareFunction(
  ctx: RuntimeContext,
  definition: FunctionDefinition,
  location?: SourceLocation
): void {
  const { name } = definition;
  if (ctx.functions.has(name)) {
    throw createRuntimeError(
      GROVE_ERROR_CODES.NAME_ALREADY_BOUND,
      { entity: 'Function', name },
      location
    );
  }
  if (ctx.visibleFunctions.has(name)) {
    throw createRuntimeError(
      GROVE_ERROR_CODES.SHADOWING_VIOLATION,
      { entity: 'Function', name },
      location
    );
  }
  ctx.functions.set(name, definition);
  ctx.visibleFunctions.add(name);
}

// ============================================================
// LOOKUP
// ============================================================

/**
 * Get a variable value, walking the parent chain.
 * Returns undefined if not found in any scope.
 */
export function getVariable(
  ctx: RuntimeContext,
  name: string
): GroveValue | undefined {
  const owner = findVariableOwner(ctx, name);
  return owner?.variables.get(name);
}

export function hasVariable(ctx: RuntimeContext, name: string): boolean {
  return findVariableOwner(ctx, name) !== undefined;
}

/** @throws RuntimeError UndefinedVariable */
export function lookupVariable(
  ctx: RuntimeContext,
  name: string,
  location?: SourceLocation
): GroveValue {
  const value = getVariable(ctx, name);
  if (value === undefined) {
    throw createRuntimeError(
      GROVE_ERROR_CODES.UNDEFINED_VARIABLE,
      { name },
      location
    );
  }
  return value;
}

/**
 * Resolve a function through the scope chain, then through the program
 * root when called from inside a frame.
 *
 * @throws RuntimeError UndefinedFunction
 */
export function lookupFunction(
  ctx: RuntimeContext,
  name: string,
  location?: SourceLocation
): FunctionDefinition {
  for (let scope: RuntimeContext | undefined = ctx; scope; scope = scope.parent) {
    const definition = scope.functions.get(name);
    if (definition) return definition;
  }
  const definition = ctx.globals?.functions.get(name);
  if (definition) return definition;

  throw createRuntimeError(
    GROVE_ERROR_CODES.UNDEFINED_FUNCTION,
    { name },
    location
  );
}

// ============================================================
// ASSIGNMENT
// ============================================================

/**
 * Overwrite an existing binding in the innermost scope that owns it.
 * Never creates a binding.
 *
 * @throws RuntimeError UndefinedVariable
 */
export function assignVariable(
  ctx: RuntimeContext,
  name: string,
  value: GroveValue,
  location?: SourceLocation
): void {
  const owner = findVariableOwner(ctx, name);
  if (!owner) {
    throw createRuntimeError(
      GROVE_ERROR_CODES.UNDEFINED_VARIABLE,
      { name },
      location
    );
  }
  owner.variables.set(name, value);
}

function findVariableOwner(
  ctx: RuntimeContext,
  name: string
): RuntimeContext | undefined {
  for (let scope: RuntimeContext | undefined = ctx; scope; scope = scope.parent) {
    if (scope.variables.has(name)) return scope;
  }
  return undefined;
}
