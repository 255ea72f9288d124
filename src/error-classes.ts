/**
 * Grove Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// CALL FRAME
// ============================================================

/**
 * Call stack frame information for error reporting.
 * One frame per active user function call.
 */
export interface CallFrame {
  /** Source location of the call expression */
  readonly location?: SourceLocation | undefined;
  readonly functionName: string;
}

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface GroveErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  /** Kind of the innermost statement executing when the error was raised */
  readonly statement?: string | undefined;
  readonly callStack?: readonly CallFrame[] | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Grove errors.
 * Provides structured data for host applications to format as needed.
 */
export class GroveError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly statement?: string | undefined;
  readonly callStack?: readonly CallFrame[] | undefined;

  constructor(data: GroveErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'GroveError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
    this.statement = data.statement;
    this.callStack = data.callStack;
  }

  /** Get structured error data for custom formatting */
  toData(): GroveErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
      statement: this.statement,
      callStack: this.callStack,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: GroveErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Tokenization errors */
export class LexerError extends GroveError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'lexer');
    super({ errorId, message, location, context });
    this.name = 'LexerError';
  }
}

/** Parse-time errors */
export class ParseError extends GroveError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
  }
}

/** Runtime execution errors */
export class RuntimeError extends GroveError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>,
    annotation?: {
      statement?: string | undefined;
      callStack?: readonly CallFrame[] | undefined;
    }
  ) {
    assertCategory(errorId, 'runtime');
    super({
      errorId,
      message,
      location,
      context,
      statement: annotation?.statement,
      callStack: annotation?.callStack,
    });
    this.name = 'RuntimeError';
  }

  /**
   * Copy of this error tagged with the statement kind and call stack.
   * An error that already carries a statement is returned unchanged, so
   * the innermost statement wins as the error unwinds.
   */
  withStatement(
    statement: string,
    callStack: readonly CallFrame[]
  ): RuntimeError {
    if (this.statement !== undefined) return this;
    const data = this.toData();
    return new RuntimeError(
      this.errorId,
      data.message,
      this.location,
      this.context,
      { statement, callStack: [...callStack] }
    );
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

const START: SourceLocation = { line: 1, column: 1, offset: 0 };

/**
 * Create an error from the registry.
 *
 * Renders the definition's message template with `context` and returns
 * the subclass matching the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("GROVE-R001", { name: "x" }, location)
 * // RuntimeError: "Variable x is not defined at 1:5"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): GroveError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'lexer':
      return new LexerError(errorId, message, location ?? START, context);
    case 'parse':
      return new ParseError(errorId, message, location ?? START, context);
    case 'runtime':
      return new RuntimeError(errorId, message, location, context);
  }
}

/** Runtime-only variant of createError for throw sites inside the evaluator */
export function createRuntimeError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): RuntimeError {
  assertCategory(errorId, 'runtime');
  const definition = ERROR_REGISTRY.get(errorId);
  const message = renderMessage(definition?.messageTemplate ?? '', context);
  return new RuntimeError(errorId, message, location, context);
}

/** Frames of user function calls active when the error was raised */
export function getCallStack(error: GroveError): readonly CallFrame[] {
  return error.callStack ?? [];
}
