/**
 * CLI Shared Utilities
 * Common formatting functions for the grove binary
 */

import { LexerError, ParseError, RuntimeError } from './error-classes.js';
import type { CallFrame } from './error-classes.js';
import type { StatementKind } from './ast-nodes.js';
import { formatValue } from './runtime/index.js';
import type { GroveValue, ObservabilityCallbacks } from './runtime/index.js';

/** Human-readable statement names used in runtime error reports */
export const STATEMENT_LABELS: Record<StatementKind, string> = {
  VariableDeclaration: 'variable declaration',
  Assignment: 'assignment',
  If: 'if statement',
  IfElse: 'if/else statement',
  While: 'while loop',
  FunctionDeclaration: 'function declaration',
  Return: 'return statement',
  Print: 'print statement',
  Input: 'input statement',
};

function isStatementKind(value: string): value is StatementKind {
  return Object.hasOwn(STATEMENT_LABELS, value);
}

function stripLocation(message: string): string {
  return message.replace(/ at \d+:\d+$/, '');
}

/**
 * Convert a value to its printed form
 */
export function formatOutput(value: GroveValue): string {
  return formatValue(value);
}

/**
 * Render active call frames innermost first, one per line
 */
export function formatCallStack(frames: readonly CallFrame[]): string {
  return [...frames]
    .reverse()
    .map((frame) => {
      const where = frame.location ? ` (line ${frame.location.line})` : '';
      return `  at ${frame.functionName}${where}`;
    })
    .join('\n');
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location?.line ?? 1}: ${stripLocation(err.message)}`;
  }

  if (err instanceof ParseError) {
    return `Parse error at line ${err.location?.line ?? 1}: ${stripLocation(err.message)}`;
  }

  if (err instanceof RuntimeError) {
    const baseMessage = stripLocation(err.message);
    const statement = err.statement;
    const inClause =
      statement !== undefined
        ? ` (in ${isStatementKind(statement) ? STATEMENT_LABELS[statement] : statement})`
        : '';
    const head = err.location
      ? `Runtime error at line ${err.location.line}${inClause}: ${baseMessage}`
      : `Runtime error${inClause}: ${baseMessage}`;
    const frames = err.callStack ?? [];
    return frames.length > 0 ? `${head}\n${formatCallStack(frames)}` : head;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Observability callbacks that log execution events to stderr
 */
export function createTraceObserver(
  log: (line: string) => void = (line) => console.error(line)
): ObservabilityCallbacks {
  return {
    onStepStart: (event) => {
      log(`[trace] step ${event.index + 1}/${event.total} ${event.statement}`);
    },
    onStepEnd: (event) => {
      log(
        `[trace] step ${event.index + 1}/${event.total} done in ${event.durationMs}ms`
      );
    },
    onFunctionCall: (event) => {
      const args = event.args.map(formatValue).join(', ');
      log(`[trace] call ${event.name}(${args}) depth ${event.depth}`);
    },
    onFunctionReturn: (event) => {
      log(
        `[trace] return ${event.name} -> ${formatValue(event.value)} in ${event.durationMs}ms`
      );
    },
    onError: (event) => {
      const where = event.index !== undefined ? ` at step ${event.index + 1}` : '';
      log(`[trace] error${where}: ${event.error.name}`);
    },
  };
}
