/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/** Example demonstrating an error condition */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: GROVE-{category}{3-digit} (e.g., GROVE-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Short name of the condition, e.g. UndefinedVariable */
  readonly kind: string;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** Error IDs by condition, for use at throw sites */
export const GROVE_ERROR_CODES = {
  // Lexer
  UNTERMINATED_STRING: 'GROVE-L001',
  INVALID_CHARACTER: 'GROVE-L002',
  INVALID_NUMBER: 'GROVE-L003',
  INVALID_ESCAPE: 'GROVE-L004',
  // Parser
  UNEXPECTED_TOKEN: 'GROVE-P001',
  UNCLOSED_DELIMITER: 'GROVE-P002',
  EXPECTED_EXPRESSION: 'GROVE-P003',
  MISSING_SEMICOLON: 'GROVE-P004',
  // Runtime
  UNDEFINED_VARIABLE: 'GROVE-R001',
  UNDEFINED_FUNCTION: 'GROVE-R002',
  NAME_ALREADY_BOUND: 'GROVE-R003',
  SHADOWING_VIOLATION: 'GROVE-R004',
  INCOMPATIBLE_OPERANDS: 'GROVE-R005',
  UNSUPPORTED_UNARY_OPERAND: 'GROVE-R006',
  NON_BOOLEAN_CONDITION: 'GROVE-R007',
  ARITY_MISMATCH: 'GROVE-R008',
  TYPE_MISMATCH: 'GROVE-R009',
  IO_FAILURE: 'GROVE-R010',
  DIVISION_BY_ZERO: 'GROVE-R011',
  CALL_DEPTH_EXCEEDED: 'GROVE-R012',
} as const;

export type GroveErrorCode =
  (typeof GROVE_ERROR_CODES)[keyof typeof GROVE_ERROR_CODES];

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (GROVE-L0xx)
  {
    errorId: GROVE_ERROR_CODES.UNTERMINATED_STRING,
    category: 'lexer',
    kind: 'UnterminatedString',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a double quote but never closed on that line.',
    resolution: 'Add the closing quote. Use \\n for line breaks.',
    examples: [{ description: 'Missing closing quote', code: 'print("hi);' }],
  },
  {
    errorId: GROVE_ERROR_CODES.INVALID_CHARACTER,
    category: 'lexer',
    kind: 'InvalidCharacter',
    description: 'Invalid character',
    messageTemplate: 'Unexpected character: {char}',
    examples: [{ description: 'Unsupported symbol', code: 'let x = 5 # 2;' }],
  },
  {
    errorId: GROVE_ERROR_CODES.INVALID_NUMBER,
    category: 'lexer',
    kind: 'InvalidNumber',
    description: 'Invalid number literal',
    messageTemplate: 'Invalid number literal: {value}',
    cause: 'Integer literal does not fit in a 64-bit signed integer.',
  },
  {
    errorId: GROVE_ERROR_CODES.INVALID_ESCAPE,
    category: 'lexer',
    kind: 'InvalidEscape',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence: \\{char}',
    resolution: 'Supported escapes are \\n, \\t, \\r, \\\\ and \\".',
  },

  // Parse Errors (GROVE-P0xx)
  {
    errorId: GROVE_ERROR_CODES.UNEXPECTED_TOKEN,
    category: 'parse',
    kind: 'UnexpectedToken',
    description: 'Unexpected token',
    messageTemplate: 'Expected {expected}, got: {actual}',
  },
  {
    errorId: GROVE_ERROR_CODES.UNCLOSED_DELIMITER,
    category: 'parse',
    kind: 'UnclosedDelimiter',
    description: 'Unclosed delimiter',
    messageTemplate: 'Unclosed {delimiter}',
    examples: [
      { description: 'Block never closed', code: 'while (true) { print(1);' },
    ],
  },
  {
    errorId: GROVE_ERROR_CODES.EXPECTED_EXPRESSION,
    category: 'parse',
    kind: 'ExpectedExpression',
    description: 'Expected expression',
    messageTemplate: 'Expected expression, got: {actual}',
  },
  {
    errorId: GROVE_ERROR_CODES.MISSING_SEMICOLON,
    category: 'parse',
    kind: 'MissingSemicolon',
    description: 'Missing statement terminator',
    messageTemplate: "Expected ';' after {statement}, got: {actual}",
  },

  // Runtime Errors (GROVE-R0xx)
  {
    errorId: GROVE_ERROR_CODES.UNDEFINED_VARIABLE,
    category: 'runtime',
    kind: 'UndefinedVariable',
    description: 'Undefined variable',
    messageTemplate: 'Variable {name} is not defined',
    cause: 'Name read, assigned or used as input target before any let.',
    resolution: 'Declare the variable with let before using it.',
    examples: [{ description: 'Assignment without let', code: 'x = 1;' }],
  },
  {
    errorId: GROVE_ERROR_CODES.UNDEFINED_FUNCTION,
    category: 'runtime',
    kind: 'UndefinedFunction',
    description: 'Undefined function',
    messageTemplate: 'Function {name} is not defined',
  },
  {
    errorId: GROVE_ERROR_CODES.NAME_ALREADY_BOUND,
    category: 'runtime',
    kind: 'NameAlreadyBound',
    description: 'Name already declared in scope',
    messageTemplate: '{entity} {name} already exists in this scope',
    examples: [
      { description: 'Declaring twice', code: 'let a = 1;\nlet a = 2;' },
    ],
  },
  {
    errorId: GROVE_ERROR_CODES.SHADOWING_VIOLATION,
    category: 'runtime',
    kind: 'ShadowingViolation',
    description: 'Declaration shadows an outer name',
    messageTemplate: '{entity} {name} is already declared in an enclosing scope',
    cause: 'Inner blocks may not redeclare names visible from outer blocks.',
    resolution: 'Pick a different name or assign to the outer variable.',
  },
  {
    errorId: GROVE_ERROR_CODES.INCOMPATIBLE_OPERANDS,
    category: 'runtime',
    kind: 'IncompatibleOperands',
    description: 'Operator not defined for operand types',
    messageTemplate:
      'Operator {operator} cannot be applied to {leftType} and {rightType}',
    examples: [
      { description: 'Strings do not concatenate', code: 'print("a" + "b");' },
      { description: 'Mixed equality', code: 'print(true == 1);' },
    ],
  },
  {
    errorId: GROVE_ERROR_CODES.UNSUPPORTED_UNARY_OPERAND,
    category: 'runtime',
    kind: 'UnsupportedUnaryOperand',
    description: 'Unary operator not defined for operand type',
    messageTemplate: 'Operator {operator} cannot be applied to {operandType}',
  },
  {
    errorId: GROVE_ERROR_CODES.NON_BOOLEAN_CONDITION,
    category: 'runtime',
    kind: 'NonBooleanCondition',
    description: 'Condition is not Boolean',
    messageTemplate: 'Condition must be Boolean, got {actualType}',
    resolution: 'Compare explicitly, e.g. while (n != 0) instead of while (n).',
  },
  {
    errorId: GROVE_ERROR_CODES.ARITY_MISMATCH,
    category: 'runtime',
    kind: 'ArityMismatch',
    description: 'Wrong number of arguments',
    messageTemplate: 'Function {name} expects {expected} argument(s), got {actual}',
  },
  {
    errorId: GROVE_ERROR_CODES.TYPE_MISMATCH,
    category: 'runtime',
    kind: 'TypeMismatch',
    description: 'Input does not match variable type',
    messageTemplate:
      'Cannot store {actualType} input in variable {name} of type {expectedType}',
  },
  {
    errorId: GROVE_ERROR_CODES.IO_FAILURE,
    category: 'runtime',
    kind: 'IoFailure',
    description: 'Input could not be read',
    messageTemplate: 'Failed to read input: {reason}',
  },
  {
    errorId: GROVE_ERROR_CODES.DIVISION_BY_ZERO,
    category: 'runtime',
    kind: 'DivisionByZero',
    description: 'Integer division by zero',
    messageTemplate: 'Integer {operation} by zero',
  },
  {
    errorId: GROVE_ERROR_CODES.CALL_DEPTH_EXCEEDED,
    category: 'runtime',
    kind: 'CallDepthExceeded',
    description: 'Call depth limit exceeded',
    messageTemplate: 'Maximum call depth of {limit} exceeded calling {name}',
    resolution: 'Raise maxCallDepth in grove.config.yaml or add a base case.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing `{placeholder}` names with
 * context values. Missing values render as an empty string; other
 * values are coerced with String().
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "Integer", actual: "Float"})
 * // Returns: "Expected Integer, got Float"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = context[name];
    if (value === undefined) return '';
    return typeof value === 'string' ? value : String(value);
  });
}
