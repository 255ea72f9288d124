/**
 * Operator Table
 *
 * Single source of truth for which operand variants each operator
 * accepts and what it computes. The evaluator never inspects operand
 * types itself; it hands both values to `applyBinaryOperator`.
 */

import type { SourceLocation } from '../../source-location.js';
import { createRuntimeError } from '../../error-classes.js';
import { GROVE_ERROR_CODES } from '../../error-registry.js';
import type { RuntimeError } from '../../error-classes.js';
import type { GroveValue, GroveValueKind } from './values.js';
import {
  boolean,
  float,
  integer,
  isNumeric,
  toFloat,
  typeName,
  valuesEqual,
} from './values.js';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
export type LogicalOperator = '&&' | '||';
export type RelationalOperator = '<' | '>' | '<=' | '>=';
export type EqualityOperator = '==' | '!=';

export type BinaryOperator =
  | ArithmeticOperator
  | LogicalOperator
  | RelationalOperator
  | EqualityOperator;

export type UnaryOperator = '-' | '!';

export type OperatorFamily = 'arithmetic' | 'logical' | 'relational' | 'equality';

/** Ordered operand variants, e.g. `integer,float` */
export type OperandPair = `${GroveValueKind},${GroveValueKind}`;

export interface OperatorRule {
  readonly family: OperatorFamily;
  readonly accepts: ReadonlySet<OperandPair>;
  apply(
    left: GroveValue,
    right: GroveValue,
    location?: SourceLocation
  ): GroveValue;
}

export const BINARY_OPERATORS: readonly BinaryOperator[] = [
  '+',
  '-',
  '*',
  '/',
  '%',
  '&&',
  '||',
  '<',
  '>',
  '<=',
  '>=',
  '==',
  '!=',
];

const NUMERIC_PAIRS: ReadonlySet<OperandPair> = new Set<OperandPair>([
  'integer,integer',
  'integer,float',
  'float,integer',
  'float,float',
]);

const INTEGER_PAIRS: ReadonlySet<OperandPair> = new Set<OperandPair>([
  'integer,integer',
]);

const BOOLEAN_PAIRS: ReadonlySet<OperandPair> = new Set<OperandPair>([
  'boolean,boolean',
]);

const SAME_VARIANT_PAIRS: ReadonlySet<OperandPair> = new Set<OperandPair>([
  'integer,integer',
  'float,float',
  'boolean,boolean',
  'string,string',
]);

export function operandPair(left: GroveValue, right: GroveValue): OperandPair {
  return `${left.kind},${right.kind}`;
}

function incompatible(
  operator: BinaryOperator,
  left: GroveValue,
  right: GroveValue,
  location?: SourceLocation
): RuntimeError {
  return createRuntimeError(
    GROVE_ERROR_CODES.INCOMPATIBLE_OPERANDS,
    {
      operator,
      left,
      right,
      leftType: typeName(left),
      rightType: typeName(right),
    },
    location
  );
}

function divisionByZero(
  operation: string,
  location?: SourceLocation
): RuntimeError {
  return createRuntimeError(
    GROVE_ERROR_CODES.DIVISION_BY_ZERO,
    { operation },
    location
  );
}

// ============================================================
// RULE BUILDERS
// ============================================================

/**
 * Integer pairs use `onIntegers`; any other numeric pair is promoted
 * to Float and uses `onFloats`.
 */
function arithmetic(
  operator: ArithmeticOperator,
  onIntegers: (a: bigint, b: bigint, location?: SourceLocation) => GroveValue,
  onFloats: (a: number, b: number) => number
): OperatorRule {
  return {
    family: 'arithmetic',
    accepts: NUMERIC_PAIRS,
    apply(left, right, location) {
      if (left.kind === 'integer' && right.kind === 'integer') {
        return onIntegers(left.value, right.value, location);
      }
      if (isNumeric(left) && isNumeric(right)) {
        return float(onFloats(toFloat(left), toFloat(right)));
      }
      throw incompatible(operator, left, right, location);
    },
  };
}

function relational(
  operator: RelationalOperator,
  onIntegers: (a: bigint, b: bigint) => boolean,
  onFloats: (a: number, b: number) => boolean
): OperatorRule {
  return {
    family: 'relational',
    accepts: NUMERIC_PAIRS,
    apply(left, right, location) {
      if (left.kind === 'integer' && right.kind === 'integer') {
        return boolean(onIntegers(left.value, right.value));
      }
      if (isNumeric(left) && isNumeric(right)) {
        return boolean(onFloats(toFloat(left), toFloat(right)));
      }
      throw incompatible(operator, left, right, location);
    },
  };
}

function logical(
  operator: LogicalOperator,
  combine: (a: boolean, b: boolean) => boolean
): OperatorRule {
  return {
    family: 'logical',
    accepts: BOOLEAN_PAIRS,
    apply(left, right, location) {
      if (left.kind === 'boolean' && right.kind === 'boolean') {
        return boolean(combine(left.value, right.value));
      }
      throw incompatible(operator, left, right, location);
    },
  };
}

function equality(operator: EqualityOperator, negate: boolean): OperatorRule {
  return {
    family: 'equality',
    accepts: SAME_VARIANT_PAIRS,
    apply(left, right, location) {
      if (left.kind !== right.kind) {
        throw incompatible(operator, left, right, location);
      }
      return boolean(valuesEqual(left, right) !== negate);
    },
  };
}

// ============================================================
// OPERATOR TABLE
// ============================================================

export const OPERATOR_TABLE: Readonly<Record<BinaryOperator, OperatorRule>> = {
  '+': arithmetic('+', (a, b) => integer(a + b), (a, b) => a + b),
  '-': arithmetic('-', (a, b) => integer(a - b), (a, b) => a - b),
  '*': arithmetic('*', (a, b) => integer(a * b), (a, b) => a * b),
  '/': arithmetic(
    '/',
    (a, b, location) => {
      if (b === 0n) throw divisionByZero('division', location);
      // Exact quotients stay Integer; anything else is the true quotient
      if (a % b === 0n) return integer(a / b);
      return float(Number(a) / Number(b));
    },
    (a, b) => a / b
  ),
  '%': {
    family: 'arithmetic',
    accepts: INTEGER_PAIRS,
    apply(left, right, location) {
      if (left.kind !== 'integer' || right.kind !== 'integer') {
        throw incompatible('%', left, right, location);
      }
      if (right.value === 0n) throw divisionByZero('remainder', location);
      return integer(left.value % right.value);
    },
  },
  '&&': logical('&&', (a, b) => a && b),
  '||': logical('||', (a, b) => a || b),
  '<': relational(
    '<',
    (a, b) => a < b,
    (a, b) => a < b
  ),
  '>': relational(
    '>',
    (a, b) => a > b,
    (a, b) => a > b
  ),
  '<=': relational(
    '<=',
    (a, b) => a <= b,
    (a, b) => a <= b
  ),
  '>=': relational(
    '>=',
    (a, b) => a >= b,
    (a, b) => a >= b
  ),
  '==': equality('==', false),
  '!=': equality('!=', true),
};

/** True when the table defines `operator` for the ordered variant pair */
export function acceptsOperands(
  operator: BinaryOperator,
  left: GroveValueKind,
  right: GroveValueKind
): boolean {
  return OPERATOR_TABLE[operator].accepts.has(`${left},${right}`);
}

/**
 * Apply a binary operator to two already-evaluated operands.
 *
 * @throws RuntimeError IncompatibleOperands for pairs outside the table
 * @throws RuntimeError DivisionByZero for Integer `/` or `%` by zero
 */
export function applyBinaryOperator(
  operator: BinaryOperator,
  left: GroveValue,
  right: GroveValue,
  location?: SourceLocation
): GroveValue {
  const rule = OPERATOR_TABLE[operator];
  if (!rule.accepts.has(operandPair(left, right))) {
    throw incompatible(operator, left, right, location);
  }
  return rule.apply(left, right, location);
}

export function applyUnaryOperator(
  operator: UnaryOperator,
  operand: GroveValue,
  location?: SourceLocation
): GroveValue {
  if (operator === '-') {
    if (operand.kind === 'integer') return integer(-operand.value);
    if (operand.kind === 'float') return float(-operand.value);
  } else if (operand.kind === 'boolean') {
    return boolean(!operand.value);
  }
  throw createRuntimeError(
    GROVE_ERROR_CODES.UNSUPPORTED_UNARY_OPERAND,
    { operator, operand, operandType: typeName(operand) },
    location
  );
}
