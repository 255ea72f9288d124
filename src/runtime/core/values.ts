/**
 * Grove Value Types and Utilities
 *
 * Core value types that flow through Grove programs: a closed tagged union
 * of four variants. Values are immutable; sharing one is equivalent to
 * copying it.
 */

/** Discriminant of a Grove value */
export type GroveValueKind = 'integer' | 'float' | 'boolean' | 'string';

export interface GroveInteger {
  readonly kind: 'integer';
  readonly value: bigint;
}

export interface GroveFloat {
  readonly kind: 'float';
  readonly value: number;
}

export interface GroveBoolean {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface GroveString {
  readonly kind: 'string';
  readonly value: string;
}

export type GroveValue = GroveInteger | GroveFloat | GroveBoolean | GroveString;

export type GroveNumeric = GroveInteger | GroveFloat;

/** Display name used in diagnostics */
export type GroveTypeName = 'Integer' | 'Float' | 'Boolean' | 'String';

export const VALUE_KINDS: readonly GroveValueKind[] = [
  'integer',
  'float',
  'boolean',
  'string',
];

const TYPE_NAMES: Record<GroveValueKind, GroveTypeName> = {
  integer: 'Integer',
  float: 'Float',
  boolean: 'Boolean',
  string: 'String',
};

const INTEGER_BITS = 64;

/** Wrap an arbitrary bigint to the 64-bit signed range */
export function wrapInteger(value: bigint): bigint {
  return BigInt.asIntN(INTEGER_BITS, value);
}

export const INTEGER_MIN = -(2n ** 63n);
export const INTEGER_MAX = 2n ** 63n - 1n;

// ============================================================
// CONSTRUCTORS
// ============================================================

export function integer(value: bigint | number): GroveInteger {
  const raw = typeof value === 'number' ? BigInt(Math.trunc(value)) : value;
  return Object.freeze({ kind: 'integer', value: wrapInteger(raw) });
}

export function float(value: number): GroveFloat {
  return Object.freeze({ kind: 'float', value });
}

const TRUE: GroveBoolean = Object.freeze({ kind: 'boolean', value: true });
const FALSE: GroveBoolean = Object.freeze({ kind: 'boolean', value: false });

export function boolean(value: boolean): GroveBoolean {
  return value ? TRUE : FALSE;
}

export function string(value: string): GroveString {
  return Object.freeze({ kind: 'string', value });
}

/** Value produced by a function whose body never executes `return` */
export const DEFAULT_VALUE: GroveInteger = integer(0n);

// ============================================================
// INSPECTION
// ============================================================

export function typeName(value: GroveValue): GroveTypeName {
  return TYPE_NAMES[value.kind];
}

export function isNumeric(value: GroveValue): value is GroveNumeric {
  return value.kind === 'integer' || value.kind === 'float';
}

/** Integer payloads convert to the nearest double */
export function toFloat(value: GroveNumeric): number {
  return value.kind === 'integer' ? Number(value.value) : value.value;
}

/**
 * Variant-sensitive structural equality.
 * Integer(1) and Float(1) are NOT equal; NaN never equals itself.
 */
export function valuesEqual(a: GroveValue, b: GroveValue): boolean {
  switch (a.kind) {
    case 'integer':
      return b.kind === 'integer' && a.value === b.value;
    case 'float':
      return b.kind === 'float' && a.value === b.value;
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
  }
}

/**
 * Positional decimal form of a Float: shortest round-trip digits with
 * any exponent expanded. Infinities print as `inf` and `-inf`.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  if (Object.is(value, -0)) return '-0';

  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (match === null) return text;

  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);

  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Display form used by print.
 * Strings render raw, without quotes.
 */
export function formatValue(value: GroveValue): string {
  switch (value.kind) {
    case 'integer':
      return value.value.toString();
    case 'float':
      return formatFloat(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'string':
      return value.value;
  }
}
