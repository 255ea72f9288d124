/**
 * Grove Runtime Tests: Values
 */

import { describe, expect, it } from 'vitest';
import {
  boolean,
  float,
  formatFloat,
  formatValue,
  integer,
  string,
  typeName,
  valuesEqual,
} from '../../src/index.js';

describe('Grove Runtime: Values', () => {
  describe('constructors', () => {
    it('builds tagged values', () => {
      expect(integer(5n)).toEqual({ kind: 'integer', value: 5n });
      expect(float(2.5)).toEqual({ kind: 'float', value: 2.5 });
      expect(boolean(true)).toEqual({ kind: 'boolean', value: true });
      expect(string('hi')).toEqual({ kind: 'string', value: 'hi' });
    });

    it('accepts numbers for integers and truncates them', () => {
      expect(integer(7).value).toBe(7n);
      expect(integer(-7.9).value).toBe(-7n);
    });

    it('wraps integers to the signed 64-bit range', () => {
      expect(integer(2n ** 63n).value).toBe(-(2n ** 63n));
      expect(integer(-(2n ** 63n) - 1n).value).toBe(2n ** 63n - 1n);
    });

    it('freezes values', () => {
      expect(Object.isFrozen(integer(1n))).toBe(true);
      expect(Object.isFrozen(string('x'))).toBe(true);
    });
  });

  describe('typeName', () => {
    it('names every variant', () => {
      expect(typeName(integer(1n))).toBe('Integer');
      expect(typeName(float(1))).toBe('Float');
      expect(typeName(boolean(false))).toBe('Boolean');
      expect(typeName(string(''))).toBe('String');
    });
  });

  describe('valuesEqual', () => {
    it('compares payloads of the same variant', () => {
      expect(valuesEqual(integer(3n), integer(3n))).toBe(true);
      expect(valuesEqual(string('a'), string('b'))).toBe(false);
    });

    it('never equates different variants', () => {
      expect(valuesEqual(integer(1n), float(1))).toBe(false);
      expect(valuesEqual(boolean(true), integer(1n))).toBe(false);
    });

    it('treats NaN as unequal to itself', () => {
      expect(valuesEqual(float(NaN), float(NaN))).toBe(false);
    });
  });

  describe('formatValue', () => {
    it('renders display forms', () => {
      expect(formatValue(integer(-12n))).toBe('-12');
      expect(formatValue(float(3.5))).toBe('3.5');
      expect(formatValue(float(2))).toBe('2');
      expect(formatValue(boolean(true))).toBe('true');
      expect(formatValue(string('plain text'))).toBe('plain text');
    });

    it('writes large and small Floats without an exponent', () => {
      expect(formatValue(float(1e21))).toBe('1000000000000000000000');
      expect(formatValue(float(1e22))).toBe('10000000000000000000000');
      expect(formatValue(float(1e-7))).toBe('0.0000001');
      expect(formatFloat(-1.5e-7)).toBe('-0.00000015');
      expect(formatFloat(1.25e21)).toBe('1250000000000000000000');
    });

    it('spells out non-finite Floats', () => {
      expect(formatValue(float(1.0 / 0.0))).toBe('inf');
      expect(formatValue(float(-1.0 / 0.0))).toBe('-inf');
      expect(formatValue(float(NaN))).toBe('NaN');
      expect(formatFloat(-0)).toBe('-0');
    });
  });
});
