/**
 * Grove Language Tests: Expressions
 * Precedence, numeric promotion and operator errors.
 */

import { describe, expect, it } from 'vitest';
import { RuntimeError, float, integer } from '../../src/index.js';
import { run, runError, runFull } from '../helpers/runtime.js';

describe('Grove Language: Expressions', () => {
  describe('precedence', () => {
    it('binds * tighter than +', async () => {
      expect(await run('print(1 + 2 * 3);')).toEqual(['7']);
      expect(await run('print((1 + 2) * 3);')).toEqual(['9']);
    });

    it('associates to the left', async () => {
      expect(await run('print(10 - 4 - 3);')).toEqual(['3']);
      expect(await run('print(100 / 10 / 5);')).toEqual(['2']);
    });

    it('binds unary operators tightest', async () => {
      expect(await run('print(-3 + 1);')).toEqual(['-2']);
      expect(await run('print(--3);')).toEqual(['3']);
      expect(await run('print(not true || false);')).toEqual(['false']);
      expect(await run('print(!(1 < 2));')).toEqual(['false']);
    });

    it('evaluates comparisons before logic', async () => {
      expect(await run('print(1 < 2 && 2 < 3);')).toEqual(['true']);
      expect(await run('print(1 == 1 || 1 == 2);')).toEqual(['true']);
    });
  });

  describe('numeric results', () => {
    it('keeps exact integer division Integer', async () => {
      const { printed } = await runFull('print(6 / 2);\nprint(7 / 2);');
      expect(printed).toEqual([integer(3n), float(3.5)]);
    });

    it('promotes mixed operands to Float', async () => {
      const { printed } = await runFull('print(1 + 2.5);\nprint(2 * 0.5);');
      expect(printed).toEqual([float(3.5), float(1)]);
    });

    it('reads exponent literals as Float', async () => {
      const { printed } = await runFull('print(1e2);\nprint(2.5E-1);');
      expect(printed).toEqual([float(100), float(0.25)]);
    });

    it('computes integer remainders', async () => {
      expect(await run('print(7 % 3);\nprint(-7 % 3);')).toEqual(['1', '-1']);
    });

    it('compares Integer with Float', async () => {
      expect(await run('print(2 <= 2.0);\nprint(3 > 3.5);')).toEqual([
        'true',
        'false',
      ]);
    });
  });

  describe('operand checks', () => {
    it('rejects mixing Boolean and Integer', async () => {
      const error = await runError('print(true == 1);');
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.errorId).toBe('GROVE-R005');
        expect(error.message).toBe(
          'Operator == cannot be applied to Boolean and Integer at 1:7'
        );
      }
    });

    it('rejects Float remainders', async () => {
      const error = await runError('print(1.5 % 1);');
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.errorId).toBe('GROVE-R005');
      }
    });

    it('rejects string concatenation', async () => {
      const error = await runError('print("a" + "b");');
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.message).toBe(
          'Operator + cannot be applied to String and String at 1:7'
        );
      }
    });

    it('rejects Integer division by zero', async () => {
      const error = await runError('let z = 0;\nprint(5 / z);');
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.errorId).toBe('GROVE-R011');
        expect(error.statement).toBe('Print');
      }
    });

    it('prints extreme Floats in positional form', async () => {
      expect(
        await run('print(1e21);\nprint(0.0000001);\nprint(1.0 / 0.0);\nprint(10000000000000000000000.0);')
      ).toEqual([
        '1000000000000000000000',
        '0.0000001',
        'inf',
        '10000000000000000000000',
      ]);
    });

    it('divides Floats by zero without failing', async () => {
      expect(await run('print(1.0 / 0);\nprint(-1 / 0.0);')).toEqual([
        'inf',
        '-inf',
      ]);
    });
  });

  describe('evaluation order', () => {
    it('evaluates both operands of && and ||', async () => {
      const source = [
        'fn touch(label) { print(label); return true; }',
        'print(false && touch("right of and"));',
        'print(true || touch("right of or"));',
      ].join('\n');
      expect(await run(source)).toEqual([
        'right of and',
        'false',
        'right of or',
        'true',
      ]);
    });

    it('type-checks the right operand even when the left decides', async () => {
      const error = await runError('print(false && 1);');
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.errorId).toBe('GROVE-R005');
      }
    });
  });
});
