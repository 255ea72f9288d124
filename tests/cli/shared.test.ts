/**
 * Grove CLI Tests: error formatting and tracing
 */

import { describe, expect, it } from 'vitest';
import {
  createTraceObserver,
  formatCallStack,
  formatError,
  formatOutput,
} from '../../src/cli-shared.js';
import {
  float,
  integer,
  parse,
  RuntimeError,
  string,
} from '../../src/index.js';
import { runError } from '../helpers/runtime.js';

function thrownBy(fn: () => unknown): Error {
  try {
    fn();
  } catch (error) {
    if (error instanceof Error) return error;
  }
  throw new Error('Expected an error');
}

describe('cli-shared', () => {
  describe('formatOutput', () => {
    it('uses the print display form', () => {
      expect(formatOutput(string('text'))).toBe('text');
      expect(formatOutput(float(0.5))).toBe('0.5');
      expect(formatOutput(integer(-3n))).toBe('-3');
    });
  });

  describe('formatError', () => {
    it('formats lexer errors with their line', () => {
      const error = thrownBy(() => parse('let a = 1;\nlet b = #;'));
      expect(formatError(error)).toBe('Lexer error at line 2: Unexpected character: #');
    });

    it('formats parse errors with their line', () => {
      const error = thrownBy(() => parse('let x = 1'));
      expect(formatError(error)).toBe(
        "Parse error at line 1: Expected ';' after variable declaration, got: end of input"
      );
    });

    it('names the statement a runtime error escaped from', async () => {
      const error = await runError('let x = 1;\nprint(x + true);');
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(formatError(error)).toBe(
          'Runtime error at line 2 (in print statement): Operator + cannot be applied to Integer and Boolean'
        );
      }
    });

    it('lists active calls innermost first', async () => {
      const source = [
        'fn leaf() { return nothing; }',
        'fn branch() { let v = leaf(); return v; }',
        'print(branch());',
      ].join('\n');
      const error = await runError(source);
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(formatError(error)).toBe(
          [
            'Runtime error at line 1 (in return statement): Variable nothing is not defined',
            '  at leaf (line 2)',
            '  at branch (line 3)',
          ].join('\n')
        );
      }
    });

    it('formats runtime errors without location or statement', () => {
      expect(formatError(new RuntimeError('GROVE-R010', 'Failed to read input: gone'))).toBe(
        'Runtime error: Failed to read input: gone'
      );
    });

    it('formats missing files', () => {
      const error = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: '/tmp/missing.grv',
      });
      expect(formatError(error)).toBe('File not found: /tmp/missing.grv');
    });

    it('passes other errors through', () => {
      expect(formatError(new Error('Unknown option: --x'))).toBe('Unknown option: --x');
    });
  });

  describe('formatCallStack', () => {
    it('omits the line when a frame has no location', () => {
      expect(formatCallStack([{ functionName: 'main' }])).toBe('  at main');
    });
  });

  describe('createTraceObserver', () => {
    it('writes one line per event', () => {
      const lines: string[] = [];
      const observer = createTraceObserver((line) => lines.push(line));

      observer.onStepStart?.({ index: 0, total: 2, statement: 'Print' });
      observer.onStepEnd?.({ index: 0, total: 2, statement: 'Print', durationMs: 3 });
      observer.onFunctionCall?.({ name: 'f', args: [integer(1n), string('a')], depth: 2 });
      observer.onFunctionReturn?.({ name: 'f', value: float(1.5), durationMs: 0 });
      observer.onError?.({ error: new RuntimeError('GROVE-R001', 'x'), index: 1 });

      expect(lines).toEqual([
        '[trace] step 1/2 Print',
        '[trace] step 1/2 done in 3ms',
        '[trace] call f(1, a) depth 2',
        '[trace] return f -> 1.5 in 0ms',
        '[trace] error at step 2: RuntimeError',
      ]);
    });
  });
});
