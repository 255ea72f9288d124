/**
 * Grove Language Tests: Functions
 * Declaration, calls, frames, return and recursion.
 */

import { describe, expect, it } from 'vitest';
import { RuntimeError, getCallStack, integer, string } from '../../src/index.js';
import { run, runError, runFull } from '../helpers/runtime.js';

describe('Grove Language: Functions', () => {
  describe('calls', () => {
    it('computes factorial recursively', async () => {
      const source = [
        'fn fact(n) {',
        '  if (n <= 1) { return 1; }',
        '  return n * fact(n - 1);',
        '}',
        'print(fact(5));',
      ].join('\n');
      const { printed } = await runFull(source);
      expect(printed).toEqual([integer(120n)]);
    });

    it('yields Integer 0 when the body never returns', async () => {
      const { printed } = await runFull('fn noop() { let x = 1; }\nprint(noop());');
      expect(printed).toEqual([integer(0n)]);
    });

    it('returns from inside nested blocks and loops', async () => {
      const source = [
        'fn firstOver(limit) {',
        '  let i = 0;',
        '  while (true) {',
        '    if (i > limit) { return i; }',
        '    i = i + 1;',
        '  }',
        '  return -1;',
        '}',
        'print(firstOver(3));',
      ].join('\n');
      expect(await run(source)).toEqual(['4']);
    });

    it('evaluates arguments left to right in the caller scope', async () => {
      const source = [
        'fn show(v) { print(v); return v; }',
        'fn minus(a, b) { return a - b; }',
        'let base = 10;',
        'print(minus(show(base), show(2)));',
      ].join('\n');
      expect(await run(source)).toEqual(['10', '2', '8']);
    });

    it('passes values without aliasing the caller variable', async () => {
      const source = [
        'fn bump(v) { v = v + 1; return v; }',
        'let n = 1;',
        'print(bump(n));',
        'print(n);',
      ].join('\n');
      expect(await run(source)).toEqual(['2', '1']);
    });

    it('lets parameters reuse caller variable names', async () => {
      const source = [
        'let n = 10;',
        'fn double(n) { return n * 2; }',
        'print(double(4));',
        'print(n);',
      ].join('\n');
      expect(await run(source)).toEqual(['8', '10']);
    });

    it('calls global functions from inside a frame', async () => {
      const source = [
        'fn helper() { return 2; }',
        'fn compute() { return helper() * 3; }',
        'print(compute());',
      ].join('\n');
      expect(await run(source)).toEqual(['6']);
    });

    it('supports functions declared inside functions', async () => {
      const source = [
        'fn outer() {',
        '  fn inner() { return "from inner"; }',
        '  return inner();',
        '}',
        'print(outer());',
      ].join('\n');
      const { printed } = await runFull(source);
      expect(printed).toEqual([string('from inner')]);
    });
  });

  describe('frames', () => {
    it('hides caller variables from the body', async () => {
      const error = await runError(
        'let secret = 1;\nfn peek() { return secret; }\nprint(peek());'
      );
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.errorId).toBe('GROVE-R001');
        expect(error.statement).toBe('Return');
        expect(getCallStack(error).map((frame) => frame.functionName)).toEqual([
          'peek',
        ]);
      }
    });

    it('drops functions declared in a block when the block ends', async () => {
      const error = await runError(
        'if (true) { fn local() { return 1; } }\nprint(local());'
      );
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.errorId).toBe('GROVE-R002');
        expect(error.message).toBe('Function local is not defined at 2:7');
      }
    });

    it('records the call stack innermost last', async () => {
      const source = [
        'fn inner() { return missing; }',
        'fn outer() { return inner(); }',
        'let v = outer();',
      ].join('\n');
      const error = await runError(source);
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.message).toBe('Variable missing is not defined at 1:21');
        expect(error.statement).toBe('Return');
        expect(
          getCallStack(error).map((frame) => [
            frame.functionName,
            frame.location?.line,
            frame.location?.column,
          ])
        ).toEqual([
          ['outer', 3, 9],
          ['inner', 2, 21],
        ]);
      }
    });

    it('leaves the call stack empty after a completed run', async () => {
      const { context } = await runFull('fn f() { return 1; }\nlet a = f();');
      expect(context.callStack).toEqual([]);
    });
  });

  describe('errors', () => {
    it('checks the argument count before evaluating arguments', async () => {
      const error = await runError(
        'fn one(a) { return a; }\nlet r = one(1, undefinedFn());'
      );
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.errorId).toBe('GROVE-R008');
        expect(error.message).toBe(
          'Function one expects 1 argument(s), got 2 at 2:9'
        );
      }
    });

    it('rejects redeclaring a function in the same scope', async () => {
      const error = await runError(
        'fn f() { return 1; }\nfn f() { return 2; }'
      );
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.errorId).toBe('GROVE-R003');
        expect(error.message).toBe('Function f already exists in this scope at 2:1');
      }
    });

    it('rejects duplicate parameter names when called', async () => {
      const error = await runError('fn dup(a, a) { return a; }\nprint(dup(1, 2));');
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.errorId).toBe('GROVE-R003');
      }
    });

    it('stops runaway recursion at the configured depth', async () => {
      const error = await runError(
        'fn spin(n) { return spin(n + 1); }\nlet x = spin(0);',
        { maxCallDepth: 5 }
      );
      expect(error).toBeInstanceOf(RuntimeError);
      if (error instanceof RuntimeError) {
        expect(error.errorId).toBe('GROVE-R012');
        expect(error.message).toBe(
          'Maximum call depth of 5 exceeded calling spin at 1:21'
        );
        expect(getCallStack(error)).toHaveLength(5);
      }
    });
  });

  describe('top-level return', () => {
    it('ends the program with a value', async () => {
      const { result, output } = await runFull(
        'print("before");\nreturn 40 + 2;\nprint("after");'
      );
      expect(output).toEqual(['before']);
      expect(result.value).toEqual(integer(42n));
    });

    it('leaves the value undefined without a return', async () => {
      const { result } = await runFull('let a = 1;');
      expect(result.value).toBeUndefined();
      expect(result.variables).toEqual({ a: integer(1n) });
    });
  });
});
