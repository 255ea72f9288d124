/**
 * Grove Runtime Tests: Stepper and Observability
 */

import { describe, expect, it } from 'vitest';
import {
  createRuntimeContext,
  createStepper,
  integer,
  parse,
  RuntimeError,
  string,
} from '../../src/index.js';
import { createEventCollector, runError, runStepped } from '../helpers/runtime.js';

describe('Grove Runtime: Stepper', () => {
  it('executes one top-level statement per step', async () => {
    const steps = await runStepped('let a = 1;\nlet b = a + 1;\nprint(b);');
    expect(steps).toEqual([
      { done: false, index: 0, total: 3, statement: 'VariableDeclaration' },
      { done: false, index: 1, total: 3, statement: 'VariableDeclaration' },
      { done: true, index: 2, total: 3, statement: 'Print' },
    ]);
  });

  it('finishes early on a top-level return', async () => {
    const steps = await runStepped('let a = 1;\nreturn a + 1;\nprint(99);');
    expect(steps).toHaveLength(2);
    expect(steps[1]).toEqual({
      done: true,
      index: 1,
      total: 3,
      statement: 'Return',
      returned: integer(2n),
    });
  });

  it('exposes bindings between steps', async () => {
    const ctx = createRuntimeContext({ callbacks: { onPrint: () => {} } });
    const stepper = createStepper(parse('let s = "one";\ns = "two";'), ctx);

    await stepper.step();
    expect(stepper.context.variables.get('s')).toEqual(string('one'));
    expect(stepper.index).toBe(1);

    await stepper.step();
    expect(stepper.done).toBe(true);
    expect(stepper.getResult()).toEqual({
      value: undefined,
      variables: { s: string('two') },
    });
  });

  it('refuses to step past the end', async () => {
    const stepper = createStepper(parse(''), createRuntimeContext());
    expect(stepper.done).toBe(true);
    await expect(stepper.step()).rejects.toThrow(
      'Stepper is done: no statements left to execute'
    );
  });
});

describe('Grove Runtime: Observability', () => {
  it('reports steps and user function calls', async () => {
    const { events, callbacks } = createEventCollector();
    const ctx = createRuntimeContext({
      observability: callbacks,
      callbacks: { onPrint: () => {} },
    });
    const stepper = createStepper(
      parse('fn sq(n) { return n * n; }\nlet r = sq(3);\nprint(r);'),
      ctx
    );
    while (!stepper.done) await stepper.step();

    expect(events.stepStart.map((e) => e.statement)).toEqual([
      'FunctionDeclaration',
      'VariableDeclaration',
      'Print',
    ]);
    expect(events.stepEnd).toHaveLength(3);
    expect(events.functionCall).toEqual([
      { name: 'sq', args: [integer(3n)], depth: 1 },
    ]);
    expect(events.functionReturn).toEqual([{ name: 'sq', value: integer(9n) }]);
    expect(events.error).toEqual([]);
  });

  it('reports nested call depth', async () => {
    const { events, callbacks } = createEventCollector();
    const ctx = createRuntimeContext({ observability: callbacks });
    const source = [
      'fn inner() { return 1; }',
      'fn outer() { return inner() + 1; }',
      'let v = outer();',
    ].join('\n');
    const stepper = createStepper(parse(source), ctx);
    while (!stepper.done) await stepper.step();

    expect(events.functionCall.map((e) => [e.name, e.depth])).toEqual([
      ['outer', 1],
      ['inner', 2],
    ]);
    expect(events.functionReturn.map((e) => e.name)).toEqual(['inner', 'outer']);
  });

  it('reports the failing statement index', async () => {
    const { events, callbacks } = createEventCollector();
    const error = await runError('let x = 1;\nprint(y);', {
      observability: callbacks,
    });

    expect(error).toBeInstanceOf(RuntimeError);
    expect(events.error).toHaveLength(1);
    expect(events.error[0]?.index).toBe(1);
    expect(events.error[0]?.error).toBe(error);
    expect(events.stepEnd).toHaveLength(1);
  });
});
