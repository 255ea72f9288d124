/**
 * Control Flow Signals
 *
 * Thrown to unwind nested statement lists. A return signal never
 * crosses a function-call boundary; at the program top level it ends
 * the run.
 */

import type { GroveValue } from './values.js';

/** Signal thrown by `return` */
export class ReturnSignal extends Error {
  constructor(public readonly value: GroveValue) {
    super('return');
    this.name = 'ReturnSignal';
  }
}
