/**
 * Type Infrastructure for Evaluator Mixins
 *
 * @internal
 */

import type { EvaluatorBase } from './base.js';

/**
 * Constructor type for EvaluatorBase or any class extending it.
 * This is the input type for mixin functions.
 *
 * Note: `any[]` is required for constructor args because mixins don't know
 * what parameters the base constructor accepts. This is the standard TypeScript
 * mixin pattern.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> = new (...args: any[]) => TBase;
