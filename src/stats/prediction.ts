/**
 * Prediction function: ŷ = slope·x + intercept
 */

import type { LineCoefficients } from '../types/regression.js';
import { assertAllFinite, assertFinite } from '../utils/guards.js';

/**
 * Apply a fitted line to one value or elementwise over a sequence.
 *
 * @example
 * ```typescript
 * predict({ slope: 2, intercept: 1 }, 3);        // => 7
 * predict({ slope: 2, intercept: 1 }, [0, 1]);   // => [1, 3]
 * ```
 */
export function predict(line: LineCoefficients, x: number): number;
export function predict(line: LineCoefficients, x: readonly number[]): number[];
export function predict(line: LineCoefficients, x: number | readonly number[]): number | number[] {
  assertFinite('slope', line.slope);
  assertFinite('intercept', line.intercept);

  if (typeof x === 'number') {
    assertFinite('x', x);
    return line.slope * x + line.intercept;
  }

  assertAllFinite('x', x);
  return x.map((value) => line.slope * value + line.intercept);
}
