/**
 * Sample summariser
 *
 * Turns raw observations into the summary statistics consumed by the
 * interval and test routines.
 */

import { mean, sampleStandardDeviation } from 'simple-statistics';
import { InferenceError } from '../api/errors.js';
import type { SampleSummary } from '../types/inference.js';
import { assertAllFinite } from '../utils/guards.js';

/**
 * Summarize raw values: mean, sample standard deviation (n - 1
 * denominator) and size. The raw values are kept on the summary.
 *
 * A single observation has a standard deviation of 0.
 *
 * @example
 * ```typescript
 * summarizeSample([48, 52, 45, 55, 50, 49, 51]);
 * // => { mean: 50, standardDeviation: 3.162..., n: 7, rawValues: [...] }
 * ```
 */
export function summarizeSample(values: readonly number[]): SampleSummary {
  if (values.length === 0) {
    throw new InferenceError('InvalidSampleSize', 'Cannot summarize an empty sample', { n: 0 });
  }
  assertAllFinite('values', values);

  const data = [...values];

  return {
    mean: mean(data),
    standardDeviation: data.length > 1 ? sampleStandardDeviation(data) : 0,
    n: data.length,
    rawValues: data,
  };
}
