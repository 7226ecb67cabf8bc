/**
 * Univariate test selector
 *
 * Large samples (n >= threshold) use the normal approximation; smaller
 * samples use Student's t with n - 1 degrees of freedom.
 */

import { InferenceError } from '../api/errors.js';
import { INFERENCE } from '../config/defaults.js';
import type { DistributionSelection } from '../types/inference.js';

export const DEFAULT_LARGE_SAMPLE_THRESHOLD: number = INFERENCE.LARGE_SAMPLE_THRESHOLD;

/**
 * Choose the reference distribution for a sample of size n.
 *
 * @param n - Sample size (integer >= 1)
 * @param largeSampleThreshold - Smallest n that uses the Z distribution
 */
export function selectDistribution(
  n: number,
  largeSampleThreshold = DEFAULT_LARGE_SAMPLE_THRESHOLD
): DistributionSelection {
  assertSampleSize(n);

  if (n >= largeSampleThreshold) {
    return { kind: 'z', testName: 'Z-Test', label: 'Normal (Z)' };
  }

  const degreesOfFreedom = n - 1;
  return {
    kind: 't',
    testName: 'T-Test',
    degreesOfFreedom,
    label: `Student's T (df=${degreesOfFreedom})`,
  };
}

/**
 * Throws InvalidSampleSize unless n is an integer >= 1.
 */
export function assertSampleSize(n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new InferenceError('InvalidSampleSize', `Sample size must be an integer >= 1, got ${n}`, {
      n,
    });
  }
}
