/**
 * Sample-size optimizer
 *
 * Inverts MoE = c·σ/√n to find the smallest n whose margin of error does
 * not exceed the target: n = ⌈(c·σ / MoE)²⌉.
 */

import { InferenceError } from '../api/errors.js';
import type { SampleSizePlan } from '../types/regression.js';
import { assertFinite, assertStandardDeviation, assertUnitInterval } from '../utils/guards.js';
import { normalQuantile } from './distributions.js';
import { assertSampleSize } from './test-selector.js';

const MAX_ROUNDING_STEPS = 4;

/**
 * Margin of error for a sample of size n: c·σ/√n
 */
export function marginOfErrorFor(n: number, standardDeviation: number, criticalValue: number): number {
  assertSampleSize(n);
  return (criticalValue * standardDeviation) / Math.sqrt(n);
}

/**
 * Smallest sample size achieving the target margin of error.
 *
 * @param assumedStdDev - Assumed population standard deviation (>= 0)
 * @param targetMarginOfError - Desired half-width of the interval (> 0)
 * @param criticalValue - Critical value for the desired confidence (> 0)
 */
export function planSampleSize(
  assumedStdDev: number,
  targetMarginOfError: number,
  criticalValue: number
): SampleSizePlan {
  if (!Number.isFinite(targetMarginOfError) || targetMarginOfError <= 0) {
    throw new InferenceError('InvalidTarget', 'Target margin of error must be positive', {
      targetMarginOfError,
    });
  }
  assertStandardDeviation(assumedStdDev);
  assertFinite('criticalValue', criticalValue);
  if (criticalValue <= 0) {
    throw new InferenceError('InvalidParams', 'Critical value must be positive', { criticalValue });
  }

  const exact = Math.pow((criticalValue * assumedStdDev) / targetMarginOfError, 2);
  if (!(exact <= Number.MAX_SAFE_INTEGER)) {
    throw new InferenceError(
      'InvalidTarget',
      'Target margin of error is too small for a representable sample size',
      { targetMarginOfError, requiredN: exact }
    );
  }
  let requiredN = Math.max(1, Math.ceil(exact));

  // ceil() of a value like 96.00000000000001 can overshoot by one, and
  // rounding in c·σ/√n can leave the target unmet by one; neither drifts
  // further than that
  for (let i = 0; i < MAX_ROUNDING_STEPS; i++) {
    if (
      requiredN > 1 &&
      marginOfErrorFor(requiredN - 1, assumedStdDev, criticalValue) <= targetMarginOfError
    ) {
      requiredN--;
    } else if (
      requiredN < Number.MAX_SAFE_INTEGER &&
      marginOfErrorFor(requiredN, assumedStdDev, criticalValue) > targetMarginOfError
    ) {
      requiredN++;
    } else {
      break;
    }
  }

  return {
    requiredN,
    assumedStdDev,
    targetMarginOfError,
    criticalValue,
    achievedMarginOfError: marginOfErrorFor(requiredN, assumedStdDev, criticalValue),
  };
}

/**
 * Sample-size plan for a confidence level, using the normal critical value
 * z = Φ⁻¹((1 + confidence) / 2).
 */
export function planSampleSizeForConfidence(
  assumedStdDev: number,
  targetMarginOfError: number,
  confidenceLevel: number
): SampleSizePlan {
  assertUnitInterval('confidenceLevel', confidenceLevel);
  return planSampleSize(assumedStdDev, targetMarginOfError, normalQuantile((1 + confidenceLevel) / 2));
}
