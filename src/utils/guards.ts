/**
 * Input guards shared by the statistical routines.
 *
 * Each guard throws an InferenceError with the code the caller surfaces.
 */

import { InferenceError } from '../api/errors.js';

export function assertFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InferenceError('InvalidParams', `${field} must be a finite number`, {
      [field]: value,
    });
  }
}

export function assertAllFinite(field: string, values: readonly number[]): void {
  const index = values.findIndex((value) => !Number.isFinite(value));
  if (index !== -1) {
    throw new InferenceError('InvalidParams', `${field}[${index}] must be a finite number`, {
      field,
      index,
      value: values[index],
    });
  }
}

/**
 * 0 < value < 1
 */
export function assertUnitInterval(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0 || value >= 1) {
    throw new InferenceError('InvalidParams', `${field} must be between 0 and 1 (exclusive)`, {
      [field]: value,
    });
  }
}

/**
 * Standard deviation must be >= 0, or > 0 when `requirePositive` is set.
 */
export function assertStandardDeviation(standardDeviation: number, requirePositive = false): void {
  if (!Number.isFinite(standardDeviation) || standardDeviation < 0) {
    throw new InferenceError('InvalidVariance', 'Standard deviation must be a non-negative number', {
      standardDeviation,
    });
  }
  if (requirePositive && standardDeviation === 0) {
    throw new InferenceError(
      'InvalidVariance',
      'Standard deviation must be positive: the test statistic is undefined for a zero standard error',
      { standardDeviation }
    );
  }
}
