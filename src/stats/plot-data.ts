/**
 * Plot series builders
 *
 * Produce the numbers behind the interval, residual and sample-size
 * charts. Rendering belongs to the caller.
 */

import { InferenceError } from '../api/errors.js';
import { PLOT } from '../config/defaults.js';
import type { ConfidenceIntervalResult, HypothesisTestResult } from '../types/inference.js';
import type { IntervalPlot, PlotPoint, SampleSizeCurveOptions } from '../types/plot.js';
import type { RegressionFit } from '../types/regression.js';
import { assertFinite, assertStandardDeviation } from '../utils/guards.js';
import { marginOfErrorFor } from './sample-size.js';

export const DEFAULT_MAX_CURVE_POINTS: number = PLOT.SAMPLE_SIZE_CURVE_POINTS;

/**
 * Interval whisker for a confidence interval or a hypothesis test result.
 */
export function buildIntervalPlot(result: ConfidenceIntervalResult | HypothesisTestResult): IntervalPlot {
  if ('testStatistic' in result) {
    const [lower, upper] = result.confidenceInterval;
    return {
      lower,
      upper,
      mean: result.sampleMean,
      hypothesizedMean: result.hypothesizedMean,
      containsHypothesizedMean: result.hypothesizedMean >= lower && result.hypothesizedMean <= upper,
      confidenceLevel: result.confidenceLevel,
    };
  }

  return {
    lower: result.lower,
    upper: result.upper,
    mean: result.mean,
    confidenceLevel: result.confidenceLevel,
  };
}

/**
 * Residual plot points (xᵢ, yᵢ − ŷᵢ).
 *
 * @param fit - Regression fit
 * @param x - The X values the fit was computed from
 */
export function buildResidualSeries(fit: RegressionFit, x: readonly number[]): PlotPoint[] {
  if (x.length !== fit.residuals.length) {
    throw new InferenceError(
      'MismatchedLengths',
      `X has ${x.length} values but the fit has ${fit.residuals.length} residuals`,
      { xLength: x.length, residuals: fit.residuals.length }
    );
  }
  return x.map((value, i) => ({ x: value, y: fit.residuals[i] }));
}

/**
 * Margin of error as a function of sample size, (n, c·σ/√n) for
 * n = from, from + step, ..., to.
 */
export function buildSampleSizeCurve(
  options: SampleSizeCurveOptions,
  maxPoints = DEFAULT_MAX_CURVE_POINTS
): PlotPoint[] {
  const { standardDeviation, criticalValue, from, to } = options;
  const step = options.step ?? 1;

  assertStandardDeviation(standardDeviation);
  assertFinite('criticalValue', criticalValue);

  if (
    !Number.isInteger(from) ||
    from < 1 ||
    !Number.isInteger(to) ||
    to < from ||
    to > Number.MAX_SAFE_INTEGER
  ) {
    throw new InferenceError(
      'InvalidSampleSize',
      'Curve range must satisfy 1 <= from <= to <= 2^53 - 1 (integers)',
      { from, to }
    );
  }
  if (!Number.isSafeInteger(step) || step < 1) {
    throw new InferenceError('InvalidParams', 'Curve step must be a positive integer', { step });
  }

  const count = Math.floor((to - from) / step) + 1;
  if (count > maxPoints) {
    throw new InferenceError('InvalidParams', `Curve would have ${count} points (max ${maxPoints})`, {
      count,
      maxPoints,
    });
  }

  const points: PlotPoint[] = [];
  for (let n = from; n <= to; n += step) {
    points.push({ x: n, y: marginOfErrorFor(n, standardDeviation, criticalValue) });
  }
  return points;
}
