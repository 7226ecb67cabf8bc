/**
 * One-sample inference on the mean
 *
 * Confidence intervals and Z/T hypothesis tests from summary statistics.
 * The distribution is picked by the test selector; the interval is always
 * two-sided and symmetric around the sample mean.
 */

import { InferenceError } from '../api/errors.js';
import type {
  ConfidenceIntervalResult,
  DistributionSelection,
  HypothesisTestParams,
  HypothesisTestResult,
  SampleSummary,
} from '../types/inference.js';
import { assertFinite, assertStandardDeviation, assertUnitInterval } from '../utils/guards.js';
import { criticalValueFor, pValueFor } from './distributions.js';
import { DEFAULT_LARGE_SAMPLE_THRESHOLD, selectDistribution } from './test-selector.js';

/**
 * Standard error of the mean: s / √n
 */
export function standardErrorOfMean(standardDeviation: number, n: number): number {
  return standardDeviation / Math.sqrt(n);
}

/**
 * Confidence interval for the population mean.
 *
 * A zero standard deviation is allowed and yields a zero-width interval.
 *
 * @param summary - Sample mean, standard deviation and size
 * @param confidenceLevel - Confidence level, 0 < level < 1 (e.g. 0.95)
 */
export function computeConfidenceInterval(
  summary: SampleSummary,
  confidenceLevel: number,
  largeSampleThreshold = DEFAULT_LARGE_SAMPLE_THRESHOLD
): ConfidenceIntervalResult {
  assertFinite('mean', summary.mean);
  assertStandardDeviation(summary.standardDeviation, false);
  assertUnitInterval('confidenceLevel', confidenceLevel);

  const distribution = selectUsableDistribution(summary.n, largeSampleThreshold);
  const standardError = standardErrorOfMean(summary.standardDeviation, summary.n);
  const criticalValue = criticalValueFor(distribution, confidenceLevel);
  const marginOfError = criticalValue * standardError;

  return {
    mean: summary.mean,
    standardError,
    criticalValue,
    marginOfError,
    lower: summary.mean - marginOfError,
    upper: summary.mean + marginOfError,
    confidenceLevel,
    distribution,
  };
}

/**
 * Evaluate a one-sample hypothesis test H₀: μ = μ₀.
 *
 * statistic = (x̄ − μ₀) / (s/√n); H₀ is rejected when p <= α.
 */
export function evaluateHypothesisTest(
  params: HypothesisTestParams,
  largeSampleThreshold = DEFAULT_LARGE_SAMPLE_THRESHOLD
): HypothesisTestResult {
  const { mean, standardDeviation, n, hypothesizedMean, alpha, tail } = params;

  assertFinite('mean', mean);
  assertFinite('hypothesizedMean', hypothesizedMean);
  assertStandardDeviation(standardDeviation, true);
  assertUnitInterval('alpha', alpha);

  const confidenceLevel = 1 - alpha;
  const interval = computeConfidenceInterval(
    { mean, standardDeviation, n },
    confidenceLevel,
    largeSampleThreshold
  );

  const testStatistic = (mean - hypothesizedMean) / interval.standardError;
  const pValue = pValueFor(interval.distribution, testStatistic, tail);

  return {
    testStatistic,
    pValue,
    rejectNull: pValue <= alpha,
    confidenceInterval: [interval.lower, interval.upper],
    distribution: interval.distribution,
    standardError: interval.standardError,
    criticalValue: interval.criticalValue,
    marginOfError: interval.marginOfError,
    alpha,
    confidenceLevel,
    tail,
    sampleMean: mean,
    hypothesizedMean,
  };
}

/**
 * Selector result that has a defined quantile: T needs df >= 1.
 */
function selectUsableDistribution(n: number, largeSampleThreshold: number): DistributionSelection {
  const distribution = selectDistribution(n, largeSampleThreshold);
  if (distribution.kind === 't' && distribution.degreesOfFreedom < 1) {
    throw new InferenceError(
      'InvalidSampleSize',
      'A T-test needs at least 2 observations (df = n - 1 >= 1)',
      { n }
    );
  }
  return distribution;
}
