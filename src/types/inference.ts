/**
 * Univariate inference types: sample summaries, distribution selection,
 * confidence intervals and hypothesis tests.
 */

/**
 * Summary statistics of one sample.
 *
 * Invariants: `n` is an integer >= 1 and `standardDeviation` >= 0.
 */
export interface SampleSummary {
  mean: number;
  standardDeviation: number;
  n: number;
  rawValues?: number[];
}

export type DistributionKind = 'z' | 't';

/**
 * Distribution chosen for a sample of size n.
 */
export type DistributionSelection =
  | {
      kind: 'z';
      testName: 'Z-Test';
      label: 'Normal (Z)';
    }
  | {
      kind: 't';
      testName: 'T-Test';
      /** n - 1 */
      degreesOfFreedom: number;
      label: string;
    };

/**
 * Direction of the alternative hypothesis.
 *
 * - `two-sided`: mean != mu0
 * - `greater`: mean > mu0
 * - `less`: mean < mu0
 */
export type TailMode = 'two-sided' | 'greater' | 'less';

/** Closed interval `[low, high]`. */
export type Interval = readonly [number, number];

export interface ConfidenceIntervalResult {
  mean: number;
  standardError: number;
  criticalValue: number;
  /** Half-width of the interval */
  marginOfError: number;
  lower: number;
  upper: number;
  confidenceLevel: number;
  distribution: DistributionSelection;
}

export interface HypothesisTestParams {
  mean: number;
  standardDeviation: number;
  n: number;
  hypothesizedMean: number;
  /** Significance level, 0 < alpha < 1 */
  alpha: number;
  tail: TailMode;
}

export interface HypothesisTestResult {
  testStatistic: number;
  pValue: number;
  rejectNull: boolean;
  /** Two-sided interval at confidence 1 - alpha */
  confidenceInterval: Interval;
  distribution: DistributionSelection;
  standardError: number;
  criticalValue: number;
  marginOfError: number;
  alpha: number;
  confidenceLevel: number;
  tail: TailMode;
  sampleMean: number;
  hypothesizedMean: number;
}
