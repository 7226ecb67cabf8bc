/**
 * Bivariate regression and sample-size planning types.
 */

/**
 * Ordinary least squares fit of y = slope * x + intercept.
 */
export interface RegressionFit {
  slope: number;
  intercept: number;
  /** Standard error of the slope estimate (NaN when n = 2) */
  standardError: number;
  /** Pearson correlation coefficient */
  r: number;
  rSquared: number;
  /** y_i - yhat_i, in input order */
  residuals: number[];
  fitted: number[];
  n: number;
  /** n - 2 */
  degreesOfFreedom: number;
  /** sqrt(SSE / (n - 2)), NaN when n = 2 */
  residualStandardError: number;
}

/**
 * Line coefficients accepted by the prediction function.
 */
export type LineCoefficients = Pick<RegressionFit, 'slope' | 'intercept'>;

export interface SampleSizePlan {
  requiredN: number;
  assumedStdDev: number;
  targetMarginOfError: number;
  criticalValue: number;
  /** Margin of error actually achieved at `requiredN` (<= target) */
  achievedMarginOfError: number;
}
