/**
 * Numeric series handed to the charting layer.
 */

export interface PlotPoint {
  x: number;
  y: number;
}

/**
 * Interval whisker with the sample mean and, for a hypothesis test,
 * the hypothesized mean marker.
 */
export interface IntervalPlot {
  lower: number;
  upper: number;
  mean: number;
  hypothesizedMean?: number;
  /** Whether the hypothesized mean lies inside [lower, upper] */
  containsHypothesizedMean?: boolean;
  confidenceLevel: number;
}

export interface SampleSizeCurveOptions {
  standardDeviation: number;
  criticalValue: number;
  from: number;
  to: number;
  step?: number;
}
