/**
 * Default Configuration Constants
 *
 * Values used when no runtime.yaml is loaded. The YAML file ships the
 * same numbers.
 */

/**
 * Inference defaults
 */
export const INFERENCE = {
  /** Smallest sample size tested with the Z distribution */
  LARGE_SAMPLE_THRESHOLD: 30,

  /** Significance level for hypothesis tests */
  DEFAULT_ALPHA: 0.05,

  /** Confidence level for intervals and sample-size plans */
  DEFAULT_CONFIDENCE: 0.95,

  DEFAULT_TAIL: 'two-sided',
} as const;

/**
 * Plot series limits
 */
export const PLOT = {
  /** Upper bound on points in one sample-size curve */
  SAMPLE_SIZE_CURVE_POINTS: 1_000,
} as const;

/**
 * Logging
 */
export const LOGGING = {
  DEFAULT_LEVEL: 'info',
  DEFAULT_NAME: 'stat-inference-engine',
} as const;
