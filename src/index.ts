export { InferenceEngine, createEngine, type EngineOptions, type EngineDependencies } from './api/engine.js';
export {
  InferenceError,
  isInferenceError,
  toInferenceError,
  zodErrorToInferenceError,
  type InferenceErrorCode,
  type InferenceErrorShape,
} from './api/errors.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getInferenceDefaults,
  DEFAULT_CONFIG,
  type Config,
  type Environment,
  type InferenceDefaults,
} from './config/loader.js';

// Pure routines
export {
  normalCDF,
  normalQuantile,
  studentTCDF,
  studentTQuantile,
  distributionCDF,
  distributionQuantile,
  criticalValueFor,
  pValueFor,
} from './stats/distributions.js';
export { selectDistribution, DEFAULT_LARGE_SAMPLE_THRESHOLD } from './stats/test-selector.js';
export {
  computeConfidenceInterval,
  evaluateHypothesisTest,
  standardErrorOfMean,
} from './stats/hypothesis-test.js';
export { summarizeSample } from './stats/sample-summary.js';
export { planSampleSize, planSampleSizeForConfidence, marginOfErrorFor } from './stats/sample-size.js';
export { fitRegression } from './stats/regression.js';
export { predict } from './stats/prediction.js';
export {
  buildIntervalPlot,
  buildResidualSeries,
  buildSampleSizeCurve,
  DEFAULT_MAX_CURVE_POINTS,
} from './stats/plot-data.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
