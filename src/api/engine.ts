/**
 * Inference engine facade.
 *
 * Validates caller input against the zod schemas, fills in configured
 * defaults (alpha, confidence level, tail, large-sample threshold),
 * delegates to the pure routines under `stats/` and logs every
 * computation. All methods are synchronous and stateless.
 */

import { pino, type Logger } from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  getInferenceDefaults,
  initializeConfig,
  validateConfig,
  type Config,
  type Environment,
  type InferenceDefaults,
} from '../config/loader.js';
import { computeConfidenceInterval, evaluateHypothesisTest } from '../stats/hypothesis-test.js';
import { buildIntervalPlot, buildResidualSeries, buildSampleSizeCurve } from '../stats/plot-data.js';
import { predict } from '../stats/prediction.js';
import { fitRegression } from '../stats/regression.js';
import { planSampleSize, planSampleSizeForConfidence } from '../stats/sample-size.js';
import { summarizeSample } from '../stats/sample-summary.js';
import { selectDistribution } from '../stats/test-selector.js';
import type {
  ConfidenceIntervalResult,
  DistributionSelection,
  HypothesisTestResult,
  SampleSummary,
} from '../types/inference.js';
import type { IntervalPlot, PlotPoint, SampleSizeCurveOptions } from '../types/plot.js';
import type { RegressionFit, SampleSizePlan } from '../types/regression.js';
import {
  ConfidenceIntervalParamsSchema,
  FiniteNumberArray,
  HypothesisTestInputSchema,
  PredictionParamsSchema,
  RegressionParamsSchema,
  SampleSizeParamsSchema,
  type ConfidenceIntervalParams,
  type HypothesisTestInput,
  type PredictionParams,
  type RegressionParams,
  type SampleSizeParams,
} from '../types/schemas/index.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { toInferenceError, zodErrorToInferenceError } from './errors.js';

export interface EngineOptions {
  /** Pre-built configuration; skips reading runtime.yaml */
  config?: Config;
  /** Path to a runtime.yaml file */
  configPath?: string;
  environment?: Environment;
}

export interface EngineDependencies {
  logger?: Logger;
}

export class InferenceEngine {
  private readonly logger: Logger;
  private readonly defaults: InferenceDefaults;

  /**
   * Create a new engine instance.
   *
   * @param options - Configuration source
   * @param dependencies - Optional logger override
   */
  constructor(options: EngineOptions = {}, dependencies: EngineDependencies = {}) {
    const config = options.config
      ? validateConfig(options.config)
      : initializeConfig(options.configPath, options.environment);

    this.defaults = getInferenceDefaults(config);
    this.logger =
      dependencies.logger ?? pino({ name: config.logging.name, level: config.logging.level });
  }

  /**
   * Defaults applied when a call omits alpha, confidence level or tail.
   */
  public getDefaults(): InferenceDefaults {
    return { ...this.defaults };
  }

  /**
   * Z for n >= threshold, otherwise Student's T with df = n - 1.
   */
  public selectDistribution(n: number): DistributionSelection {
    return this.run('selectDistribution', () => {
      const selection = selectDistribution(n, this.defaults.largeSampleThreshold);
      lazyLog(this.logger, 'debug', () => ({ n, selection }), 'Distribution selected');
      return selection;
    });
  }

  /**
   * Summarize raw observations into mean, sample standard deviation and n.
   */
  public summarize(values: readonly number[]): SampleSummary {
    return this.run('summarize', () => {
      const data = this.parse(FiniteNumberArray, values);
      const summary = summarizeSample(data);
      lazyLog(
        this.logger,
        'debug',
        () => ({ n: summary.n, mean: summary.mean, standardDeviation: summary.standardDeviation }),
        'Sample summarized'
      );
      return summary;
    });
  }

  /**
   * Confidence interval for the mean at the given (or default) confidence.
   *
   * @example
   * ```typescript
   * const ci = engine.confidenceInterval({
   *   summary: { mean: 50, standardDeviation: 5, n: 30 },
   *   confidenceLevel: 0.95,
   * });
   * console.log(ci.distribution.testName, ci.lower, ci.upper);
   * ```
   */
  public confidenceInterval(params: ConfidenceIntervalParams): ConfidenceIntervalResult {
    return this.run('confidenceInterval', () => {
      const { summary, confidenceLevel } = this.parse(ConfidenceIntervalParamsSchema, params);
      const result = computeConfidenceInterval(
        summary,
        confidenceLevel ?? this.defaults.confidenceLevel,
        this.defaults.largeSampleThreshold
      );
      lazyLog(
        this.logger,
        'debug',
        () => ({
          test: result.distribution.testName,
          confidenceLevel: result.confidenceLevel,
          marginOfError: result.marginOfError,
          interval: [result.lower, result.upper],
        }),
        'Confidence interval computed'
      );
      return result;
    });
  }

  /**
   * One-sample Z/T test of H₀: μ = μ₀.
   */
  public testHypothesis(input: HypothesisTestInput): HypothesisTestResult {
    return this.run('testHypothesis', () => {
      const parsed = this.parse(HypothesisTestInputSchema, input);
      const result = evaluateHypothesisTest(
        {
          mean: parsed.mean,
          standardDeviation: parsed.standardDeviation,
          n: parsed.n,
          hypothesizedMean: parsed.hypothesizedMean,
          alpha: parsed.alpha ?? this.defaults.alpha,
          tail: parsed.tail ?? this.defaults.tail,
        },
        this.defaults.largeSampleThreshold
      );
      lazyLog(
        this.logger,
        'debug',
        () => ({
          test: result.distribution.testName,
          statistic: result.testStatistic,
          pValue: result.pValue,
          rejectNull: result.rejectNull,
          tail: result.tail,
        }),
        'Hypothesis test evaluated'
      );
      return result;
    });
  }

  /**
   * Smallest n whose margin of error does not exceed the target.
   *
   * Uses `criticalValue` when given, otherwise the normal critical value for
   * `confidenceLevel` (or the configured default confidence).
   */
  public planSampleSize(params: SampleSizeParams): SampleSizePlan {
    return this.run('planSampleSize', () => {
      const { assumedStdDev, targetMarginOfError, criticalValue, confidenceLevel } = this.parse(
        SampleSizeParamsSchema,
        params
      );
      const plan =
        criticalValue !== undefined
          ? planSampleSize(assumedStdDev, targetMarginOfError, criticalValue)
          : planSampleSizeForConfidence(
              assumedStdDev,
              targetMarginOfError,
              confidenceLevel ?? this.defaults.confidenceLevel
            );
      lazyLog(
        this.logger,
        'debug',
        () => ({
          requiredN: plan.requiredN,
          criticalValue: plan.criticalValue,
          achievedMarginOfError: plan.achievedMarginOfError,
        }),
        'Sample size planned'
      );
      return plan;
    });
  }

  /**
   * Ordinary least squares fit of y on x.
   */
  public fitRegression(params: RegressionParams): RegressionFit {
    return this.run('fitRegression', () => {
      const { x, y } = this.parse(RegressionParamsSchema, params);
      const fit = fitRegression(x, y);
      lazyLog(
        this.logger,
        'debug',
        () => ({ n: fit.n, slope: fit.slope, intercept: fit.intercept, rSquared: fit.rSquared }),
        'Regression fitted'
      );
      return fit;
    });
  }

  /**
   * ŷ = slope·x + intercept for one value or a sequence.
   */
  public predict(params: PredictionParams): number | number[] {
    return this.run('predict', () => {
      const { slope, intercept, x } = this.parse(PredictionParamsSchema, params);
      return typeof x === 'number' ? predict({ slope, intercept }, x) : predict({ slope, intercept }, x);
    });
  }

  public intervalPlot(result: ConfidenceIntervalResult | HypothesisTestResult): IntervalPlot {
    return this.run('intervalPlot', () => buildIntervalPlot(result));
  }

  public residualSeries(fit: RegressionFit, x: readonly number[]): PlotPoint[] {
    return this.run('residualSeries', () => buildResidualSeries(fit, x));
  }

  public sampleSizeCurve(options: SampleSizeCurveOptions): PlotPoint[] {
    return this.run('sampleSizeCurve', () =>
      buildSampleSizeCurve(options, this.defaults.maxCurvePoints)
    );
  }

  /**
   * Parse input with a zod schema, mapping failures to InvalidParams.
   */
  private parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
    const result = schema.safeParse(input);
    if (!result.success) {
      throw zodErrorToInferenceError(result.error);
    }
    return result.data;
  }

  /**
   * Run an operation, logging and normalizing any failure.
   */
  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      const inferenceError = toInferenceError(error);
      this.logger.warn(
        { operation, code: inferenceError.code, details: inferenceError.details },
        inferenceError.message
      );
      throw inferenceError;
    }
  }
}

/**
 * Factory mirroring the class constructor.
 */
export function createEngine(
  options: EngineOptions = {},
  dependencies: EngineDependencies = {}
): InferenceEngine {
  return new InferenceEngine(options, dependencies);
}
