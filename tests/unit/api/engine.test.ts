import { describe, it, expect, vi } from 'vitest';
import type { Logger } from 'pino';
import { InferenceEngine, createEngine } from '../../../src/api/engine.js';
import { InferenceError } from '../../../src/api/errors.js';
import { DEFAULT_CONFIG, type Config } from '../../../src/config/loader.js';

function createMockLogger(debugEnabled = true): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    isLevelEnabled: vi.fn().mockReturnValue(debugEnabled),
    child: vi.fn().mockReturnThis(),
  } as unknown as Logger;
}

function configWith(inference: Partial<Config['inference']>): Config {
  return { ...DEFAULT_CONFIG, inference: { ...DEFAULT_CONFIG.inference, ...inference } };
}

function caught(fn: () => unknown): InferenceError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InferenceError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an InferenceError');
}

describe('InferenceEngine', () => {
  it('should load defaults from runtime.yaml when no config is given', () => {
    const engine = new InferenceEngine({}, { logger: createMockLogger() });

    expect(engine.getDefaults()).toEqual({
      largeSampleThreshold: 30,
      alpha: 0.05,
      confidenceLevel: 0.95,
      tail: 'two-sided',
      maxCurvePoints: 1000,
    });
  });

  it('should reject an invalid config object', () => {
    expect(() => createEngine({ config: configWith({ default_alpha: 2 }) })).toThrow(
      /Configuration validation failed/
    );
  });

  describe('testHypothesis', () => {
    it('should apply configured alpha and tail when omitted', () => {
      const engine = createEngine({ config: DEFAULT_CONFIG }, { logger: createMockLogger() });
      const result = engine.testHypothesis({ mean: 100, standardDeviation: 15, n: 25, hypothesizedMean: 95 });

      expect(result.alpha).toBe(0.05);
      expect(result.tail).toBe('two-sided');
      expect(result.distribution.testName).toBe('T-Test');
      expect(result.testStatistic).toBeCloseTo(1.667, 3);
      expect(result.rejectNull).toBe(false);
    });

    it('should use the configured large-sample threshold', () => {
      const engine = createEngine(
        { config: configWith({ large_sample_threshold: 20 }) },
        { logger: createMockLogger() }
      );

      expect(engine.testHypothesis({ mean: 1, standardDeviation: 1, n: 25, hypothesizedMean: 0 }).distribution.kind).toBe('z');
      expect(engine.selectDistribution(19).kind).toBe('t');
    });

    it('should map schema failures to InvalidParams', () => {
      const engine = createEngine({ config: DEFAULT_CONFIG }, { logger: createMockLogger() });

      const infinite = caught(() =>
        engine.testHypothesis({ mean: Infinity, standardDeviation: 1, n: 5, hypothesizedMean: 0 })
      );
      expect(infinite.code).toBe('InvalidParams');
      expect(infinite.message).toBe("Validation error on field 'mean': Must be a finite number");

      const alpha = caught(() =>
        engine.testHypothesis({ mean: 1, standardDeviation: 1, n: 5, hypothesizedMean: 0, alpha: 1.5 })
      );
      expect(alpha.message).toBe("Validation error on field 'alpha': Must be less than 1");
    });

    it('should log failures at warn with the error code', () => {
      const logger = createMockLogger();
      const engine = createEngine({ config: DEFAULT_CONFIG }, { logger });

      const error = caught(() =>
        engine.testHypothesis({ mean: 1, standardDeviation: -2, n: 5, hypothesizedMean: 0 })
      );

      expect(error.code).toBe('InvalidVariance');
      expect(logger.warn).toHaveBeenCalledWith(
        { operation: 'testHypothesis', code: 'InvalidVariance', details: { standardDeviation: -2 } },
        'Standard deviation must be a non-negative number'
      );
    });

    it('should log results at debug only when the level is enabled', () => {
      const verbose = createMockLogger(true);
      createEngine({ config: DEFAULT_CONFIG }, { logger: verbose }).testHypothesis({
        mean: 52,
        standardDeviation: 10,
        n: 100,
        hypothesizedMean: 50,
      });
      expect(verbose.debug).toHaveBeenCalledTimes(1);
      expect(verbose.debug).toHaveBeenCalledWith(
        expect.objectContaining({ test: 'Z-Test', statistic: 2, rejectNull: true, tail: 'two-sided' }),
        'Hypothesis test evaluated'
      );

      const quiet = createMockLogger(false);
      createEngine({ config: DEFAULT_CONFIG }, { logger: quiet }).testHypothesis({
        mean: 52,
        standardDeviation: 10,
        n: 100,
        hypothesizedMean: 50,
      });
      expect(quiet.debug).not.toHaveBeenCalled();
    });
  });

  describe('confidenceInterval', () => {
    it('should use the configured confidence level when omitted', () => {
      const engine = createEngine(
        { config: configWith({ default_confidence: 0.9 }) },
        { logger: createMockLogger() }
      );
      const ci = engine.confidenceInterval({ summary: { mean: 50, standardDeviation: 5, n: 30 } });

      expect(ci.confidenceLevel).toBe(0.9);
      expect(ci.criticalValue).toBeCloseTo(1.644854, 5);
    });

    it('should summarize raw values before building an interval', () => {
      const engine = createEngine({ config: DEFAULT_CONFIG }, { logger: createMockLogger() });
      const summary = engine.summarize([48, 52, 45, 55, 50, 49, 51]);
      const ci = engine.confidenceInterval({ summary, confidenceLevel: 0.95 });

      expect(ci.distribution.label).toBe("Student's T (df=6)");
      expect(ci.mean).toBe(50);
      expect(ci.upper - ci.mean).toBeCloseTo(ci.mean - ci.lower, 10);
    });
  });

  describe('planSampleSize', () => {
    const engine = createEngine({ config: DEFAULT_CONFIG }, { logger: createMockLogger() });

    it('should use an explicit critical value', () => {
      expect(engine.planSampleSize({ assumedStdDev: 15, targetMarginOfError: 5, criticalValue: 1.96 }).requiredN).toBe(35);
    });

    it('should default to the configured confidence level', () => {
      const plan = engine.planSampleSize({ assumedStdDev: 15, targetMarginOfError: 5 });

      expect(plan.criticalValue).toBeCloseTo(1.959964, 5);
      expect(plan.requiredN).toBe(35);
    });

    it('should refuse both a critical value and a confidence level', () => {
      const error = caught(() =>
        engine.planSampleSize({
          assumedStdDev: 15,
          targetMarginOfError: 5,
          criticalValue: 1.96,
          confidenceLevel: 0.95,
        })
      );

      expect(error.message).toBe(
        "Validation error on field 'criticalValue': Provide either criticalValue or confidenceLevel, not both"
      );
    });

    it('should surface InvalidTarget', () => {
      expect(caught(() => engine.planSampleSize({ assumedStdDev: 15, targetMarginOfError: 0 })).code).toBe(
        'InvalidTarget'
      );
    });

    it('should refuse a target that needs more than 2^53 - 1 observations', () => {
      const error = caught(() =>
        engine.planSampleSize({ assumedStdDev: 1e10, targetMarginOfError: 1, criticalValue: 1 })
      );

      expect(error.code).toBe('InvalidTarget');
      expect(error.details).toEqual({ targetMarginOfError: 1, requiredN: 1e20 });
    });
  });

  describe('regression and prediction', () => {
    const engine = createEngine({ config: DEFAULT_CONFIG }, { logger: createMockLogger() });

    it('should fit and predict', () => {
      const fit = engine.fitRegression({ x: [1, 2, 3], y: [2, 4, 6] });

      expect(fit.slope).toBe(2);
      expect(engine.predict({ slope: fit.slope, intercept: fit.intercept, x: 10 })).toBe(20);
      expect(engine.predict({ slope: fit.slope, intercept: fit.intercept, x: [1, 2] })).toEqual([2, 4]);
      expect(engine.residualSeries(fit, [1, 2, 3])).toHaveLength(3);
    });

    it('should surface DegenerateInput and MismatchedLengths', () => {
      expect(caught(() => engine.fitRegression({ x: [5, 5, 5], y: [1, 2, 3] })).code).toBe('DegenerateInput');
      expect(caught(() => engine.fitRegression({ x: [1, 2], y: [1] })).code).toBe('MismatchedLengths');
    });
  });

  describe('plots', () => {
    it('should cap sample-size curves at the configured number of points', () => {
      const engine = createEngine(
        { config: { ...DEFAULT_CONFIG, plot: { sample_size_curve_points: 5 } } },
        { logger: createMockLogger() }
      );

      expect(engine.sampleSizeCurve({ standardDeviation: 10, criticalValue: 2, from: 1, to: 5 })).toHaveLength(5);
      expect(caught(() => engine.sampleSizeCurve({ standardDeviation: 10, criticalValue: 2, from: 1, to: 6 })).code).toBe(
        'InvalidParams'
      );
    });

    it('should build an interval plot from a test result', () => {
      const engine = createEngine({ config: DEFAULT_CONFIG }, { logger: createMockLogger() });
      const plot = engine.intervalPlot(
        engine.testHypothesis({ mean: 100, standardDeviation: 15, n: 25, hypothesizedMean: 95 })
      );

      expect(plot.containsHypothesizedMean).toBe(true);
      expect(plot.hypothesizedMean).toBe(95);
    });
  });
});
