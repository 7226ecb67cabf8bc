/**
 * Input Schemas
 *
 * Shape and type validation for the engine's public operations. Range
 * rules that carry their own error code (sample size, variance, margin of
 * error, degenerate X) are left to the statistical routines so callers
 * always see that code.
 *
 * @module schemas/inference
 */

import { z } from 'zod';
import {
  FiniteNumber,
  FiniteNumberArray,
  TailModeSchema,
  UnitInterval,
} from './common.js';

export const SampleSummarySchema = z.object({
  mean: FiniteNumber,
  standardDeviation: z.number(),
  n: z.number(),
  rawValues: FiniteNumberArray.optional(),
});

export const ConfidenceIntervalParamsSchema = z.object({
  summary: SampleSummarySchema,
  confidenceLevel: UnitInterval.optional(),
});

export const HypothesisTestInputSchema = z.object({
  mean: FiniteNumber,
  standardDeviation: z.number(),
  n: z.number(),
  hypothesizedMean: FiniteNumber,
  alpha: UnitInterval.optional(),
  tail: TailModeSchema.optional(),
});

export const SampleSizeParamsSchema = z
  .object({
    assumedStdDev: z.number(),
    targetMarginOfError: z.number(),
    criticalValue: FiniteNumber.positive('Critical value must be positive').optional(),
    confidenceLevel: UnitInterval.optional(),
  })
  .refine((data) => !(data.criticalValue !== undefined && data.confidenceLevel !== undefined), {
    message: 'Provide either criticalValue or confidenceLevel, not both',
    path: ['criticalValue'],
  });

export const RegressionParamsSchema = z.object({
  x: FiniteNumberArray,
  y: FiniteNumberArray,
});

export const PredictionParamsSchema = z.object({
  slope: FiniteNumber,
  intercept: FiniteNumber,
  x: z.union([FiniteNumber, FiniteNumberArray]),
});

export type HypothesisTestInput = z.infer<typeof HypothesisTestInputSchema>;
export type ConfidenceIntervalParams = z.infer<typeof ConfidenceIntervalParamsSchema>;
export type SampleSizeParams = z.infer<typeof SampleSizeParamsSchema>;
export type RegressionParams = z.infer<typeof RegressionParamsSchema>;
export type PredictionParams = z.infer<typeof PredictionParamsSchema>;
