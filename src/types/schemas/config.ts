/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { TailModeSchema, UnitInterval } from './common.js';

/**
 * Inference defaults
 */
export const InferenceConfigSchema = z.object({
  large_sample_threshold: z.number().int().min(2, 'must be >= 2'),
  default_alpha: UnitInterval,
  default_confidence: UnitInterval,
  default_tail: TailModeSchema,
});

/**
 * Plot series limits
 */
export const PlotConfigSchema = z.object({
  sample_size_curve_points: z.number().int().positive('must be positive'),
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'], {
    errorMap: () => ({ message: 'must be one of: trace, debug, info, warn, error, fatal, silent' }),
  }),
  name: z.string().min(1, 'Logger name cannot be empty'),
});

/**
 * Complete runtime configuration (after environment overrides are applied)
 */
export const RuntimeConfigSchema = z.object({
  inference: InferenceConfigSchema,
  plot: PlotConfigSchema,
  logging: LoggingConfigSchema,
});

export type RuntimeConfigInput = z.infer<typeof RuntimeConfigSchema>;
