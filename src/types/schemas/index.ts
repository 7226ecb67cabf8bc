/**
 * Zod schema exports for the inference engine
 *
 * These schemas provide runtime validation for all API boundaries,
 * ensuring type safety and clear error messages for invalid inputs.
 *
 * @example
 * ```typescript
 * import { RegressionParamsSchema } from 'stat-inference-engine';
 *
 * const result = RegressionParamsSchema.safeParse({ x: [1, 2], y: [3] });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Operation input schemas
export * from './inference.js';

// Config schemas
export * from './config.js';
