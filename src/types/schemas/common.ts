/**
 * Common Zod schema primitives shared by the input and config schemas
 */

import { z } from 'zod';

/**
 * Finite number validator (rejects NaN and ±Infinity)
 */
export const FiniteNumber = z.number().finite('Must be a finite number');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative number validator
 */
export const NonNegativeNumber = FiniteNumber.min(0, 'Must be non-negative');

/**
 * Open unit interval (0, 1) used for alpha and confidence levels
 */
export const UnitInterval = z
  .number()
  .gt(0, 'Must be greater than 0')
  .lt(1, 'Must be less than 1');

/**
 * Numeric sequence of finite values
 */
export const FiniteNumberArray = z.array(FiniteNumber);

/**
 * Tail mode enum
 */
export const TailModeSchema = z.enum(['two-sided', 'greater', 'less'], {
  errorMap: () => ({ message: 'Tail must be one of: two-sided, greater, less' }),
});
