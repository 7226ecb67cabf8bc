/**
 * Inference error utilities.
 *
 * Provides a consistent error type for every public routine and helpers
 * to convert validation failures and unknown throwables into
 * InferenceError instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers.
 */
export type InferenceErrorCode =
  | 'InvalidSampleSize' // n < 1, or too few observations for the routine
  | 'InvalidVariance' // negative standard deviation, or zero where positivity is required
  | 'MismatchedLengths' // regression inputs of unequal length
  | 'DegenerateInput' // zero-variance X in regression
  | 'InvalidTarget' // non-positive margin of error, or one needing n > 2^53 - 1
  | 'InvalidParams' // out-of-range alpha/confidence, non-finite inputs, schema failures
  | 'ConfigError'
  | 'UnknownError';

/**
 * Plain error shape (for JSON responses and UI surfaces).
 */
export interface InferenceErrorShape {
  code: InferenceErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error implementation thrown by every routine of the engine.
 */
export class InferenceError extends Error implements InferenceErrorShape {
  public readonly code: InferenceErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: InferenceErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'InferenceError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): InferenceErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard for InferenceError, optionally narrowed to one code.
 */
export function isInferenceError(
  error: unknown,
  code?: InferenceErrorCode
): error is InferenceError {
  if (!(error instanceof InferenceError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Map unknown errors into InferenceError instances.
 *
 * @param error - Anything caught from a routine
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toInferenceError(
  error: unknown,
  fallbackCode: InferenceErrorCode = 'UnknownError'
): InferenceError {
  if (error instanceof InferenceError) {
    return error;
  }

  if (error instanceof Error) {
    return new InferenceError(fallbackCode, error.message);
  }

  return new InferenceError(fallbackCode, 'Unknown inference error');
}

/**
 * Convert Zod validation error to InferenceError
 *
 * Only the first issue makes it into the message; all issues are kept in
 * `details.issues`.
 *
 * @example
 * ```typescript
 * const result = HypothesisTestParamsSchema.safeParse({ n: 'ten' });
 * if (!result.success) {
 *   throw zodErrorToInferenceError(result.error);
 * }
 * // Throws: "Validation error on field 'n': Expected number, received string"
 * ```
 */
export function zodErrorToInferenceError(error: ZodError): InferenceError {
  const firstIssue = error.issues[0];
  const field =
    firstIssue !== undefined && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'Invalid input'}`;

  return new InferenceError('InvalidParams', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
