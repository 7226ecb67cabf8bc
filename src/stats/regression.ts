/**
 * Bivariate regression solver
 *
 * Closed-form ordinary least squares fit of y on x:
 *
 *   Sxx = Σ(x − x̄)², Sxy = Σ(x − x̄)(y − ȳ), Syy = Σ(y − ȳ)²
 *   slope = Sxy / Sxx, intercept = ȳ − slope·x̄
 *   r = Sxy / √(Sxx·Syy), R² = r²
 *   SE(slope) = √(SSE / (n − 2)) / √Sxx
 */

import { mean } from 'simple-statistics';
import { InferenceError } from '../api/errors.js';
import type { RegressionFit } from '../types/regression.js';
import { assertAllFinite } from '../utils/guards.js';
import { predict } from './prediction.js';

export function fitRegression(x: readonly number[], y: readonly number[]): RegressionFit {
  if (x.length !== y.length) {
    throw new InferenceError(
      'MismatchedLengths',
      `X and Y must have the same length (got ${x.length} and ${y.length})`,
      { xLength: x.length, yLength: y.length }
    );
  }
  if (x.length < 2) {
    throw new InferenceError('InvalidSampleSize', 'Regression needs at least 2 points', {
      n: x.length,
    });
  }
  assertAllFinite('x', x);
  assertAllFinite('y', y);

  const n = x.length;
  const meanX = mean([...x]);
  const meanY = mean([...y]);

  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - meanX;
    const dy = y[i] - meanY;
    sxx += dx * dx;
    sxy += dx * dy;
    syy += dy * dy;
  }

  // Sxx of a constant X can come out as a tiny positive number when the
  // mean is not representable exactly
  if (sxx === 0 || isConstant(x)) {
    throw new InferenceError('DegenerateInput', 'X has zero variance: the slope is undefined', {
      n,
      x: meanX,
    });
  }

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;

  // Constant Y: no variation to explain, r is reported as 0
  const r = syy === 0 || isConstant(y) ? 0 : clampCorrelation(sxy / Math.sqrt(sxx * syy));

  const fitted = predict({ slope, intercept }, x);
  const residuals = y.map((value, i) => value - fitted[i]);
  const sse = residuals.reduce((acc, residual) => acc + residual * residual, 0);

  const degreesOfFreedom = n - 2;
  const residualStandardError = degreesOfFreedom > 0 ? Math.sqrt(sse / degreesOfFreedom) : Number.NaN;

  return {
    slope,
    intercept,
    standardError: residualStandardError / Math.sqrt(sxx),
    r,
    rSquared: r * r,
    residuals,
    fitted,
    n,
    degreesOfFreedom,
    residualStandardError,
  };
}

function isConstant(values: readonly number[]): boolean {
  return values.every((value) => value === values[0]);
}

function clampCorrelation(r: number): number {
  return Math.max(-1, Math.min(1, r));
}
