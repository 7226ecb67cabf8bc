/**
 * Probability distributions
 *
 * Standard normal and Student's t distributions used by the selector,
 * the hypothesis test evaluator and the sample-size optimizer:
 * - Normal CDF (error function) and quantile (rational approximation)
 * - Student's t CDF (regularized incomplete beta) and quantile (bisection)
 */

import { InferenceError } from '../api/errors.js';
import type { DistributionSelection, TailMode } from '../types/inference.js';

const MAX_BETA_ITERATIONS = 300;
const BETA_EPSILON = 3e-16;
const TINY = 1e-300;

/**
 * Standard normal CDF (cumulative distribution function)
 *
 * Φ(x) = ½·(1 + erf(x/√2))
 */
export function normalCDF(x: number): number {
  if (x === Infinity) return 1;
  if (x === -Infinity) return 0;
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

/**
 * Standard normal quantile function (inverse CDF)
 *
 * Rational approximation (Acklam), relative error below 1.2e-9.
 *
 * @param p - Probability (0 < p < 1)
 */
export function normalQuantile(p: number): number {
  assertProbability(p);

  const a = [
    -3.969683028665376e1,
    2.209460984245205e2,
    -2.759285104469687e2,
    1.38357751867269e2,
    -3.066479806614716e1,
    2.506628277459239e0,
  ];

  const b = [
    -5.447609879822406e1,
    1.615858368580409e2,
    -1.556989798598866e2,
    6.680131188771972e1,
    -1.328068155288572e1,
  ];

  const c = [
    -7.784894002430293e-3,
    -3.223964580411365e-1,
    -2.400758277161838e0,
    -2.549732539343734e0,
    4.374664141464968e0,
    2.938163982698783e0,
  ];

  const d = [7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996e0, 3.754408661907416e0];

  const pLow = 0.02425;
  const pHigh = 1 - pLow;

  if (p < pLow) {
    const q = Math.sqrt(-2 * Math.log(p));
    return (
      (((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
      ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1)
    );
  }

  if (p <= pHigh) {
    const q = p - 0.5;
    const r = q * q;
    return (
      ((((((a[0] * r + a[1]) * r + a[2]) * r + a[3]) * r + a[4]) * r + a[5]) * q) /
      (((((b[0] * r + b[1]) * r + b[2]) * r + b[3]) * r + b[4]) * r + 1)
    );
  }

  const q = Math.sqrt(-2 * Math.log(1 - p));
  return (
    -(((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
    ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1)
  );
}

/**
 * Student's t-distribution CDF
 *
 * P(T <= t) = 1 - ½·I_x(df/2, ½) for t >= 0, with x = df / (df + t²).
 *
 * @param t - t-statistic
 * @param df - Degrees of freedom (> 0)
 */
export function studentTCDF(t: number, df: number): number {
  assertDegreesOfFreedom(df);
  if (t === Infinity) return 1;
  if (t === -Infinity) return 0;

  const x = df / (df + t * t);
  const tail = 0.5 * regularizedIncompleteBeta(x, df / 2, 0.5);
  return t >= 0 ? 1 - tail : tail;
}

/**
 * Student's t-distribution quantile function (inverse CDF)
 *
 * Brackets the root starting from the normal quantile, then bisects.
 *
 * @param p - Probability (0 < p < 1)
 * @param df - Degrees of freedom (> 0)
 */
export function studentTQuantile(p: number, df: number): number {
  assertProbability(p);
  assertDegreesOfFreedom(df);

  if (p === 0.5) {
    return 0;
  }

  const guess = normalQuantile(p);
  let lo = Math.min(guess, 0) - 1;
  let hi = Math.max(guess, 0) + 1;

  while (studentTCDF(lo, df) > p) {
    lo *= 2;
  }
  while (studentTCDF(hi, df) < p) {
    hi *= 2;
  }

  for (let i = 0; i < 200 && hi - lo > 1e-12 * Math.max(1, Math.abs(lo)); i++) {
    const mid = (lo + hi) / 2;
    if (studentTCDF(mid, df) < p) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  return (lo + hi) / 2;
}

/**
 * CDF of the selected distribution.
 */
export function distributionCDF(selection: DistributionSelection, x: number): number {
  return selection.kind === 'z' ? normalCDF(x) : studentTCDF(x, selection.degreesOfFreedom);
}

/**
 * Quantile of the selected distribution.
 */
export function distributionQuantile(selection: DistributionSelection, p: number): number {
  return selection.kind === 'z'
    ? normalQuantile(p)
    : studentTQuantile(p, selection.degreesOfFreedom);
}

/**
 * Two-sided critical value for a confidence level: F⁻¹((1 + confidence) / 2).
 */
export function criticalValueFor(selection: DistributionSelection, confidenceLevel: number): number {
  assertProbability(confidenceLevel);
  return distributionQuantile(selection, (1 + confidenceLevel) / 2);
}

/**
 * P-value of a test statistic under the selected distribution.
 */
export function pValueFor(selection: DistributionSelection, statistic: number, tail: TailMode): number {
  switch (tail) {
    case 'two-sided':
      return Math.min(1, 2 * (1 - distributionCDF(selection, Math.abs(statistic))));
    case 'greater':
      return 1 - distributionCDF(selection, statistic);
    case 'less':
      return distributionCDF(selection, statistic);
  }
}

/**
 * Error function
 *
 * Abramowitz and Stegun 7.1.26, absolute error below 1.5e-7.
 */
function erf(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x >= 0 ? 1 : -1;
  const ax = Math.abs(x);

  const t = 1 / (1 + p * ax);
  const y = 1 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-ax * ax);

  return sign * y;
}

/**
 * Natural log of the gamma function (Lanczos approximation, g = 7)
 */
function logGamma(z: number): number {
  const g = 7;
  const c = [
    0.99999999999980993,
    676.5203681218851,
    -1259.1392167224028,
    771.32342877765313,
    -176.61502916214059,
    12.507343278686905,
    -0.13857109526572012,
    9.9843695780195716e-6,
    1.5056327351493116e-7,
  ];

  if (z < 0.5) {
    // Reflection formula
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * z))) - logGamma(1 - z);
  }

  const zm1 = z - 1;
  let x = c[0];
  for (let i = 1; i < g + 2; i++) {
    x += c[i] / (zm1 + i);
  }

  const t = zm1 + g + 0.5;
  return 0.5 * Math.log(2 * Math.PI) + (zm1 + 0.5) * Math.log(t) - t + Math.log(x);
}

/**
 * Regularized incomplete beta function I_x(a, b)
 */
function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const logFront =
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x);
  const front = Math.exp(logFront);

  // The continued fraction converges fastest for x < (a + 1) / (a + b + 2)
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(x, a, b)) / a;
  }
  return 1 - (front * betaContinuedFraction(1 - x, b, a)) / b;
}

/**
 * Continued fraction for the incomplete beta function (modified Lentz)
 */
function betaContinuedFraction(x: number, a: number, b: number): number {
  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;

  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < TINY) d = TINY;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= MAX_BETA_ITERATIONS; m++) {
    const m2 = 2 * m;

    // Even step
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < TINY) d = TINY;
    c = 1 + aa / c;
    if (Math.abs(c) < TINY) c = TINY;
    d = 1 / d;
    h *= d * c;

    // Odd step
    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < TINY) d = TINY;
    c = 1 + aa / c;
    if (Math.abs(c) < TINY) c = TINY;
    d = 1 / d;
    const delta = d * c;
    h *= delta;

    if (Math.abs(delta - 1) < BETA_EPSILON) {
      break;
    }
  }

  return h;
}

function assertProbability(p: number): void {
  if (!Number.isFinite(p) || p <= 0 || p >= 1) {
    throw new InferenceError('InvalidParams', 'Probability must be between 0 and 1', { value: p });
  }
}

function assertDegreesOfFreedom(df: number): void {
  if (!Number.isFinite(df) || df <= 0) {
    throw new InferenceError('InvalidParams', 'Degrees of freedom must be positive', { df });
  }
}
