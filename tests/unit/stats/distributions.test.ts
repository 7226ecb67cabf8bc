/**
 * Distribution Tests
 *
 * Normal and Student's t CDF/quantile accuracy against published table values.
 */

import { describe, it, expect } from 'vitest';
import {
  normalCDF,
  normalQuantile,
  studentTCDF,
  studentTQuantile,
  criticalValueFor,
  pValueFor,
} from '../../../src/stats/distributions.js';
import { selectDistribution } from '../../../src/stats/test-selector.js';
import { InferenceError } from '../../../src/api/errors.js';

describe('Distributions', () => {
  describe('normalCDF', () => {
    it('should be 0.5 at zero', () => {
      expect(normalCDF(0)).toBeCloseTo(0.5, 8);
    });

    it('should match table values', () => {
      expect(normalCDF(1.959964)).toBeCloseTo(0.975, 6);
      expect(normalCDF(2)).toBeCloseTo(0.97725, 5);
      expect(normalCDF(-1)).toBeCloseTo(0.158655, 5);
    });

    it('should handle infinities', () => {
      expect(normalCDF(Infinity)).toBe(1);
      expect(normalCDF(-Infinity)).toBe(0);
    });
  });

  describe('normalQuantile', () => {
    it('should invert the CDF at common confidence levels', () => {
      expect(normalQuantile(0.975)).toBeCloseTo(1.959964, 5);
      expect(normalQuantile(0.95)).toBeCloseTo(1.644854, 5);
      expect(normalQuantile(0.995)).toBeCloseTo(2.575829, 5);
    });

    it('should be antisymmetric around 0.5', () => {
      expect(normalQuantile(0.5)).toBe(0);
      expect(normalQuantile(0.025)).toBeCloseTo(-normalQuantile(0.975), 8);
      expect(normalQuantile(0.001)).toBeCloseTo(-3.090232, 5);
    });

    it('should reject probabilities outside (0, 1)', () => {
      expect(() => normalQuantile(0)).toThrow(InferenceError);
      expect(() => normalQuantile(1)).toThrow('Probability must be between 0 and 1');
    });
  });

  describe('studentTCDF', () => {
    it('should be 0.5 at zero for any df', () => {
      expect(studentTCDF(0, 5)).toBe(0.5);
      expect(studentTCDF(0, 24)).toBe(0.5);
    });

    it('should reduce to the Cauchy distribution for df = 1', () => {
      // Cauchy CDF: 0.5 + atan(t) / π
      expect(studentTCDF(1, 1)).toBeCloseTo(0.75, 8);
      expect(studentTCDF(-1, 1)).toBeCloseTo(0.25, 8);
    });

    it('should match table values', () => {
      expect(studentTCDF(2.228139, 10)).toBeCloseTo(0.975, 5);
      expect(studentTCDF(2.063899, 24)).toBeCloseTo(0.975, 5);
      expect(studentTCDF(-2.063899, 24)).toBeCloseTo(0.025, 5);
    });

    it('should reject non-positive degrees of freedom', () => {
      expect(() => studentTCDF(1, 0)).toThrow('Degrees of freedom must be positive');
    });
  });

  describe('studentTQuantile', () => {
    it('should match table critical values', () => {
      expect(studentTQuantile(0.975, 24)).toBeCloseTo(2.063899, 4);
      expect(studentTQuantile(0.975, 10)).toBeCloseTo(2.228139, 4);
      expect(studentTQuantile(0.95, 24)).toBeCloseTo(1.710882, 4);
      expect(studentTQuantile(0.975, 200)).toBeCloseTo(1.971896, 3);
    });

    it('should handle heavy tails at df = 1', () => {
      // tan(0.495π)
      expect(studentTQuantile(0.995, 1)).toBeCloseTo(63.65674, 3);
    });

    it('should be antisymmetric', () => {
      expect(studentTQuantile(0.5, 7)).toBe(0);
      expect(studentTQuantile(0.025, 7)).toBeCloseTo(-studentTQuantile(0.975, 7), 6);
    });
  });

  describe('criticalValueFor', () => {
    it('should use the normal quantile for Z', () => {
      expect(criticalValueFor(selectDistribution(30), 0.95)).toBeCloseTo(1.959964, 5);
    });

    it('should use the t quantile for T', () => {
      expect(criticalValueFor(selectDistribution(25), 0.95)).toBeCloseTo(2.063899, 4);
    });
  });

  describe('pValueFor', () => {
    const z = selectDistribution(100);

    it('should compute two-sided p-values from |statistic|', () => {
      expect(pValueFor(z, 1.959964, 'two-sided')).toBeCloseTo(0.05, 5);
      expect(pValueFor(z, -1.959964, 'two-sided')).toBeCloseTo(0.05, 5);
    });

    it('should compute one-sided p-values by direction', () => {
      expect(pValueFor(z, 1.959964, 'greater')).toBeCloseTo(0.025, 5);
      expect(pValueFor(z, 1.959964, 'less')).toBeCloseTo(0.975, 5);
    });
  });
});
