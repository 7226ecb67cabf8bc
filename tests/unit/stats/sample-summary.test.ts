import { describe, it, expect } from 'vitest';
import { summarizeSample } from '../../../src/stats/sample-summary.js';
import { InferenceError } from '../../../src/api/errors.js';

describe('summarizeSample', () => {
  it('should compute mean and sample standard deviation', () => {
    const summary = summarizeSample([48, 52, 45, 55, 50, 49, 51]);

    expect(summary.n).toBe(7);
    expect(summary.mean).toBe(50);
    // Σ(x − x̄)² = 60, s² = 60 / 6
    expect(summary.standardDeviation).toBeCloseTo(Math.sqrt(10), 10);
    expect(summary.rawValues).toEqual([48, 52, 45, 55, 50, 49, 51]);
  });

  it('should give a zero standard deviation for one observation', () => {
    expect(summarizeSample([7])).toEqual({ mean: 7, standardDeviation: 0, n: 1, rawValues: [7] });
  });

  it('should not keep a reference to the caller array', () => {
    const values = [1, 2, 3];
    const summary = summarizeSample(values);
    values.push(100);

    expect(summary.rawValues).toEqual([1, 2, 3]);
  });

  it('should reject an empty sample', () => {
    expect(() => summarizeSample([])).toThrow('Cannot summarize an empty sample');
  });

  it('should reject non-finite values', () => {
    try {
      summarizeSample([1, Number.NaN, 3]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InferenceError);
      expect((error as InferenceError).code).toBe('InvalidParams');
      expect((error as InferenceError).message).toBe('values[1] must be a finite number');
    }
  });
});
