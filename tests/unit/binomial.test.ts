/**
 * Bross Sequential Analysis - Binomial Interval Tests
 * ====================================================
 */

import {
  assertAlpha,
  betaQuantile,
  clopperPearson,
  logGamma,
  regIncompleteBeta,
} from '../../src/stats/binomial';
import { InvalidArgumentError } from '../../src/core/errors';

describe('logGamma', () => {
  it('should match log factorials', () => {
    expect(logGamma(1)).toBeCloseTo(0, 10);
    expect(logGamma(5)).toBeCloseTo(Math.log(24), 10);
    expect(logGamma(11)).toBeCloseTo(Math.log(3628800), 9);
  });

  it('should handle half-integers', () => {
    expect(logGamma(0.5)).toBeCloseTo(0.5 * Math.log(Math.PI), 10);
  });
});

describe('regIncompleteBeta', () => {
  it('should clamp at the ends', () => {
    expect(regIncompleteBeta(0, 2, 3)).toBe(0);
    expect(regIncompleteBeta(1, 2, 3)).toBe(1);
  });

  it('should equal x for the uniform distribution', () => {
    expect(regIncompleteBeta(0.3, 1, 1)).toBeCloseTo(0.3, 10);
  });

  it('should be symmetric for equal shapes', () => {
    expect(regIncompleteBeta(0.5, 4, 4)).toBeCloseTo(0.5, 10);
    expect(regIncompleteBeta(0.2, 3, 5)).toBeCloseTo(1 - regIncompleteBeta(0.8, 5, 3), 10);
  });

  it('should match the closed form of Beta(2, 1)', () => {
    // I_x(2, 1) = x^2
    expect(regIncompleteBeta(0.6, 2, 1)).toBeCloseTo(0.36, 10);
  });
});

describe('betaQuantile', () => {
  it('should invert the regularized incomplete beta', () => {
    const x = betaQuantile(0.9, 3, 7);
    expect(regIncompleteBeta(x, 3, 7)).toBeCloseTo(0.9, 9);
  });
});

describe('clopperPearson', () => {
  it('should match reference intervals', () => {
    const half = clopperPearson(5, 10, 0.05);
    expect(half.lower).toBeCloseTo(0.187086, 5);
    expect(half.upper).toBeCloseTo(0.812914, 5);

    const sparse = clopperPearson(83, 1000, 0.05);
    expect(sparse.lower).toBeCloseTo(0.066649, 5);
    expect(sparse.upper).toBeCloseTo(0.101853, 5);

    const wide = clopperPearson(3, 20, 0.1);
    expect(wide.lower).toBeCloseTo(0.042169, 5);
    expect(wide.upper).toBeCloseTo(0.343664, 5);
  });

  it('should pin the lower bound to 0 when there are no successes', () => {
    const ci = clopperPearson(0, 10, 0.05);
    expect(ci.lower).toBe(0);
    expect(ci.upper).toBeCloseTo(0.308497, 5);
  });

  it('should pin the upper bound to 1 when every trial succeeds', () => {
    const ci = clopperPearson(1000, 1000, 0.05);
    expect(ci.upper).toBe(1);
    expect(ci.lower).toBeCloseTo(0.9963179, 6);
  });

  it('should handle a single trial', () => {
    const ci = clopperPearson(0, 1, 0.05);
    expect(ci.lower).toBe(0);
    expect(ci.upper).toBeCloseTo(0.975, 9);
  });

  it('should bracket the point estimate', () => {
    for (const k of [0, 1, 4, 11, 12]) {
      const { lower, upper } = clopperPearson(k, 12, 0.05);
      expect(lower).toBeLessThanOrEqual(k / 12);
      expect(upper).toBeGreaterThanOrEqual(k / 12);
      expect(lower).toBeGreaterThanOrEqual(0);
      expect(upper).toBeLessThanOrEqual(1);
    }
  });

  it('should reject invalid counts', () => {
    expect(() => clopperPearson(3, 0, 0.05)).toThrow('trials must be a positive integer, got 0');
    expect(() => clopperPearson(11, 10, 0.05)).toThrow('successes must be an integer in [0, 10], got 11');
    expect(() => clopperPearson(1.5, 10, 0.05)).toThrow(InvalidArgumentError);
  });

  it('should reject alpha outside (0, 1)', () => {
    expect(() => clopperPearson(1, 10, 0)).toThrow('alpha must lie strictly between 0 and 1, got 0');
    expect(() => clopperPearson(1, 10, 1)).toThrow(InvalidArgumentError);
  });
});

describe('assertAlpha', () => {
  it('should accept values strictly inside (0, 1)', () => {
    expect(() => assertAlpha(0.05)).not.toThrow();
    expect(() => assertAlpha(Number.NaN)).toThrow('alpha must lie strictly between 0 and 1, got NaN');
  });
});
