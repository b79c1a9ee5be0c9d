import { describe, it, expect } from 'vitest';
import {
  lgamma, lgammaRatio, trigamma, gammaQ, normalSF, twoSidedNormalP,
  weightedQuantile, maximizeOnInterval, interpolateLinear,
} from '../analysis/stats-utils';

describe('lgamma', () => {
  it('lgamma(1) = 0', () => {
    expect(lgamma(1)).toBeCloseTo(0, 10);
  });

  it('lgamma(0.5) = ln(sqrt(pi))', () => {
    expect(lgamma(0.5)).toBeCloseTo(Math.log(Math.sqrt(Math.PI)), 8);
  });

  it('lgamma(5) = ln(24)', () => {
    expect(lgamma(5)).toBeCloseTo(Math.log(24), 8);
  });
});

describe('lgammaRatio', () => {
  it('sums logs for small y', () => {
    expect(lgammaRatio(3, 2.5)).toBeCloseTo(Math.log(2.5 * 3.5 * 4.5), 12);
  });

  it('is 0 for y = 0', () => {
    expect(lgammaRatio(0, 7)).toBe(0);
  });

  it('agrees with lgamma difference for large y', () => {
    expect(lgammaRatio(2000, 3)).toBeCloseTo(lgamma(2003) - lgamma(3), 6);
  });
});

describe('trigamma', () => {
  it('trigamma(1) = pi^2/6', () => {
    expect(trigamma(1)).toBeCloseTo(Math.PI ** 2 / 6, 8);
  });

  it('trigamma(0.5) = pi^2/2', () => {
    expect(trigamma(0.5)).toBeCloseTo(Math.PI ** 2 / 2, 8);
  });

  it('approaches 1/x for large x', () => {
    expect(trigamma(1000)).toBeCloseTo(1 / 1000 + 1 / (2 * 1000 ** 2), 9);
  });
});

describe('incomplete gamma', () => {
  it('Q(1, 1) = e^-1', () => {
    expect(gammaQ(1, 1)).toBeCloseTo(Math.exp(-1), 10);
  });

  it('Q(2, 3) = 4e^-3', () => {
    expect(gammaQ(2, 3)).toBeCloseTo(4 * Math.exp(-3), 10);
  });

  it('Q(a, 0) = 1', () => {
    expect(gammaQ(2, 0)).toBe(1);
  });
});

describe('normal tail', () => {
  it('normalSF(0) = 0.5', () => {
    expect(normalSF(0)).toBeCloseTo(0.5, 10);
  });

  it('normalSF(-1.96) ≈ 0.975', () => {
    expect(normalSF(-1.959963984540054)).toBeCloseTo(0.975, 6);
  });

  it('two-sided p at 1.96 ≈ 0.05', () => {
    expect(twoSidedNormalP(-1.959963984540054)).toBeCloseTo(0.05, 6);
  });

  it('keeps precision far in the tail', () => {
    const p = twoSidedNormalP(10);
    expect(p).toBeGreaterThan(0);
    expect(p).toBeLessThan(1e-20);
  });

  it('caps at 1', () => {
    expect(twoSidedNormalP(0)).toBe(1);
  });
});

describe('weightedQuantile', () => {
  it('returns the value where cumulative weight reaches p', () => {
    expect(weightedQuantile([4, 1, 3, 2], [1, 1, 1, 1], 0.5)).toBe(2);
  });

  it('follows the weights', () => {
    expect(weightedQuantile([1, 2, 3, 4], [0, 0, 0, 1], 0.5)).toBe(4);
  });

  it('is NaN for empty input', () => {
    expect(weightedQuantile([], [], 0.5)).toBeNaN();
  });
});

describe('maximizeOnInterval', () => {
  it('finds an interior maximum', () => {
    expect(maximizeOnInterval(x => -((x - 1.3) ** 2), 0, 5)).toBeCloseTo(1.3, 5);
  });

  it('stays inside the bracket when the maximum is at an end', () => {
    const x = maximizeOnInterval(x => x, 0, 1);
    expect(x).toBeLessThanOrEqual(1);
    expect(x).toBeCloseTo(1, 5);
  });

  it('returns the midpoint of a degenerate bracket', () => {
    expect(maximizeOnInterval(x => x, 2, 2)).toBe(2);
  });
});

describe('interpolateLinear', () => {
  const xs = [0, 1, 2];
  const ys = [0, 10, 40];

  it('interpolates between knots', () => {
    expect(interpolateLinear(xs, ys, 1.5)).toBe(25);
  });

  it('is constant beyond the ends', () => {
    expect(interpolateLinear(xs, ys, -1)).toBe(0);
    expect(interpolateLinear(xs, ys, 3)).toBe(40);
  });
});
