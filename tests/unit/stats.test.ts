import { describe, expect, it } from 'vitest';
import { linearSlope, logReturns, mean, populationStdDev, sampleStdDev } from '@/scoring/stats';

describe('stats', () => {
  it('computes the mean and both standard deviations', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(populationStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    expect(sampleStdDev([1, 2, 3, 4, 5])).toBeCloseTo(Math.sqrt(2.5), 12);
  });

  it('returns NaN where a statistic has too few values', () => {
    expect(mean([])).toBeNaN();
    expect(populationStdDev([])).toBeNaN();
    expect(sampleStdDev([3])).toBeNaN();
    expect(linearSlope([5])).toBeNaN();
  });

  it('fits a least-squares slope against the bar index', () => {
    expect(linearSlope([1, 3, 5, 7])).toBe(2);
    expect(linearSlope([4, 4, 4])).toBe(0);
  });

  it('computes log returns between consecutive prices', () => {
    const returns = logReturns([100, 110, 99]);
    expect(returns).toHaveLength(2);
    expect(returns[0]).toBeCloseTo(Math.log(1.1), 12);
    expect(returns[1]).toBeCloseTo(Math.log(0.9), 12);
  });
});
