import { describe, expect, it } from 'vitest';
import { normalizeTimeframe, zScores } from '@/scoring/normalize';

describe('zScores', () => {
  it('standardizes with the population standard deviation', () => {
    const { scores, stats } = zScores([1, 3]);
    expect(scores).toEqual([-1, 1]);
    expect(stats).toEqual({ count: 2, mean: 2, stdDev: 1, degenerate: false });
  });

  it('maps undefined values to 0 and leaves them out of the distribution', () => {
    const { scores, stats } = zScores([1, null, 3]);
    expect(scores).toEqual([-1, 0, 1]);
    expect(stats.count).toBe(2);
  });

  it('centers an uneven cross-section at 0 with unit spread', () => {
    const values = [0.12, null, -0.4, 3.7, 0.05, null, 1.3, -2.25, 0.9];
    const { scores } = zScores(values);

    const defined = scores.filter((_, i) => values[i] !== null);
    const center = defined.reduce((sum, z) => sum + z, 0) / defined.length;
    const spread = Math.sqrt(defined.reduce((sum, z) => sum + (z - center) ** 2, 0) / defined.length);

    expect(defined).toHaveLength(7);
    expect(Math.abs(center)).toBeLessThan(1e-9);
    expect(Math.abs(spread - 1)).toBeLessThan(1e-9);
    expect([scores[1], scores[5]]).toEqual([0, 0]);
  });

  it('maps a distribution without spread to 0', () => {
    const { scores, stats } = zScores([5, 5, 5]);
    expect(scores).toEqual([0, 0, 0]);
    expect(stats.degenerate).toBe(true);
    expect(stats.stdDev).toBe(0);
  });

  it('treats an all-undefined column as degenerate', () => {
    const { scores, stats } = zScores([null, null]);
    expect(scores).toEqual([0, 0]);
    expect(stats.count).toBe(0);
    expect(stats.degenerate).toBe(true);
  });
});

describe('normalizeTimeframe', () => {
  it('normalizes each metric across the symbols and reports degenerate ones', () => {
    const { normalized, degenerate, stats } = normalizeTimeframe([
      { symbol: 'AAA', metrics: { slope: 1, relativeStrength: 3, relativeVolume: null, volatilityRatio: 2 } },
      { symbol: 'BBB', metrics: { slope: 3, relativeStrength: 1, relativeVolume: null, volatilityRatio: 2 } },
    ]);

    expect(normalized.get('AAA')).toEqual({ slope: -1, relativeStrength: 1, relativeVolume: 0, volatilityRatio: 0 });
    expect(normalized.get('BBB')).toEqual({ slope: 1, relativeStrength: -1, relativeVolume: 0, volatilityRatio: 0 });
    expect(degenerate).toEqual(['relativeVolume', 'volatilityRatio']);
    expect(stats.volatilityRatio.count).toBe(2);
    expect(stats.relativeVolume.count).toBe(0);
  });

  it('returns an empty map for an empty cross-section', () => {
    const { normalized, degenerate } = normalizeTimeframe([]);
    expect(normalized.size).toBe(0);
    expect(degenerate).toEqual(['slope', 'relativeStrength', 'relativeVolume', 'volatilityRatio']);
  });
});
