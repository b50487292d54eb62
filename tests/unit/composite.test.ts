import { describe, expect, it } from 'vitest';
import { blendScores, scoreTimeframe } from '@/scoring/composite';
import type { ScanTimeframe } from '@/types/bars';

const COMPONENT_WEIGHTS = { slope: 0.35, relativeStrength: 0.35, relativeVolume: 0.15, volatilityRatio: 0.15 };
const TIMEFRAME_WEIGHTS = { '1w': 0.4, '1d': 0.35, '1h': 0.25 };
const ORDER: ScanTimeframe[] = ['1w', '1d', '1h'];

describe('scoreTimeframe', () => {
  it('sums weight times z-score over the metrics', () => {
    const score = scoreTimeframe({ slope: 1, relativeStrength: -1, relativeVolume: 2, volatilityRatio: 0 }, COMPONENT_WEIGHTS);
    expect(score).toBeCloseTo(0.3, 12);
  });
});

describe('blendScores', () => {
  it('renormalizes the weights of the timeframes that have a score', () => {
    const { score, effectiveWeights } = blendScores({ '1w': 1, '1d': 0.5 }, TIMEFRAME_WEIGHTS, ORDER);
    expect(score).toBeCloseTo(0.575 / 0.75, 12);
    expect(effectiveWeights['1w']).toBeCloseTo(0.4 / 0.75, 12);
    expect(effectiveWeights['1d']).toBeCloseTo(0.35 / 0.75, 12);
    expect(effectiveWeights['1h']).toBe(0);
  });

  it('applies configured weights unchanged under the fixed policy', () => {
    const { score, effectiveWeights } = blendScores({ '1w': 1, '1d': 0.5 }, TIMEFRAME_WEIGHTS, ORDER, 'fixed');
    expect(score).toBeCloseTo(0.575, 12);
    expect(effectiveWeights).toEqual({ '1w': 0.4, '1d': 0.35, '1h': 0 });
  });

  it('ignores non-finite scores', () => {
    const { score, effectiveWeights } = blendScores({ '1w': Number.NaN, '1d': 2 }, TIMEFRAME_WEIGHTS, ORDER);
    expect(score).toBe(2);
    expect(effectiveWeights).toEqual({ '1w': 0, '1d': 1, '1h': 0 });
  });

  it('returns null without any usable score', () => {
    const { score, effectiveWeights } = blendScores({}, TIMEFRAME_WEIGHTS, ORDER);
    expect(score).toBeNull();
    expect(effectiveWeights).toEqual({ '1w': 0, '1d': 0, '1h': 0 });
  });
});
