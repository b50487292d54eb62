import { describe, expect, it } from 'vitest';
import { InsufficientDataError, UndefinedMetricError } from '@/core/errors';
import {
  computeRawMetrics,
  computeRelativeStrength,
  computeRelativeVolume,
  computeSlope,
  computeVolatilityRatio,
} from '@/scoring/metrics';
import { barsFromCloses } from '../helpers/bars';

const LOOKBACKS = { slope: 10, relativeStrength: 10, relativeVolume: 10, volatilityRatio: 10 };

describe('computeSlope', () => {
  it('returns the per-bar growth rate of log prices', () => {
    const closes = [0, 1, 2, 3, 4].map((i) => 100 * Math.exp(0.01 * i));
    expect(computeSlope(closes, 10)).toBeCloseTo(0.01, 10);
  });

  it('reads only the last lookback bars', () => {
    expect(computeSlope([1, 10, 10, 10], 3)).toBe(0);
  });

  it('needs two bars', () => {
    expect(() => computeSlope([100], 5)).toThrow(InsufficientDataError);
  });
});

describe('computeRelativeStrength', () => {
  it('subtracts the benchmark log return', () => {
    expect(computeRelativeStrength([100, 110], [100, 100], 10)).toBeCloseTo(Math.log(1.1), 12);
    expect(computeRelativeStrength([100, 100], [100, 110], 10)).toBeCloseTo(-Math.log(1.1), 12);
  });

  it('truncates both series to their common trailing window', () => {
    expect(computeRelativeStrength([50, 100, 110], [100, 100], 10)).toBeCloseTo(Math.log(1.1), 12);
    expect(computeRelativeStrength([100, 105, 110], [100, 100, 100], 2)).toBeCloseTo(Math.log(110 / 105), 12);
  });

  it('needs two aligned bars', () => {
    expect(() => computeRelativeStrength([100, 110], [100], 10)).toThrow(InsufficientDataError);
  });
});

describe('computeRelativeVolume', () => {
  it('divides the latest volume by the average of the preceding bars', () => {
    expect(computeRelativeVolume([100, 100, 100, 300], 4)).toBe(3);
    expect(computeRelativeVolume([900, 100, 300, 400], 3)).toBe(2);
  });

  it('is undefined when the trailing average is zero', () => {
    expect(() => computeRelativeVolume([0, 0, 50], 3)).toThrow(UndefinedMetricError);
  });

  it('needs two bars', () => {
    expect(() => computeRelativeVolume([100, 200], 1)).toThrow(InsufficientDataError);
  });
});

describe('computeVolatilityRatio', () => {
  it('scores a calmer symbol above a volatile one', () => {
    const benchmark = [100, 110, 99];
    const doubled = benchmark.map((p) => 100 * (p / 100) ** 2);
    expect(computeVolatilityRatio(doubled, benchmark, 10)).toBeCloseTo(0.5, 10);
    expect(computeVolatilityRatio(benchmark, doubled, 10)).toBeCloseTo(2, 10);
  });

  it('is undefined when either side has no volatility', () => {
    expect(() => computeVolatilityRatio([100, 110, 99], [100, 100, 100], 10)).toThrow('benchmark volatility is zero');
    expect(() => computeVolatilityRatio([100, 100, 100], [100, 110, 99], 10)).toThrow('symbol volatility is zero');
  });

  it('needs three bars', () => {
    expect(() => computeVolatilityRatio([100, 110], [100, 105], 10)).toThrow(InsufficientDataError);
  });
});

describe('computeRawMetrics', () => {
  it('records undefined metrics as issues and keeps the rest', () => {
    const symbol = barsFromCloses([100, 102.5, 105, 107.5, 110]);
    const benchmark = barsFromCloses([100, 100, 100, 100, 100]);

    const { metrics, issues } = computeRawMetrics(symbol, benchmark, LOOKBACKS);

    expect(metrics.relativeStrength).toBeCloseTo(Math.log(1.1), 12);
    expect(metrics.relativeVolume).toBe(1);
    expect(metrics.slope).toBeGreaterThan(0);
    expect(metrics.volatilityRatio).toBeNull();
    expect(issues).toEqual([
      {
        metric: 'volatilityRatio',
        kind: 'undefined_metric',
        message: 'volatility ratio: benchmark volatility is zero',
      },
    ]);
  });

  it('reports insufficient data for a single bar', () => {
    const { metrics, issues } = computeRawMetrics(barsFromCloses([100]), barsFromCloses([100]), LOOKBACKS);
    expect(metrics).toEqual({ slope: null, relativeStrength: null, relativeVolume: null, volatilityRatio: null });
    expect(issues.map((issue) => issue.kind)).toEqual([
      'insufficient_data',
      'insufficient_data',
      'insufficient_data',
      'insufficient_data',
    ]);
  });
});
