import { describe, expect, it } from 'vitest';
import { DataUnavailableError } from '@/core/errors';
import type { BarSeriesProvider } from '@/providers/types';
import { DEFAULT_MODEL, type SpotModel } from '@/scoring/scoring_config';
import { runSpot, spotScanSymbol, spotScanUniverse, type SpotBars } from '@/spot/engine';
import type { Bar, Timeframe } from '@/types/bars';
import { bar, barsFromCloses } from '../helpers/bars';

const MODEL: SpotModel = {
  ...DEFAULT_MODEL.spot,
  atrLookback: 2,
  rsLookbacks: { '1h': 3, '15m': 3, '5m': 3 },
  dailyVolumeLookback: 2,
};

const DAY = Date.UTC(2024, 0, 2);
const DAILY = [
  bar(DAY, 10, 10, 10, 10, 100),
  bar(DAY + 1, 10, 12, 9, 11, 100),
  bar(DAY + 2, 11, 11, 10, 10.5, 100),
  bar(DAY + 3, 12.5, 14, 12, 13, 200),
];

const at = (day: number, minute: number) => Date.UTC(2024, 0, day, 14, minute);
const QUARTER_HOUR: Bar[] = [
  bar(at(2, 30), 100, 100, 100, 100, 100),
  bar(at(2, 35), 100, 100, 100, 100, 100),
  bar(at(3, 30), 100, 100, 100, 100, 200),
  bar(at(3, 35), 100, 100, 100, 100, 200),
  bar(at(4, 30), 100, 100, 100, 100, 300),
  bar(at(4, 35), 99, 99, 99, 99, 300),
];

const BARS: SpotBars = {
  '1d': { AAA: DAILY, BBB: DAILY },
  '1h': {
    AAA: barsFromCloses([100, 101, 102]),
    BBB: barsFromCloses([100, 99, 98]),
    SPY: barsFromCloses([100, 100, 100]),
  },
  '15m': { AAA: QUARTER_HOUR, SPY: barsFromCloses([100, 100, 100]) },
};

const OPTIONS = { benchmark: 'SPY', sectorMap: { AAA: 'XLK', BBB: 'XLF' }, model: MODEL };

describe('spotScanSymbol', () => {
  const result = spotScanSymbol('aaa', BARS, OPTIONS);

  it('blends intraday relative strength over the available timeframes', () => {
    const { momentum } = result;
    expect(momentum.relativeStrength['1h']).toBeCloseTo(Math.log(1.02), 12);
    expect(momentum.relativeStrength['15m']).toBeCloseTo(Math.log(0.99), 12);
    expect(momentum.relativeStrength['5m']).toBeNull();
    expect(momentum.composite).toBeCloseTo((0.5 * Math.log(1.02) + 0.3 * Math.log(0.99)) / 0.8, 12);
    expect(momentum.effectiveWeights['1h']).toBeCloseTo(0.625, 12);
    expect(momentum.effectiveWeights['15m']).toBeCloseTo(0.375, 12);
    expect(momentum.bias).toBe(1);
    expect(momentum.aligned).toBe(false);
  });

  it('computes ATR per timeframe and the daily range consumed', () => {
    expect(result.atr).toEqual({ '1w': null, '1d': 2.25, '1h': 1, '15m': 0.5, '5m': null });
    expect(result.rangeConsumed.daily).toBeCloseTo(100 / 2.25, 10);
    expect(result.rangeConsumed.weekly).toBeNull();
  });

  it('computes session, daily and per-bar relative volume', () => {
    expect(result.relativeVolume.session).toBe(2);
    expect(result.relativeVolume.daily).toBe(2);
    expect(result.relativeVolume.byTimeframe).toEqual({ '1h': 1, '15m': 1.2, '5m': null });
  });

  it('measures levels from the daily bars', () => {
    expect(result.levels.price).toBe(13);
    expect(result.levels.high20d).toBe(14);
    expect(result.levels.low20d).toBe(9);
  });

  it('records missing timeframes as issues', () => {
    expect(result.sector).toBe('XLK');
    expect(result.issues).toEqual([
      { kind: 'data_unavailable', timeframe: '5m', symbol: 'AAA', metric: null, message: 'momentum: no 5m bars' },
    ]);
  });

  it('reports a close at the daily high as zero distance and a full range', () => {
    const daily = [
      bar(DAY, 10, 10, 10, 10),
      bar(DAY + 1, 10, 12, 8, 10),
      bar(DAY + 2, 10, 14, 10, 14),
    ];
    const atHigh = spotScanSymbol('CCC', { '1d': { CCC: daily } }, OPTIONS);

    expect(atHigh.atr['1d']).toBe(4);
    expect(atHigh.levels.pctFromDailyHigh).toBe(0);
    expect(atHigh.rangeConsumed.daily).toBe(100);
  });

  it('rejects a symbol without daily bars', () => {
    expect(() => spotScanSymbol('ZZZ', BARS, OPTIONS)).toThrow(DataUnavailableError);
  });
});

describe('spotScanUniverse', () => {
  it('orders by intraday composite and skips symbols without daily bars', () => {
    const { results, skipped } = spotScanUniverse(['BBB', 'SPY', 'AAA', 'ZZZ'], BARS, OPTIONS);

    expect(results.map((r) => r.symbol)).toEqual(['AAA', 'BBB']);
    expect(skipped).toEqual([
      { kind: 'data_unavailable', timeframe: '1d', symbol: 'ZZZ', metric: null, message: 'ZZZ 1d: no daily bars' },
    ]);
  });

  it('applies the sector filter', () => {
    const { results, skipped } = spotScanUniverse(['AAA', 'BBB', 'ZZZ'], BARS, { ...OPTIONS, sector: 'xlf' });
    expect(results.map((r) => r.symbol)).toEqual(['BBB']);
    expect(skipped).toEqual([]);
  });
});

function recordingProvider(requested: string[]): BarSeriesProvider {
  return {
    name: 'fake',
    async getBars(symbol: string, timeframe: Timeframe) {
      requested.push(`${timeframe}:${symbol}`);
      const series = BARS[timeframe]?.[symbol];
      if (!series) throw new DataUnavailableError(symbol, timeframe);
      return series;
    },
    getRequestCount: () => requested.length,
    close: () => undefined,
  };
}

const PIPELINE = { maxConcurrency: 2, throttleMs: 0, maxSymbolsPerRun: null };

describe('runSpot', () => {
  it('gathers every timeframe through the provider', async () => {
    const requested: string[] = [];
    const provider = recordingProvider(requested);

    const { results } = await runSpot({
      provider,
      symbols: ['aaa'],
      benchmark: 'SPY',
      sectorMap: OPTIONS.sectorMap,
      model: MODEL,
      pipeline: PIPELINE,
    });

    expect(requested).toHaveLength(10);
    expect(results).toHaveLength(1);
    expect(results[0].momentum.composite).toBeCloseTo((0.5 * Math.log(1.02) + 0.3 * Math.log(0.99)) / 0.8, 12);
  });

  it('only fetches symbols in the requested sector', async () => {
    const requested: string[] = [];
    const { results } = await runSpot({
      provider: recordingProvider(requested),
      symbols: ['AAA', 'BBB'],
      benchmark: 'SPY',
      sectorMap: OPTIONS.sectorMap,
      model: MODEL,
      pipeline: PIPELINE,
      sector: 'xlf',
    });

    expect(requested).toHaveLength(10);
    expect(requested.filter((r) => r.endsWith(':AAA'))).toEqual([]);
    expect(results.map((r) => r.symbol)).toEqual(['BBB']);
  });
});
