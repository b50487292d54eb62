/**
 * Per-timeframe raw metrics of a symbol against the benchmark.
 *
 * Every metric reads a window of the last `lookback` bars (the whole series
 * when it is shorter). Two-series metrics truncate both series to their
 * common length counted back from the most recent bar.
 */

import { closes, tail, volumes } from '@/core/bars';
import { InsufficientDataError, UndefinedMetricError, isEngineError, type IssueKind } from '@/core/errors';
import type { BarSeries } from '@/types/bars';
import type { MetricLookbacks } from './scoring_config';
import { ZERO_TOLERANCE, linearSlope, logReturns, mean, sampleStdDev } from './stats';
import { METRIC_NAMES, type MetricName, type RawMetricSet } from './types';

export interface MetricIssue {
  metric: MetricName;
  kind: IssueKind;
  message: string;
}

export interface RawMetricResult {
  metrics: RawMetricSet;
  issues: MetricIssue[];
}

function commonWindow(
  symbolValues: readonly number[],
  benchmarkValues: readonly number[],
  lookback: number
): [number[], number[]] {
  const n = Math.min(lookback, symbolValues.length, benchmarkValues.length);
  return [tail(symbolValues, n), tail(benchmarkValues, n)];
}

/** Least-squares slope of ln(close) per bar. */
export function computeSlope(closePrices: readonly number[], lookback: number): number {
  const window = tail(closePrices, lookback);
  if (window.length < 2) {
    throw new InsufficientDataError('slope', 2, window.length);
  }
  return linearSlope(window.map(Math.log));
}

/** Log return of the symbol minus log return of the benchmark. */
export function computeRelativeStrength(
  symbolCloses: readonly number[],
  benchmarkCloses: readonly number[],
  lookback: number
): number {
  const [symbol, benchmark] = commonWindow(symbolCloses, benchmarkCloses, lookback);
  if (symbol.length < 2) {
    throw new InsufficientDataError('relative strength', 2, symbol.length);
  }
  const last = symbol.length - 1;
  return Math.log(symbol[last] / symbol[0]) - Math.log(benchmark[last] / benchmark[0]);
}

/** Latest bar volume over the mean volume of the preceding bars in the window. */
export function computeRelativeVolume(volumeSeries: readonly number[], lookback: number): number {
  const window = tail(volumeSeries, lookback);
  if (window.length < 2) {
    throw new InsufficientDataError('relative volume', 2, window.length);
  }
  const average = mean(window.slice(0, -1));
  if (!(average > 0)) {
    throw new UndefinedMetricError('relative volume', 'trailing average volume is zero');
  }
  return window[window.length - 1] / average;
}

/**
 * Benchmark realized volatility over symbol realized volatility, so that a
 * calmer symbol scores higher.
 */
export function computeVolatilityRatio(
  symbolCloses: readonly number[],
  benchmarkCloses: readonly number[],
  lookback: number
): number {
  const [symbol, benchmark] = commonWindow(symbolCloses, benchmarkCloses, lookback);
  if (symbol.length < 3) {
    throw new InsufficientDataError('volatility ratio', 3, symbol.length);
  }
  const benchmarkVol = sampleStdDev(logReturns(benchmark));
  const symbolVol = sampleStdDev(logReturns(symbol));
  if (benchmarkVol < ZERO_TOLERANCE) {
    throw new UndefinedMetricError('volatility ratio', 'benchmark volatility is zero');
  }
  if (symbolVol < ZERO_TOLERANCE) {
    throw new UndefinedMetricError('volatility ratio', 'symbol volatility is zero');
  }
  return benchmarkVol / symbolVol;
}

export function emptyMetricSet(): RawMetricSet {
  return { slope: null, relativeStrength: null, relativeVolume: null, volatilityRatio: null };
}

export function computeRawMetrics(
  symbolBars: BarSeries,
  benchmarkBars: BarSeries,
  lookbacks: MetricLookbacks
): RawMetricResult {
  const symbolCloses = closes(symbolBars);
  const benchmarkCloses = closes(benchmarkBars);

  const calculators: Record<MetricName, () => number> = {
    slope: () => computeSlope(symbolCloses, lookbacks.slope),
    relativeStrength: () => computeRelativeStrength(symbolCloses, benchmarkCloses, lookbacks.relativeStrength),
    relativeVolume: () => computeRelativeVolume(volumes(symbolBars), lookbacks.relativeVolume),
    volatilityRatio: () => computeVolatilityRatio(symbolCloses, benchmarkCloses, lookbacks.volatilityRatio),
  };

  const metrics = emptyMetricSet();
  const issues: MetricIssue[] = [];
  for (const metric of METRIC_NAMES) {
    try {
      const value = calculators[metric]();
      if (Number.isFinite(value)) {
        metrics[metric] = value;
      } else {
        issues.push({ metric, kind: 'undefined_metric', message: `${metric}: non-finite result` });
      }
    } catch (error) {
      if (!isEngineError(error)) throw error;
      issues.push({ metric, kind: error.kind, message: error.message });
    }
  }

  return { metrics, issues };
}
