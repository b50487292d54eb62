/**
 * Spot engine: intraday momentum, ATR, range consumed, relative volume and
 * levels per symbol. Each symbol is scored from its own bars plus the
 * benchmark's; there is no cross-sectional normalization here.
 */

import { closes, volumes } from '@/core/bars';
import { DataUnavailableError, isEngineError } from '@/core/errors';
import type { SectorMap } from '@/core/universe';
import type { BarSeriesProvider } from '@/providers/types';
import { blendScores } from '@/scoring/composite';
import { gatherBars, type FetchFailure } from '@/scoring/fetch';
import { computeRelativeStrength, computeRelativeVolume } from '@/scoring/metrics';
import { compareByComposite, signOf } from '@/scoring/ranking';
import type { PipelineConfig, SpotModel } from '@/scoring/scoring_config';
import type { ScanIssue } from '@/scoring/types';
import {
  SPOT_TIMEFRAMES,
  TIMEFRAMES,
  type BarSeries,
  type BarsBySymbol,
  type SpotTimeframe,
  type Timeframe,
} from '@/types/bars';
import { createChildLogger } from '@/utils/logger';
import { RequestThrottler } from '@/utils/throttler';
import { computeAtr } from './atr';
import { computeLevels } from './levels';
import { computeRangeConsumed } from './range';
import type { SpotMetrics, SpotUniverseResult } from './types';
import { computeSessionRelativeVolume } from './volume';

const logger = createChildLogger('spot_engine');

export type SpotBars = Readonly<Partial<Record<Timeframe, BarsBySymbol>>>;

export interface SpotOptions {
  benchmark: string;
  sectorMap: SectorMap;
  model: SpotModel;
}

/** Request lookbacks: weeks for 1w, trading days otherwise (5m: 12 days, about 10 prior sessions). */
export const DEFAULT_SPOT_FETCH_LOOKBACKS: Record<Timeframe, number> = {
  '1w': 26,
  '1d': 30,
  '1h': 10,
  '15m': 5,
  '5m': 12,
};

class IssueLog {
  readonly issues: ScanIssue[] = [];

  constructor(private readonly symbol: string) {}

  /** Run a metric; engine errors become an issue and a null value. */
  attempt(timeframe: Timeframe | null, compute: () => number): number | null {
    try {
      const value = compute();
      return Number.isFinite(value) ? value : null;
    } catch (error) {
      if (!isEngineError(error)) throw error;
      this.issues.push({ kind: error.kind, timeframe, symbol: this.symbol, metric: null, message: error.message });
      return null;
    }
  }

  missing(timeframe: Timeframe, subject: string): null {
    this.issues.push({
      kind: 'data_unavailable',
      timeframe,
      symbol: this.symbol,
      metric: null,
      message: `${subject}: no ${timeframe} bars`,
    });
    return null;
  }
}

function seriesFor(bars: SpotBars, timeframe: Timeframe, symbol: string): BarSeries | null {
  const series = bars[timeframe]?.[symbol];
  return series && series.length > 0 ? series : null;
}

export function spotScanSymbol(rawSymbol: string, bars: SpotBars, options: SpotOptions): SpotMetrics {
  const symbol = rawSymbol.trim().toUpperCase();
  const benchmark = options.benchmark.trim().toUpperCase();
  const { model } = options;

  const daily = seriesFor(bars, '1d', symbol);
  if (!daily) {
    throw new DataUnavailableError(symbol, '1d', 'no daily bars');
  }

  const log = new IssueLog(symbol);

  const atr: Record<Timeframe, number | null> = { '1w': null, '1d': null, '1h': null, '15m': null, '5m': null };
  for (const timeframe of TIMEFRAMES) {
    const series = seriesFor(bars, timeframe, symbol);
    atr[timeframe] = series ? log.attempt(timeframe, () => computeAtr(series, model.atrLookback)) : null;
  }

  const lastDaily = daily[daily.length - 1];
  const dailyAtr = atr['1d'];
  const weekly = seriesFor(bars, '1w', symbol);
  const weeklyAtr = atr['1w'];
  const rangeConsumed = {
    daily: dailyAtr === null ? null : log.attempt('1d', () => computeRangeConsumed(lastDaily, dailyAtr)),
    weekly:
      weekly === null || weeklyAtr === null
        ? null
        : log.attempt('1w', () => computeRangeConsumed(weekly[weekly.length - 1], weeklyAtr)),
  };

  const relativeStrength: Record<SpotTimeframe, number | null> = { '1h': null, '15m': null, '5m': null };
  const perBarVolume: Record<SpotTimeframe, number | null> = { '1h': null, '15m': null, '5m': null };
  for (const timeframe of SPOT_TIMEFRAMES) {
    const series = seriesFor(bars, timeframe, symbol);
    const benchmarkSeries = seriesFor(bars, timeframe, benchmark);
    const lookback = model.rsLookbacks[timeframe];
    if (!series) {
      log.missing(timeframe, 'momentum');
      continue;
    }
    perBarVolume[timeframe] = log.attempt(timeframe, () => computeRelativeVolume(volumes(series), lookback));
    relativeStrength[timeframe] = benchmarkSeries
      ? log.attempt(timeframe, () => computeRelativeStrength(closes(series), closes(benchmarkSeries), lookback))
      : log.missing(timeframe, `benchmark ${benchmark}`);
  }

  const rsScores: Partial<Record<SpotTimeframe, number>> = {};
  const signs: number[] = [];
  for (const timeframe of SPOT_TIMEFRAMES) {
    const value = relativeStrength[timeframe];
    if (value !== null) {
      rsScores[timeframe] = value;
      signs.push(signOf(value));
    }
  }
  const blend = blendScores(rsScores, model.timeframeWeights, SPOT_TIMEFRAMES, 'renormalize');
  const aligned = signs.length > 0 && signs[0] !== 0 && signs.every((sign) => sign === signs[0]);

  const intraday = seriesFor(bars, '5m', symbol) ?? seriesFor(bars, '15m', symbol);
  const intradayTimeframe: Timeframe = seriesFor(bars, '5m', symbol) ? '5m' : '15m';
  const session = intraday
    ? log.attempt(intradayTimeframe, () =>
        computeSessionRelativeVolume(intraday, { maxSessions: model.sessionLookback, timeZone: model.timeZone })
      )
    : log.missing('5m', 'session relative volume');

  const result: SpotMetrics = {
    symbol,
    sector: options.sectorMap[symbol] ?? null,
    momentum: Object.freeze({
      relativeStrength: Object.freeze(relativeStrength),
      composite: blend.score,
      effectiveWeights: Object.freeze(blend.effectiveWeights),
      bias: blend.score === null ? 0 : signOf(blend.score),
      aligned,
    }),
    atr: Object.freeze(atr),
    rangeConsumed: Object.freeze(rangeConsumed),
    relativeVolume: Object.freeze({
      session,
      daily: log.attempt('1d', () => computeRelativeVolume(volumes(daily), model.dailyVolumeLookback + 1)),
      byTimeframe: Object.freeze(perBarVolume),
    }),
    levels: Object.freeze(computeLevels(daily, model.levelLookback)),
    issues: Object.freeze(log.issues),
  };

  return Object.freeze(result);
}

export interface SpotUniverseOptions extends SpotOptions {
  sector?: string;
}

/** Every symbol but the benchmark, strongest intraday composite first. */
export function spotScanUniverse(
  symbols: readonly string[],
  bars: SpotBars,
  options: SpotUniverseOptions
): SpotUniverseResult {
  const benchmark = options.benchmark.trim().toUpperCase();
  const sector = options.sector?.trim().toUpperCase();
  const results: SpotMetrics[] = [];
  const skipped: ScanIssue[] = [];

  for (const symbol of new Set(symbols.map((s) => s.trim().toUpperCase()))) {
    if (!symbol || symbol === benchmark) continue;
    if (sector && options.sectorMap[symbol] !== sector) continue;
    try {
      results.push(spotScanSymbol(symbol, bars, options));
    } catch (error) {
      if (!(error instanceof DataUnavailableError)) throw error;
      skipped.push({ kind: error.kind, timeframe: error.timeframe, symbol, metric: null, message: error.message });
    }
  }

  results.sort((a, b) =>
    compareByComposite(
      { symbol: a.symbol, compositeScore: a.momentum.composite },
      { symbol: b.symbol, compositeScore: b.momentum.composite }
    )
  );

  if (skipped.length > 0) {
    logger.warn({ skipped: skipped.length }, 'Symbols skipped without daily bars');
  }
  logger.info({ scored: results.length, sector: sector ?? null }, 'Spot scan complete');

  return Object.freeze({ results: Object.freeze(results), skipped: Object.freeze(skipped) });
}

export interface RunSpotOptions {
  provider: BarSeriesProvider;
  symbols: readonly string[];
  benchmark: string;
  sectorMap: SectorMap;
  model: SpotModel;
  pipeline: PipelineConfig;
  sector?: string;
  fetchLookbacks?: Record<Timeframe, number>;
}

export async function runSpot(options: RunSpotOptions): Promise<SpotUniverseResult> {
  const benchmark = options.benchmark.trim().toUpperCase();
  const lookbacks = options.fetchLookbacks ?? DEFAULT_SPOT_FETCH_LOOKBACKS;
  const sector = options.sector?.trim().toUpperCase();
  const symbols = options.symbols
    .map((s) => s.trim().toUpperCase())
    .filter((symbol) => !sector || options.sectorMap[symbol] === sector);
  const requestSymbols = Array.from(new Set([benchmark, ...symbols]));
  const throttler = new RequestThrottler(options.pipeline.throttleMs);
  const bars: Partial<Record<Timeframe, BarsBySymbol>> = {};
  const failures: FetchFailure[] = [];

  for (const timeframe of TIMEFRAMES) {
    const gathered = await gatherBars(options.provider, requestSymbols, timeframe, lookbacks[timeframe], {
      maxConcurrency: options.pipeline.maxConcurrency,
      throttler,
    });
    bars[timeframe] = gathered.bars;
    failures.push(...gathered.failures);
  }

  if (failures.some((f) => f.symbol === benchmark)) {
    logger.warn(
      { benchmark, timeframes: failures.filter((f) => f.symbol === benchmark).map((f) => f.timeframe) },
      'Benchmark bars missing; intraday relative strength unavailable on those timeframes'
    );
  }

  return spotScanUniverse(symbols, bars, {
    benchmark,
    sectorMap: options.sectorMap,
    model: options.model,
    sector: options.sector,
  });
}
