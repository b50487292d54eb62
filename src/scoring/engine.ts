/**
 * Scan engine: gather raw metrics per timeframe, normalize across the
 * universe (the barrier), score each timeframe, blend into a composite and
 * rank. `scoreScan` is pure; `runScan` adds bar gathering through a provider.
 */

import { BenchmarkUnavailableError } from '@/core/errors';
import type { SectorMap } from '@/core/universe';
import type { BarSeriesProvider } from '@/providers/types';
import { SCAN_TIMEFRAMES, type BarsBySymbol, type ScanTimeframe } from '@/types/bars';
import { createChildLogger } from '@/utils/logger';
import { RequestThrottler } from '@/utils/throttler';
import { blendScores, scoreTimeframe } from './composite';
import { gatherBars, type FetchFailure } from './fetch';
import { computeRawMetrics } from './metrics';
import { normalizeTimeframe } from './normalize';
import { biasAlignment, rankScores, sectorRollups, signOf } from './ranking';
import type { PipelineConfig, ScoringModel } from './scoring_config';
import { selectBottomK, selectTopK } from './topk';
import type {
  Bias,
  DistributionStats,
  MetricName,
  RankedRow,
  RankedUniverse,
  RawMetricSet,
  ScanIssue,
  TimeframeResult,
} from './types';

const logger = createChildLogger('scan_engine');

export const DEFAULT_TOP_N = 10;

export interface ScanInput {
  universe: readonly string[];
  benchmark: string;
  timeframes: readonly ScanTimeframe[];
  bars: Readonly<Partial<Record<ScanTimeframe, BarsBySymbol>>>;
  sectorMap: SectorMap;
  model: ScoringModel;
  topN?: number;
  /** Fetch failures, recorded as data_unavailable issues with their reason. */
  failures?: readonly FetchFailure[];
}

interface SymbolAccumulator {
  timeframes: Partial<Record<ScanTimeframe, TimeframeResult>>;
  unavailable: ScanTimeframe[];
}

function dedupe(symbols: readonly string[]): string[] {
  return Array.from(new Set(symbols.map((s) => s.trim().toUpperCase()).filter(Boolean)));
}

function orderedTimeframes(timeframes: readonly ScanTimeframe[]): ScanTimeframe[] {
  return SCAN_TIMEFRAMES.filter((tf) => timeframes.includes(tf));
}

export function scoreScan(input: ScanInput): RankedUniverse {
  const { model, sectorMap } = input;
  const benchmark = input.benchmark.trim().toUpperCase();
  const symbols = dedupe(input.universe).filter((symbol) => symbol !== benchmark);
  const timeframes = orderedTimeframes(input.timeframes);
  if (timeframes.length === 0) {
    throw new Error('scan_config_invalid: no timeframes requested');
  }

  const failureReasons = new Map<string, string>();
  for (const failure of input.failures ?? []) {
    failureReasons.set(`${failure.timeframe}:${failure.symbol}`, failure.message);
  }

  const issues: ScanIssue[] = [];
  const scoredTimeframes: ScanTimeframe[] = [];
  const fatalTimeframes: ScanTimeframe[] = [];
  const distributions: Partial<Record<ScanTimeframe, Record<MetricName, DistributionStats>>> = {};
  const accumulators = new Map<string, SymbolAccumulator>(
    symbols.map((symbol) => [symbol, { timeframes: {}, unavailable: [] }])
  );

  for (const timeframe of timeframes) {
    const barsBySymbol = input.bars[timeframe] ?? {};
    const benchmarkBars = barsBySymbol[benchmark];
    if (!benchmarkBars || benchmarkBars.length === 0) {
      const reason = failureReasons.get(`${timeframe}:${benchmark}`) ?? 'no bars';
      issues.push({
        kind: 'benchmark_unavailable',
        timeframe,
        symbol: benchmark,
        metric: null,
        message: `Benchmark ${benchmark} unavailable for ${timeframe}: ${reason}`,
      });
      fatalTimeframes.push(timeframe);
      logger.error({ timeframe, benchmark, reason }, 'Benchmark unavailable, timeframe skipped');
      continue;
    }

    // Phase 1: gather raw metrics for every symbol with bars.
    const gathered: { symbol: string; metrics: RawMetricSet }[] = [];
    for (const symbol of symbols) {
      const series = barsBySymbol[symbol];
      if (!series || series.length === 0) {
        const reason = failureReasons.get(`${timeframe}:${symbol}`) ?? 'no bars';
        issues.push({ kind: 'data_unavailable', timeframe, symbol, metric: null, message: reason });
        accumulators.get(symbol)?.unavailable.push(timeframe);
        continue;
      }

      const { metrics, issues: metricIssues } = computeRawMetrics(series, benchmarkBars, model.lookbacks[timeframe]);
      for (const issue of metricIssues) {
        issues.push({ kind: issue.kind, timeframe, symbol, metric: issue.metric, message: issue.message });
      }
      if (metricIssues.length > 0) {
        logger.debug({ symbol, timeframe, skipped: metricIssues.map((i) => i.metric) }, 'Metrics undefined');
      }
      gathered.push({ symbol, metrics });
    }

    // Phase 2: cross-sectional normalization, only once every symbol is in.
    const { normalized, stats, degenerate } = normalizeTimeframe(gathered);
    distributions[timeframe] = stats;
    for (const metric of degenerate) {
      issues.push({
        kind: 'degenerate_distribution',
        timeframe,
        symbol: null,
        metric,
        message: `${metric} has no spread across ${stats[metric].count} symbols; normalized to 0`,
      });
      logger.warn({ timeframe, metric, count: stats[metric].count }, 'Degenerate metric distribution');
    }

    for (const row of gathered) {
      const z = normalized.get(row.symbol);
      const accumulator = accumulators.get(row.symbol);
      if (!z || !accumulator) continue;
      accumulator.timeframes[timeframe] = Object.freeze({
        raw: Object.freeze({ ...row.metrics }),
        normalized: Object.freeze({ ...z }),
        score: scoreTimeframe(z, model.componentWeights),
      });
    }

    scoredTimeframes.push(timeframe);
    logger.info({ timeframe, scored: gathered.length, universe: symbols.length }, 'Timeframe scored');
  }

  if (scoredTimeframes.length === 0) {
    throw new BenchmarkUnavailableError(benchmark, fatalTimeframes);
  }

  const unranked = symbols.map((symbol) => {
    const accumulator = accumulators.get(symbol) ?? { timeframes: {}, unavailable: [] };
    const timeframeScores: Partial<Record<ScanTimeframe, number>> = {};
    const biases: Partial<Record<ScanTimeframe, Bias>> = {};
    for (const timeframe of scoredTimeframes) {
      const result = accumulator.timeframes[timeframe];
      if (result) {
        timeframeScores[timeframe] = result.score;
        biases[timeframe] = signOf(result.score);
      }
    }

    const blend = blendScores(timeframeScores, model.timeframeWeights, SCAN_TIMEFRAMES, model.missingTimeframePolicy);
    return {
      symbol,
      sector: sectorMap[symbol] ?? null,
      compositeScore: blend.score,
      timeframes: Object.freeze(accumulator.timeframes),
      timeframeScores: Object.freeze(timeframeScores),
      biases: Object.freeze(biases),
      alignment: biasAlignment(timeframeScores, scoredTimeframes),
      effectiveWeights: Object.freeze(blend.effectiveWeights),
      unavailable: Object.freeze([...accumulator.unavailable]),
    };
  });

  const rows: RankedRow[] = rankScores(unranked).map((row) => Object.freeze(row));
  const topN = input.topN ?? DEFAULT_TOP_N;
  const result: RankedUniverse = {
    model: model.name,
    benchmark,
    rows: Object.freeze(rows),
    strong: Object.freeze(selectTopK(rows, topN)),
    weak: Object.freeze(selectBottomK(rows, topN)),
    sectors: Object.freeze(sectorRollups(rows, sectorMap).map((s) => Object.freeze(s))),
    scoredTimeframes: Object.freeze(scoredTimeframes),
    fatalTimeframes: Object.freeze(fatalTimeframes),
    distributions: Object.freeze(distributions),
    issues: Object.freeze(issues.map((issue) => Object.freeze(issue))),
  };

  logger.info(
    {
      model: model.name,
      symbols: symbols.length,
      scored: rows.filter((r) => r.compositeScore !== null).length,
      scoredTimeframes,
      fatalTimeframes,
      issues: issues.length,
    },
    'Scan scored'
  );

  return Object.freeze(result);
}

export function applySymbolLimit(
  symbols: readonly string[],
  maxSymbols?: number | null
): { symbolsToScore: string[]; truncated: boolean } {
  if (!maxSymbols || maxSymbols <= 0 || symbols.length <= maxSymbols) {
    return { symbolsToScore: [...symbols], truncated: false };
  }
  return { symbolsToScore: symbols.slice(0, maxSymbols), truncated: true };
}

export interface RunScanOptions {
  provider: BarSeriesProvider;
  universe: readonly string[];
  benchmark: string;
  timeframes: readonly ScanTimeframe[];
  /** Weeks for 1w, trading days for 1d and 1h. */
  fetchLookbacks: Record<ScanTimeframe, number>;
  sectorMap: SectorMap;
  model: ScoringModel;
  pipeline: PipelineConfig;
  topN?: number;
}

export async function runScan(options: RunScanOptions): Promise<RankedUniverse> {
  const { provider, pipeline } = options;
  const benchmark = options.benchmark.trim().toUpperCase();
  const { symbolsToScore, truncated } = applySymbolLimit(
    dedupe(options.universe).filter((s) => s !== benchmark),
    pipeline.maxSymbolsPerRun
  );
  if (truncated) {
    logger.warn(
      { requested: options.universe.length, limit: pipeline.maxSymbolsPerRun },
      'Universe truncated to pipeline.max_symbols_per_run'
    );
  }

  const throttler = new RequestThrottler(pipeline.throttleMs);
  const requestSymbols = [benchmark, ...symbolsToScore];
  const bars: Partial<Record<ScanTimeframe, BarsBySymbol>> = {};
  const failures: FetchFailure[] = [];
  const timeframes = orderedTimeframes(options.timeframes);

  for (const timeframe of timeframes) {
    const gathered = await gatherBars(provider, requestSymbols, timeframe, options.fetchLookbacks[timeframe], {
      maxConcurrency: pipeline.maxConcurrency,
      throttler,
    });
    bars[timeframe] = gathered.bars;
    failures.push(...gathered.failures);
  }

  logger.info({ provider: provider.name, requests: provider.getRequestCount() }, 'Bar gathering complete');

  return scoreScan({
    universe: symbolsToScore,
    benchmark,
    timeframes,
    bars,
    sectorMap: options.sectorMap,
    model: options.model,
    topN: options.topN,
    failures,
  });
}
