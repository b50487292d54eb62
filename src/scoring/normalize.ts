/**
 * Cross-sectional z-score normalization, one timeframe at a time.
 * Each metric is standardized over the symbols that have a defined value;
 * undefined values and degenerate distributions map to 0.
 */

import { ZERO_TOLERANCE, mean, populationStdDev } from './stats';
import {
  METRIC_NAMES,
  type DistributionStats,
  type MetricName,
  type NormalizedMetricSet,
  type RawMetricSet,
} from './types';

export interface ZScoreResult {
  scores: number[];
  stats: DistributionStats;
}

export interface TimeframeNormalization {
  normalized: Map<string, NormalizedMetricSet>;
  stats: Record<MetricName, DistributionStats>;
  degenerate: MetricName[];
}

export function zScores(values: readonly (number | null)[]): ZScoreResult {
  const defined = values.filter((v): v is number => v !== null && Number.isFinite(v));
  if (defined.length === 0) {
    return {
      scores: values.map(() => 0),
      stats: { count: 0, mean: NaN, stdDev: NaN, degenerate: true },
    };
  }

  const center = mean(defined);
  const stdDev = populationStdDev(defined);
  const degenerate = stdDev < ZERO_TOLERANCE;
  return {
    scores: values.map((v) =>
      degenerate || v === null || !Number.isFinite(v) ? 0 : (v - center) / stdDev
    ),
    stats: { count: defined.length, mean: center, stdDev, degenerate },
  };
}

export function normalizeTimeframe(
  rows: readonly { symbol: string; metrics: Readonly<RawMetricSet> }[]
): TimeframeNormalization {
  const normalized = new Map<string, NormalizedMetricSet>();
  for (const row of rows) {
    normalized.set(row.symbol, { slope: 0, relativeStrength: 0, relativeVolume: 0, volatilityRatio: 0 });
  }

  const column = (metric: MetricName) => zScores(rows.map((row) => row.metrics[metric]));
  const results: Record<MetricName, ZScoreResult> = {
    slope: column('slope'),
    relativeStrength: column('relativeStrength'),
    relativeVolume: column('relativeVolume'),
    volatilityRatio: column('volatilityRatio'),
  };

  const degenerate: MetricName[] = [];
  for (const metric of METRIC_NAMES) {
    const result = results[metric];
    if (result.stats.degenerate) degenerate.push(metric);
    rows.forEach((row, i) => {
      const target = normalized.get(row.symbol);
      if (target) target[metric] = result.scores[i];
    });
  }

  const stats: Record<MetricName, DistributionStats> = {
    slope: results.slope.stats,
    relativeStrength: results.relativeStrength.stats,
    relativeVolume: results.relativeVolume.stats,
    volatilityRatio: results.volatilityRatio.stats,
  };

  return { normalized, stats, degenerate };
}
