/**
 * Scan engine result types
 */

import type { IssueKind } from '@/core/errors';
import type { ScanTimeframe, Timeframe } from '@/types/bars';

export type MetricName = 'slope' | 'relativeStrength' | 'relativeVolume' | 'volatilityRatio';

export const METRIC_NAMES: readonly MetricName[] = [
  'slope',
  'relativeStrength',
  'relativeVolume',
  'volatilityRatio',
];

/** Raw metric values; null marks an undefined metric. */
export type RawMetricSet = Record<MetricName, number | null>;

/** Cross-sectional z-scores; undefined and degenerate metrics are 0. */
export type NormalizedMetricSet = Record<MetricName, number>;

export interface ScanIssue {
  kind: IssueKind;
  timeframe: Timeframe | null;
  symbol: string | null;
  metric: MetricName | null;
  message: string;
}

export type Bias = -1 | 0 | 1;

export type BiasAlignment = 'bullish' | 'bearish' | 'mixed';

export type MissingTimeframePolicy = 'renormalize' | 'fixed';

export interface TimeframeResult {
  raw: Readonly<RawMetricSet>;
  normalized: Readonly<NormalizedMetricSet>;
  score: number;
}

export interface RankedRow {
  rank: number | null;
  symbol: string;
  sector: string | null;
  compositeScore: number | null;
  timeframes: Readonly<Partial<Record<ScanTimeframe, TimeframeResult>>>;
  timeframeScores: Readonly<Partial<Record<ScanTimeframe, number>>>;
  biases: Readonly<Partial<Record<ScanTimeframe, Bias>>>;
  alignment: BiasAlignment;
  effectiveWeights: Readonly<Partial<Record<ScanTimeframe, number>>>;
  /** Timeframes where this symbol's bars were unavailable. */
  unavailable: readonly ScanTimeframe[];
}

export interface SectorRollup {
  sector: string;
  memberCount: number;
  averageScore: number;
}

export interface DistributionStats {
  /** Symbols with a defined raw value. */
  count: number;
  mean: number;
  stdDev: number;
  degenerate: boolean;
}

export interface RankedUniverse {
  model: string;
  benchmark: string;
  rows: readonly RankedRow[];
  strong: readonly RankedRow[];
  weak: readonly RankedRow[];
  sectors: readonly SectorRollup[];
  scoredTimeframes: readonly ScanTimeframe[];
  fatalTimeframes: readonly ScanTimeframe[];
  distributions: Readonly<Partial<Record<ScanTimeframe, Readonly<Record<MetricName, DistributionStats>>>>>;
  issues: readonly ScanIssue[];
}
