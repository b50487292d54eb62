/**
 * Spot (intraday) scanner result types
 */

import type { Bias, ScanIssue } from '@/scoring/types';
import type { SpotTimeframe, Timeframe } from '@/types/bars';

export interface SpotMomentum {
  relativeStrength: Readonly<Record<SpotTimeframe, number | null>>;
  composite: number | null;
  effectiveWeights: Readonly<Partial<Record<SpotTimeframe, number>>>;
  bias: Bias;
  /** Every available timeframe's relative strength shares one non-zero sign. */
  aligned: boolean;
}

export interface SpotRangeConsumed {
  /** Signed percent of the daily ATR already travelled by the latest daily bar. */
  daily: number | null;
  weekly: number | null;
}

export interface SpotRelativeVolume {
  /** Cumulative session volume against prior sessions at the same time of day. */
  session: number | null;
  daily: number | null;
  byTimeframe: Readonly<Record<SpotTimeframe, number | null>>;
}

export interface SpotLevels {
  price: number | null;
  dailyHigh: number | null;
  dailyLow: number | null;
  high20d: number | null;
  low20d: number | null;
  pctFromDailyHigh: number | null;
  pctFromDailyLow: number | null;
  pctFrom20dHigh: number | null;
  pctFrom20dLow: number | null;
}

export interface SpotMetrics {
  symbol: string;
  sector: string | null;
  momentum: SpotMomentum;
  atr: Readonly<Record<Timeframe, number | null>>;
  rangeConsumed: SpotRangeConsumed;
  relativeVolume: SpotRelativeVolume;
  levels: SpotLevels;
  issues: readonly ScanIssue[];
}

export interface SpotUniverseResult {
  results: readonly SpotMetrics[];
  skipped: readonly ScanIssue[];
}
