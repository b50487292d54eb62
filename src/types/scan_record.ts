/**
 * On-disk scan and spot records (snake_case), described by
 * schemas/scan.v1.schema.json and schemas/spot.v1.schema.json
 */

import type { IssueKind } from '@/core/errors';
import type { BiasAlignment } from '@/scoring/types';
import type { ScanTimeframe, SpotTimeframe, Timeframe } from './bars';

export type ScanType = 'stock' | 'sector';

export interface MetricValuesRecord {
  slope: number | null;
  relative_strength: number | null;
  relative_volume: number | null;
  volatility_ratio: number | null;
}

export interface TimeframeScoreRecord {
  score: number;
  bias: -1 | 0 | 1;
  raw: MetricValuesRecord;
  z: MetricValuesRecord;
}

export interface ScanRowRecord {
  rank: number | null;
  symbol: string;
  sector: string | null;
  composite_score: number | null;
  alignment: BiasAlignment;
  timeframes: Partial<Record<ScanTimeframe, TimeframeScoreRecord>>;
  effective_weights: Partial<Record<ScanTimeframe, number>>;
  unavailable: ScanTimeframe[];
}

export interface IssueRecord {
  kind: IssueKind;
  timeframe: Timeframe | null;
  symbol: string | null;
  metric: string | null;
  message: string;
}

export interface SectorRollupRecord {
  sector: string;
  member_count: number;
  average_score: number;
}

export interface ScanParametersRecord {
  top_n: number;
  timeframes: ScanTimeframe[];
  /** Weeks for 1w, trading days otherwise. */
  fetch_lookbacks: Partial<Record<ScanTimeframe, number>>;
  sector_filter: string | null;
  provider: string;
}

export interface ScanRecordV1 {
  schema_version: 'scan.v1';
  scan_id: string;
  scan_type: ScanType;
  scanned_at: string;
  scan_date: string;
  model: string;
  benchmark: string;
  universe: {
    name: string;
    version: string;
    symbol_count: number;
  };
  parameters: ScanParametersRecord;
  scored_timeframes: ScanTimeframe[];
  fatal_timeframes: ScanTimeframe[];
  rows: ScanRowRecord[];
  watchlists: {
    strong: string[];
    weak: string[];
  };
  sectors: SectorRollupRecord[];
  issues: IssueRecord[];
  content_hash: string;
}

export interface SpotResultRecord {
  symbol: string;
  sector: string | null;
  composite: number | null;
  bias: -1 | 0 | 1;
  aligned: boolean;
  relative_strength: Record<SpotTimeframe, number | null>;
  atr: Record<Timeframe, number | null>;
  range_consumed: {
    daily: number | null;
    weekly: number | null;
  };
  relative_volume: {
    session: number | null;
    daily: number | null;
    by_timeframe: Record<SpotTimeframe, number | null>;
  };
  levels: {
    price: number | null;
    daily_high: number | null;
    daily_low: number | null;
    high_20d: number | null;
    low_20d: number | null;
    pct_from_daily_high: number | null;
    pct_from_daily_low: number | null;
    pct_from_20d_high: number | null;
    pct_from_20d_low: number | null;
  };
  issues: IssueRecord[];
}

export type SpotMode = 'universe' | 'symbol';

export interface SpotRecordV1 {
  schema_version: 'spot.v1';
  scan_id: string;
  mode: SpotMode;
  scanned_at: string;
  model: string;
  benchmark: string;
  parameters: {
    symbol: string | null;
    sector_filter: string | null;
    provider: string;
  };
  results: SpotResultRecord[];
  skipped: IssueRecord[];
  content_hash: string;
}
