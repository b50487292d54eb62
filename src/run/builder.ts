/**
 * Record builder
 * Converts engine results into snake_case scan.v1 / spot.v1 records
 */

import { contentHash, shortUuid } from '@/core/seed';
import { formatDate, getScanId } from '@/core/time';
import type { UniverseConfig } from '@/core/config';
import { SCAN_TIMEFRAMES, type ScanTimeframe } from '@/types/bars';
import type { RankedRow, RankedUniverse, RawMetricSet, NormalizedMetricSet, ScanIssue } from '@/scoring/types';
import type { SpotMetrics, SpotUniverseResult } from '@/spot/types';
import type {
  IssueRecord,
  MetricValuesRecord,
  ScanParametersRecord,
  ScanRecordV1,
  ScanRowRecord,
  ScanType,
  SpotMode,
  SpotRecordV1,
  SpotResultRecord,
  TimeframeScoreRecord,
} from '@/types/scan_record';

export interface ScanRecordMeta {
  scanType: ScanType;
  universe: Pick<UniverseConfig, 'name' | 'version'>;
  parameters: ScanParametersRecord;
  scannedAt?: Date;
  uuid?: string;
}

export interface SpotRecordMeta {
  mode: SpotMode;
  model: string;
  benchmark: string;
  parameters: SpotRecordV1['parameters'];
  scannedAt?: Date;
  uuid?: string;
}

function finiteOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function toMetricValues(metrics: Readonly<RawMetricSet> | Readonly<NormalizedMetricSet>): MetricValuesRecord {
  return {
    slope: finiteOrNull(metrics.slope),
    relative_strength: finiteOrNull(metrics.relativeStrength),
    relative_volume: finiteOrNull(metrics.relativeVolume),
    volatility_ratio: finiteOrNull(metrics.volatilityRatio),
  };
}

export function toIssueRecord(issue: ScanIssue): IssueRecord {
  return {
    kind: issue.kind,
    timeframe: issue.timeframe,
    symbol: issue.symbol,
    metric: issue.metric,
    message: issue.message,
  };
}

function toRowRecord(row: RankedRow): ScanRowRecord {
  const timeframes: Partial<Record<ScanTimeframe, TimeframeScoreRecord>> = {};
  const effectiveWeights: Partial<Record<ScanTimeframe, number>> = {};
  for (const timeframe of SCAN_TIMEFRAMES) {
    const result = row.timeframes[timeframe];
    if (result) {
      timeframes[timeframe] = {
        score: result.score,
        bias: row.biases[timeframe] ?? 0,
        raw: toMetricValues(result.raw),
        z: toMetricValues(result.normalized),
      };
    }
    const weight = row.effectiveWeights[timeframe];
    if (weight !== undefined) effectiveWeights[timeframe] = weight;
  }

  return {
    rank: row.rank,
    symbol: row.symbol,
    sector: row.sector,
    composite_score: finiteOrNull(row.compositeScore),
    alignment: row.alignment,
    timeframes,
    effective_weights: effectiveWeights,
    unavailable: [...row.unavailable],
  };
}

export function buildScanRecord(ranked: RankedUniverse, meta: ScanRecordMeta): ScanRecordV1 {
  const scannedAt = meta.scannedAt ?? new Date();
  const body: Omit<ScanRecordV1, 'content_hash'> = {
    schema_version: 'scan.v1',
    scan_id: getScanId(scannedAt, meta.uuid ?? shortUuid()),
    scan_type: meta.scanType,
    scanned_at: scannedAt.toISOString(),
    scan_date: formatDate(scannedAt),
    model: ranked.model,
    benchmark: ranked.benchmark,
    universe: {
      name: meta.universe.name,
      version: meta.universe.version,
      symbol_count: ranked.rows.length,
    },
    parameters: meta.parameters,
    scored_timeframes: [...ranked.scoredTimeframes],
    fatal_timeframes: [...ranked.fatalTimeframes],
    rows: ranked.rows.map(toRowRecord),
    watchlists: {
      strong: ranked.strong.map((row) => row.symbol),
      weak: ranked.weak.map((row) => row.symbol),
    },
    sectors: ranked.sectors.map((s) => ({
      sector: s.sector,
      member_count: s.memberCount,
      average_score: s.averageScore,
    })),
    issues: ranked.issues.map(toIssueRecord),
  };

  return { ...body, content_hash: contentHash(body) };
}

function toSpotResultRecord(result: SpotMetrics): SpotResultRecord {
  const { momentum, levels } = result;
  return {
    symbol: result.symbol,
    sector: result.sector,
    composite: finiteOrNull(momentum.composite),
    bias: momentum.bias,
    aligned: momentum.aligned,
    relative_strength: { ...momentum.relativeStrength },
    atr: { ...result.atr },
    range_consumed: { daily: result.rangeConsumed.daily, weekly: result.rangeConsumed.weekly },
    relative_volume: {
      session: result.relativeVolume.session,
      daily: result.relativeVolume.daily,
      by_timeframe: { ...result.relativeVolume.byTimeframe },
    },
    levels: {
      price: levels.price,
      daily_high: levels.dailyHigh,
      daily_low: levels.dailyLow,
      high_20d: levels.high20d,
      low_20d: levels.low20d,
      pct_from_daily_high: levels.pctFromDailyHigh,
      pct_from_daily_low: levels.pctFromDailyLow,
      pct_from_20d_high: levels.pctFrom20dHigh,
      pct_from_20d_low: levels.pctFrom20dLow,
    },
    issues: result.issues.map(toIssueRecord),
  };
}

export function buildSpotRecord(spot: SpotUniverseResult, meta: SpotRecordMeta): SpotRecordV1 {
  const scannedAt = meta.scannedAt ?? new Date();
  const body: Omit<SpotRecordV1, 'content_hash'> = {
    schema_version: 'spot.v1',
    scan_id: getScanId(scannedAt, meta.uuid ?? shortUuid()),
    mode: meta.mode,
    scanned_at: scannedAt.toISOString(),
    model: meta.model,
    benchmark: meta.benchmark,
    parameters: meta.parameters,
    results: spot.results.map(toSpotResultRecord),
    skipped: spot.skipped.map(toIssueRecord),
  };

  return { ...body, content_hash: contentHash(body) };
}
