/**
 * Scoring model loader: named weight/lookback records from config/scoring.json
 * merged over the built-in v1.3 model.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import type { ScanTimeframe, SpotTimeframe } from '@/types/bars';
import type { MetricName, MissingTimeframePolicy } from './types';

export type ComponentWeights = Record<MetricName, number>;
export type MetricLookbacks = Record<MetricName, number>;
export type TimeframeWeights = Record<ScanTimeframe, number>;
export type SpotWeights = Record<SpotTimeframe, number>;

export interface SpotModel {
  timeframeWeights: SpotWeights;
  rsLookbacks: Record<SpotTimeframe, number>;
  atrLookback: number;
  sessionLookback: number;
  dailyVolumeLookback: number;
  levelLookback: number;
  timeZone: string;
}

export interface ScoringModel {
  name: string;
  description: string;
  componentWeights: ComponentWeights;
  timeframeWeights: TimeframeWeights;
  missingTimeframePolicy: MissingTimeframePolicy;
  lookbacks: Record<ScanTimeframe, MetricLookbacks>;
  spot: SpotModel;
}

export interface PipelineConfig {
  maxConcurrency: number;
  throttleMs: number;
  maxSymbolsPerRun: number | null;
}

export interface ScoringConfig {
  model: ScoringModel;
  pipeline: PipelineConfig;
  availableModels: string[];
}

export const DEFAULT_MODEL_NAME = 'v1.3';

export const DEFAULT_MODEL: ScoringModel = {
  name: DEFAULT_MODEL_NAME,
  description: 'Three-timeframe z-score relative strength',
  componentWeights: {
    slope: 0.35,
    relativeStrength: 0.35,
    relativeVolume: 0.15,
    volatilityRatio: 0.15,
  },
  timeframeWeights: {
    '1w': 0.4,
    '1d': 0.35,
    '1h': 0.25,
  },
  missingTimeframePolicy: 'renormalize',
  lookbacks: {
    '1w': { slope: 4, relativeStrength: 4, relativeVolume: 4, volatilityRatio: 4 },
    '1d': { slope: 5, relativeStrength: 10, relativeVolume: 10, volatilityRatio: 10 },
    '1h': { slope: 10, relativeStrength: 20, relativeVolume: 20, volatilityRatio: 20 },
  },
  spot: {
    timeframeWeights: { '1h': 0.5, '15m': 0.3, '5m': 0.2 },
    rsLookbacks: { '1h': 10, '15m': 16, '5m': 12 },
    atrLookback: 14,
    sessionLookback: 10,
    dailyVolumeLookback: 20,
    levelLookback: 20,
    timeZone: 'America/New_York',
  },
};

const DEFAULT_PIPELINE: PipelineConfig = {
  maxConcurrency: 4,
  throttleMs: 0,
  maxSymbolsPerRun: null,
};

interface RawMetricRecord {
  slope?: number;
  relative_strength?: number;
  relative_volume?: number;
  volatility_ratio?: number;
}

interface RawScoringModel {
  description?: string;
  component_weights?: RawMetricRecord;
  timeframe_weights?: Partial<Record<ScanTimeframe, number>>;
  missing_timeframe_policy?: string;
  lookbacks?: Partial<Record<ScanTimeframe, RawMetricRecord>>;
  spot?: {
    timeframe_weights?: Partial<Record<SpotTimeframe, number>>;
    rs_lookbacks?: Partial<Record<SpotTimeframe, number>>;
    atr_lookback?: number;
    session_lookback?: number;
    daily_volume_lookback?: number;
    level_lookback?: number;
    time_zone?: string;
  };
}

interface RawScoringConfig {
  active_model?: string;
  models?: Record<string, RawScoringModel>;
  pipeline?: {
    max_concurrency?: number;
    throttle_ms?: number;
    max_symbols_per_run?: number | null;
  };
}

function loadRawConfig(projectRoot: string): RawScoringConfig | null {
  const path = join(projectRoot, 'config', 'scoring.json');
  if (!existsSync(path)) {
    return null;
  }

  let parsed: RawScoringConfig;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    throw new Error(`scoring_config_invalid_json: ${path}`);
  }
  return parsed;
}

function positive(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function positiveInt(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function mergeMetricRecord(
  base: Record<MetricName, number>,
  override: RawMetricRecord | undefined,
  read: (value: number | undefined, fallback: number) => number
): Record<MetricName, number> {
  if (!override) return base;
  return {
    slope: read(override.slope, base.slope),
    relativeStrength: read(override.relative_strength, base.relativeStrength),
    relativeVolume: read(override.relative_volume, base.relativeVolume),
    volatilityRatio: read(override.volatility_ratio, base.volatilityRatio),
  };
}

function mergeTimeframeWeights(
  base: TimeframeWeights,
  override?: Partial<Record<ScanTimeframe, number>>
): TimeframeWeights {
  if (!override) return base;
  return {
    '1w': positive(override['1w'], base['1w']),
    '1d': positive(override['1d'], base['1d']),
    '1h': positive(override['1h'], base['1h']),
  };
}

function mergeSpotRecord(
  base: Record<SpotTimeframe, number>,
  override: Partial<Record<SpotTimeframe, number>> | undefined,
  read: (value: number | undefined, fallback: number) => number
): Record<SpotTimeframe, number> {
  if (!override) return base;
  return {
    '1h': read(override['1h'], base['1h']),
    '15m': read(override['15m'], base['15m']),
    '5m': read(override['5m'], base['5m']),
  };
}

function mergeSpot(base: SpotModel, override?: RawScoringModel['spot']): SpotModel {
  if (!override) return base;
  return {
    timeframeWeights: normalizeWeights(mergeSpotRecord(base.timeframeWeights, override.timeframe_weights, positive)),
    rsLookbacks: mergeSpotRecord(base.rsLookbacks, override.rs_lookbacks, positiveInt),
    atrLookback: positiveInt(override.atr_lookback, base.atrLookback),
    sessionLookback: positiveInt(override.session_lookback, base.sessionLookback),
    dailyVolumeLookback: positiveInt(override.daily_volume_lookback, base.dailyVolumeLookback),
    levelLookback: positiveInt(override.level_lookback, base.levelLookback),
    timeZone: override.time_zone?.trim() || base.timeZone,
  };
}

/** Scale weights to sum to 1; an all-zero record falls back to equal weights. */
export function normalizeWeights<K extends string>(weights: Record<K, number>): Record<K, number> {
  const keys = Object.keys(weights).filter((key): key is K => key in weights);
  const total = keys.reduce((sum, key) => sum + weights[key], 0);
  const result = { ...weights };
  for (const key of keys) {
    result[key] = total > 0 ? weights[key] / total : 1 / keys.length;
  }
  return result;
}

function parsePolicy(raw: string | undefined, fallback: MissingTimeframePolicy): MissingTimeframePolicy {
  if (raw === undefined) return fallback;
  if (raw === 'renormalize' || raw === 'fixed') return raw;
  throw new Error(`scoring_config_invalid: missing_timeframe_policy "${raw}" (expected renormalize | fixed)`);
}

export function mergeModel(name: string, base: ScoringModel, raw: RawScoringModel): ScoringModel {
  const lookbacks = raw.lookbacks;
  return {
    name,
    description: raw.description ?? base.description,
    componentWeights: normalizeWeights(mergeMetricRecord(base.componentWeights, raw.component_weights, positive)),
    timeframeWeights: normalizeWeights(mergeTimeframeWeights(base.timeframeWeights, raw.timeframe_weights)),
    missingTimeframePolicy: parsePolicy(raw.missing_timeframe_policy, base.missingTimeframePolicy),
    lookbacks: {
      '1w': mergeMetricRecord(base.lookbacks['1w'], lookbacks?.['1w'], positiveInt),
      '1d': mergeMetricRecord(base.lookbacks['1d'], lookbacks?.['1d'], positiveInt),
      '1h': mergeMetricRecord(base.lookbacks['1h'], lookbacks?.['1h'], positiveInt),
    },
    spot: mergeSpot(base.spot, raw.spot),
  };
}

function mergePipeline(base: PipelineConfig, override?: RawScoringConfig['pipeline']): PipelineConfig {
  if (!override) return base;
  return {
    maxConcurrency: positiveInt(override.max_concurrency, base.maxConcurrency),
    throttleMs: positive(override.throttle_ms, base.throttleMs),
    maxSymbolsPerRun: symbolLimit(override.max_symbols_per_run, base.maxSymbolsPerRun),
  };
}

/** null in the file lifts the limit; anything but a positive integer keeps the default. */
function symbolLimit(value: number | null | undefined, fallback: number | null): number | null {
  if (value === null) return null;
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

/**
 * Resolve the scoring model: explicit name, then SCORING_MODEL, then the
 * file's active_model, then v1.3. Every model is merged over v1.3.
 */
export function getScoringConfig(modelName?: string): ScoringConfig {
  const raw = loadRawConfig(process.cwd());
  const models = raw?.models ?? {};
  const requested =
    modelName?.trim() || process.env.SCORING_MODEL?.trim() || raw?.active_model?.trim() || DEFAULT_MODEL_NAME;

  const availableModels = Array.from(new Set([DEFAULT_MODEL_NAME, ...Object.keys(models)])).sort();
  if (!availableModels.includes(requested)) {
    throw new Error(`model_not_found: ${requested} (available: ${availableModels.join(', ')})`);
  }

  const base = models[DEFAULT_MODEL_NAME]
    ? mergeModel(DEFAULT_MODEL_NAME, DEFAULT_MODEL, models[DEFAULT_MODEL_NAME])
    : DEFAULT_MODEL;
  const model = requested === DEFAULT_MODEL_NAME ? base : mergeModel(requested, base, models[requested]);

  return {
    model,
    pipeline: mergePipeline(DEFAULT_PIPELINE, raw?.pipeline),
    availableModels,
  };
}
