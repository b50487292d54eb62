/**
 * Composite scoring: weighted metric blend per timeframe, then a weighted
 * blend of timeframe scores with the configured missing-timeframe policy.
 */

import type { ComponentWeights } from './scoring_config';
import { METRIC_NAMES, type MissingTimeframePolicy, type NormalizedMetricSet } from './types';

export interface BlendResult<K extends string> {
  score: number | null;
  /** Weight actually applied to each key; 0 for keys without a score. */
  effectiveWeights: Partial<Record<K, number>>;
}

/** Sum of weight x z-score over the four metrics. */
export function scoreTimeframe(normalized: Readonly<NormalizedMetricSet>, weights: Readonly<ComponentWeights>): number {
  let score = 0;
  for (const metric of METRIC_NAMES) {
    score += weights[metric] * normalized[metric];
  }
  return score;
}

/**
 * Blend keyed scores. Keys without a finite score are dropped; under
 * `renormalize` the remaining weights are rescaled to sum to 1, under
 * `fixed` they are applied as configured. No usable score yields null.
 */
export function blendScores<K extends string>(
  scores: Readonly<Partial<Record<K, number>>>,
  weights: Readonly<Record<K, number>>,
  order: readonly K[],
  policy: MissingTimeframePolicy = 'renormalize'
): BlendResult<K> {
  const present = order.filter((key) => {
    const score = scores[key];
    return typeof score === 'number' && Number.isFinite(score) && weights[key] > 0;
  });

  const effectiveWeights: Partial<Record<K, number>> = {};
  for (const key of order) effectiveWeights[key] = 0;

  const totalWeight = present.reduce((sum, key) => sum + weights[key], 0);
  if (present.length === 0 || totalWeight <= 0) {
    return { score: null, effectiveWeights };
  }

  let score = 0;
  for (const key of present) {
    const weight = policy === 'renormalize' ? weights[key] / totalWeight : weights[key];
    effectiveWeights[key] = weight;
    score += weight * (scores[key] ?? 0);
  }

  return { score, effectiveWeights };
}
