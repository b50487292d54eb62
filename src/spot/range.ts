/**
 * Range consumed: how much of the expected (ATR) move a bar has already made.
 */

import { UndefinedMetricError } from '@/core/errors';
import type { Bar } from '@/types/bars';

/**
 * Up bars (close >= open) measure close - low, down bars high - close
 * (negated), as a percentage of ATR.
 */
export function computeRangeConsumed(bar: Bar, atr: number): number {
  if (!(atr > 0)) {
    throw new UndefinedMetricError('range consumed', 'ATR is zero');
  }
  if (bar.close >= bar.open) {
    return ((bar.close - bar.low) / atr) * 100;
  }
  return (-(bar.high - bar.close) / atr) * 100;
}
