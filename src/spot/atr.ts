/**
 * Average true range
 */

import { InsufficientDataError } from '@/core/errors';
import { tail } from '@/core/bars';
import type { BarSeries } from '@/types/bars';

export const DEFAULT_ATR_LOOKBACK = 14;

/** max(high - low, |high - prevClose|, |low - prevClose|) */
export function trueRange(high: number, low: number, previousClose: number): number {
  return Math.max(high - low, Math.abs(high - previousClose), Math.abs(low - previousClose));
}

/** Mean of the last `lookback` true ranges; needs lookback + 1 bars. */
export function computeAtr(bars: BarSeries, lookback: number = DEFAULT_ATR_LOOKBACK): number {
  if (bars.length < lookback + 1) {
    throw new InsufficientDataError('ATR', lookback + 1, bars.length);
  }
  const window = tail(bars, lookback + 1);
  let total = 0;
  for (let i = 1; i < window.length; i++) {
    total += trueRange(window[i].high, window[i].low, window[i - 1].close);
  }
  return total / lookback;
}
