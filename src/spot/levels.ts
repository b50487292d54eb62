/**
 * Price distance from the session and 20-day extremes
 */

import { tail } from '@/core/bars';
import type { BarSeries } from '@/types/bars';
import type { SpotLevels } from './types';

export const DEFAULT_LEVEL_LOOKBACK = 20;

/** Signed percent of price: positive when price is above the level. */
export function percentFromLevel(price: number, level: number): number | null {
  if (!(price > 0) || !Number.isFinite(level)) return null;
  return ((price - level) / price) * 100;
}

export function computeLevels(dailyBars: BarSeries, lookback: number = DEFAULT_LEVEL_LOOKBACK): SpotLevels {
  const latest = dailyBars.length > 0 ? dailyBars[dailyBars.length - 1] : null;
  if (!latest) {
    return {
      price: null,
      dailyHigh: null,
      dailyLow: null,
      high20d: null,
      low20d: null,
      pctFromDailyHigh: null,
      pctFromDailyLow: null,
      pctFrom20dHigh: null,
      pctFrom20dLow: null,
    };
  }

  const recent = tail(dailyBars, lookback);
  const price = latest.close;
  const high20d = Math.max(...recent.map((bar) => bar.high));
  const low20d = Math.min(...recent.map((bar) => bar.low));

  return {
    price,
    dailyHigh: latest.high,
    dailyLow: latest.low,
    high20d,
    low20d,
    pctFromDailyHigh: percentFromLevel(price, latest.high),
    pctFromDailyLow: percentFromLevel(price, latest.low),
    pctFrom20dHigh: percentFromLevel(price, high20d),
    pctFrom20dLow: percentFromLevel(price, low20d),
  };
}
