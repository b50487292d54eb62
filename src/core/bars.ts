/**
 * Bar series helpers: ordering, de-duplication and window extraction
 */

import type { Bar, BarSeries } from '@/types/bars';

/**
 * Sort ascending by timestamp and drop duplicate timestamps (last one wins),
 * plus bars whose prices are not finite and positive.
 */
export function normalizeBarSeries(bars: readonly Bar[]): Bar[] {
  const byTimestamp = new Map<number, Bar>();
  for (const bar of bars) {
    const prices = [bar.open, bar.high, bar.low, bar.close];
    if (!Number.isFinite(bar.timestamp) || !prices.every((price) => Number.isFinite(price) && price > 0)) {
      continue;
    }
    byTimestamp.set(bar.timestamp, {
      ...bar,
      volume: Number.isFinite(bar.volume) ? bar.volume : 0,
    });
  }
  return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
}

/** Last `count` items, or all of them when fewer exist. */
export function tail<T>(values: readonly T[], count: number): T[] {
  if (count <= 0) return [];
  return values.slice(Math.max(0, values.length - count));
}

export function closes(bars: BarSeries): number[] {
  return bars.map((bar) => bar.close);
}

export function volumes(bars: BarSeries): number[] {
  return bars.map((bar) => bar.volume);
}
