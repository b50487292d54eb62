/**
 * Intraday relative volume
 */

import { UndefinedMetricError, InsufficientDataError } from '@/core/errors';
import { EXCHANGE_TIME_ZONE, sessionClock } from '@/core/time';
import { mean } from '@/scoring/stats';
import type { BarSeries } from '@/types/bars';

export const DEFAULT_SESSION_LOOKBACK = 10;

export interface SessionVolumeOptions {
  maxSessions?: number;
  timeZone?: string;
}

/**
 * Cumulative volume of the latest session up to the latest bar's time of day,
 * over the average cumulative volume of up to `maxSessions` earlier sessions
 * up to the same time of day. Sessions are exchange-local calendar days.
 */
export function computeSessionRelativeVolume(bars: BarSeries, options: SessionVolumeOptions = {}): number {
  const maxSessions = options.maxSessions ?? DEFAULT_SESSION_LOOKBACK;
  const timeZone = options.timeZone ?? EXCHANGE_TIME_ZONE;
  if (bars.length === 0) {
    throw new InsufficientDataError('session relative volume', 1, 0);
  }

  const cumulative = new Map<string, number>();
  const clocks = bars.map((bar) => sessionClock(bar.timestamp, timeZone));
  const cutoff = clocks[clocks.length - 1];

  bars.forEach((bar, i) => {
    const clock = clocks[i];
    if (!cumulative.has(clock.session)) cumulative.set(clock.session, 0);
    if (clock.time <= cutoff.time) {
      cumulative.set(clock.session, (cumulative.get(clock.session) ?? 0) + bar.volume);
    }
  });

  const current = cumulative.get(cutoff.session) ?? 0;
  const previous = [...cumulative.keys()]
    .filter((session) => session < cutoff.session)
    .sort()
    .slice(-maxSessions)
    .map((session) => cumulative.get(session) ?? 0);

  if (previous.length === 0) {
    throw new InsufficientDataError('session relative volume', 2, 1);
  }
  const average = mean(previous);
  if (!(average > 0)) {
    throw new UndefinedMetricError('session relative volume', 'prior sessions have no volume by this time');
  }
  return current / average;
}
