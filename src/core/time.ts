/**
 * Time utilities: scan identifiers, request windows and exchange-session keys
 */

import { subDays, subWeeks } from 'date-fns';
import type { Timeframe } from '@/types/bars';

export const EXCHANGE_TIME_ZONE = 'America/New_York';

/** Calendar days requested per trading day so weekends and holidays are covered. */
const CALENDAR_DAYS_PER_TRADING_DAY = 1.5;

/** `yyyy-MM-dd` of the exchange session the instant falls in. */
export function formatDate(date: Date): string {
  return sessionClock(date.getTime()).session;
}

/** `yyyyMMdd_HHmmss` in UTC. */
export function formatScanTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

export function getScanId(date: Date, hash: string): string {
  return `${formatScanTimestamp(date)}_${hash.substring(0, 8)}`;
}

export interface RequestWindow {
  start: Date;
  end: Date;
}

/**
 * Calendar window that covers `lookback` periods of the timeframe.
 * Weekly lookbacks are in weeks, every other timeframe's in trading days.
 */
export function lookbackWindow(timeframe: Timeframe, lookback: number, end: Date = new Date()): RequestWindow {
  if (timeframe === '1w') {
    return { start: subWeeks(end, lookback), end };
  }
  const calendarDays = Math.ceil(lookback * CALENDAR_DAYS_PER_TRADING_DAY);
  return { start: subDays(end, calendarDays), end };
}

export interface SessionClock {
  /** `yyyy-MM-dd` of the exchange session. */
  session: string;
  /** `HH:mm` exchange-local time of day. */
  time: string;
}

const sessionFormatters = new Map<string, Intl.DateTimeFormat>();

function sessionFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = sessionFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    sessionFormatters.set(timeZone, formatter);
  }
  return formatter;
}

/** Exchange-local session date and time of day for an epoch-ms timestamp. */
export function sessionClock(timestamp: number, timeZone: string = EXCHANGE_TIME_ZONE): SessionClock {
  const parts: Record<string, string> = {};
  for (const part of sessionFormatter(timeZone).formatToParts(new Date(timestamp))) {
    parts[part.type] = part.value;
  }
  return {
    session: `${parts.year}-${parts.month}-${parts.day}`,
    time: `${parts.hour}:${parts.minute}`,
  };
}
