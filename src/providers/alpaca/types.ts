/**
 * Alpaca market-data v2 response types
 */

import type { Timeframe } from '@/types/bars';

export interface AlpacaBar {
  t: string; // RFC 3339 bar start
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
  n?: number; // Trade count
  vw?: number; // Volume-weighted average price
}

export interface AlpacaBarsResponse {
  bars: Record<string, AlpacaBar[]> | null;
  next_page_token: string | null;
}

export type AlpacaTimeframe = '1Week' | '1Day' | '1Hour' | '15Min' | '5Min';

export const ALPACA_TIMEFRAMES: Record<Timeframe, AlpacaTimeframe> = {
  '1w': '1Week',
  '1d': '1Day',
  '1h': '1Hour',
  '15m': '15Min',
  '5m': '5Min',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAlpacaBar(value: unknown): value is AlpacaBar {
  return (
    isRecord(value) &&
    typeof value.t === 'string' &&
    typeof value.o === 'number' &&
    typeof value.h === 'number' &&
    typeof value.l === 'number' &&
    typeof value.c === 'number' &&
    typeof value.v === 'number'
  );
}

export function isAlpacaBarsResponse(value: unknown): value is AlpacaBarsResponse {
  if (!isRecord(value)) return false;
  const token = value.next_page_token;
  if (token !== null && token !== undefined && typeof token !== 'string') return false;
  const bars = value.bars;
  if (bars === null || bars === undefined) return true;
  return isRecord(bars) && Object.values(bars).every((list) => Array.isArray(list) && list.every(isAlpacaBar));
}
