/**
 * OHLCV bar model shared by providers, the scan engine and the spot engine
 */

export type Timeframe = '1w' | '1d' | '1h' | '15m' | '5m';

/** Timeframes blended into the scan composite. */
export type ScanTimeframe = '1w' | '1d' | '1h';

/** Timeframes blended into the intraday spot composite. */
export type SpotTimeframe = '1h' | '15m' | '5m';

export const TIMEFRAMES: readonly Timeframe[] = ['1w', '1d', '1h', '15m', '5m'];
export const SCAN_TIMEFRAMES: readonly ScanTimeframe[] = ['1w', '1d', '1h'];
export const SPOT_TIMEFRAMES: readonly SpotTimeframe[] = ['1h', '15m', '5m'];

export interface Bar {
  /** Bar open time, epoch milliseconds (UTC). */
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Chronologically ascending, duplicate-free bars. */
export type BarSeries = readonly Bar[];

export type BarsBySymbol = Record<string, BarSeries>;
