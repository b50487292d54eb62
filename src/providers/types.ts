/**
 * Shared types for bar-series providers.
 *
 * Providers hand the engine normalized series (ascending, duplicate-free)
 * and hide the underlying source (Alpaca HTTP API vs. local CSV files).
 */

import type { BarSeries, BarsBySymbol, Timeframe } from '@/types/bars';

export interface BarBatchFailure {
  symbol: string;
  message: string;
}

export interface BarBatchResult {
  bars: BarsBySymbol;
  failures: BarBatchFailure[];
}

export interface BarSeriesProvider {
  readonly name: string;
  /**
   * Bars covering `lookback` periods: weeks for 1w, trading days otherwise.
   * Rejects with DataUnavailableError when the symbol has no bars.
   */
  getBars(symbol: string, timeframe: Timeframe, lookback: number): Promise<BarSeries>;
  /** Multi-symbol variant; symbols without bars are reported in `failures`. */
  getBarsBatch?(symbols: readonly string[], timeframe: Timeframe, lookback: number): Promise<BarBatchResult>;
  getRequestCount(): number;
  close(): void;
}

export type ProviderType = 'alpaca' | 'csv';

export const PROVIDER_TYPES: readonly ProviderType[] = ['alpaca', 'csv'];

export function isProviderType(value: string): value is ProviderType {
  return PROVIDER_TYPES.some((type) => type === value);
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
