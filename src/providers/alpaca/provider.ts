import { chunk } from '@/utils/chunk';
import { normalizeBarSeries } from '@/core/bars';
import { DataUnavailableError } from '@/core/errors';
import { getEnvConfig } from '@/core/env';
import { lookbackWindow } from '@/core/time';
import type { Bar, BarSeries, BarsBySymbol, Timeframe } from '@/types/bars';
import { createChildLogger } from '@/utils/logger';
import { ProviderError, type BarBatchFailure, type BarBatchResult, type BarSeriesProvider } from '../types';
import { AlpacaClient } from './client';
import { ALPACA_TIMEFRAMES, type AlpacaBar } from './types';

const logger = createChildLogger('alpaca_provider');

/** Symbols per multi-symbol request. */
export const SYMBOLS_PER_REQUEST = 200;

export function toBar(raw: AlpacaBar): Bar {
  return {
    timestamp: Date.parse(raw.t),
    open: raw.o,
    high: raw.h,
    low: raw.l,
    close: raw.c,
    volume: raw.v,
  };
}

function describeFailure(error: unknown): string {
  if (error instanceof ProviderError && error.cause) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

function createDefaultClient(): AlpacaClient {
  const env = getEnvConfig();
  if (!env.alpacaApiKey || !env.alpacaSecretKey) {
    throw new Error('ALPACA_API_KEY and ALPACA_SECRET_KEY environment variables are required');
  }
  return new AlpacaClient({ keyId: env.alpacaApiKey, secretKey: env.alpacaSecretKey }, { feed: env.alpacaFeed });
}

export class AlpacaProvider implements BarSeriesProvider {
  readonly name = 'alpaca';
  private readonly client: AlpacaClient;
  private readonly now: () => Date;

  constructor(client?: AlpacaClient, now: () => Date = () => new Date()) {
    this.client = client ?? createDefaultClient();
    this.now = now;
  }

  async getBarsBatch(symbols: readonly string[], timeframe: Timeframe, lookback: number): Promise<BarBatchResult> {
    const { start, end } = lookbackWindow(timeframe, lookback, this.now());
    const bars: BarsBySymbol = {};
    const failures: BarBatchFailure[] = [];

    for (const group of chunk(symbols, SYMBOLS_PER_REQUEST)) {
      let raw: Record<string, AlpacaBar[]>;
      try {
        raw = await this.client.fetchBars({
          symbols: group,
          timeframe: ALPACA_TIMEFRAMES[timeframe],
          start,
          end,
        });
      } catch (error) {
        // A failed request only costs its own group.
        const message = describeFailure(error);
        logger.warn({ timeframe, symbols: group.length, error: message }, 'Bars request failed, skipping group');
        for (const symbol of group) failures.push({ symbol, message });
        continue;
      }
      for (const symbol of group) {
        const series = normalizeBarSeries((raw[symbol] ?? []).map(toBar));
        if (series.length > 0) {
          bars[symbol] = series;
        } else {
          failures.push({ symbol, message: `no ${timeframe} bars from alpaca` });
        }
      }
    }

    return { bars, failures };
  }

  async getBars(symbol: string, timeframe: Timeframe, lookback: number): Promise<BarSeries> {
    const { bars, failures } = await this.getBarsBatch([symbol], timeframe, lookback);
    const series = bars[symbol];
    if (!series || series.length === 0) {
      throw new DataUnavailableError(symbol, timeframe, failures[0]?.message ?? 'no bars from alpaca');
    }
    return series;
  }

  getRequestCount(): number {
    return this.client.getRequestCount();
  }

  close(): void {
    // HTTP client holds no persistent connections
  }
}
