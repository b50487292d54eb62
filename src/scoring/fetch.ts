/**
 * Bar gathering for one timeframe: batch request when the provider supports
 * it, otherwise a bounded per-symbol worker pool behind the request throttler.
 * Per-symbol failures are collected, never thrown.
 */

import { normalizeBarSeries } from '@/core/bars';
import type { BarSeriesProvider } from '@/providers/types';
import type { BarsBySymbol, Timeframe } from '@/types/bars';
import { createChildLogger } from '@/utils/logger';
import { RequestThrottler } from '@/utils/throttler';

const logger = createChildLogger('bar_fetch');

export interface FetchFailure {
  symbol: string;
  timeframe: Timeframe;
  message: string;
}

export interface GatheredBars {
  bars: BarsBySymbol;
  failures: FetchFailure[];
}

export interface GatherOptions {
  maxConcurrency?: number;
  throttler?: RequestThrottler;
}

export async function runWithConcurrency<T>(
  items: readonly T[],
  worker: (item: T) => Promise<void>,
  concurrency: number
): Promise<void> {
  let index = 0;
  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (index < items.length) {
      const current = items[index];
      index += 1;
      await worker(current);
    }
  });

  await Promise.all(workers);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function gatherBars(
  provider: BarSeriesProvider,
  symbols: readonly string[],
  timeframe: Timeframe,
  lookback: number,
  options: GatherOptions = {}
): Promise<GatheredBars> {
  const throttler = options.throttler ?? new RequestThrottler(0);
  const bars: BarsBySymbol = {};
  const failures: FetchFailure[] = [];

  const getBarsBatch = provider.getBarsBatch?.bind(provider);
  if (getBarsBatch) {
    try {
      const batch = await throttler.schedule(() => getBarsBatch(symbols, timeframe, lookback));
      for (const symbol of symbols) {
        const series = normalizeBarSeries(batch.bars[symbol] ?? []);
        if (series.length > 0) {
          bars[symbol] = series;
        } else {
          const reported = batch.failures.find((f) => f.symbol === symbol);
          failures.push({ symbol, timeframe, message: reported?.message ?? 'no bars returned' });
        }
      }
    } catch (error) {
      logger.error({ provider: provider.name, timeframe, error: describe(error) }, 'Batch bar request failed');
      for (const symbol of symbols) {
        failures.push({ symbol, timeframe, message: describe(error) });
      }
    }
  } else {
    await runWithConcurrency(
      symbols,
      async (symbol) => {
        try {
          const series = normalizeBarSeries(
            await throttler.schedule(() => provider.getBars(symbol, timeframe, lookback))
          );
          if (series.length > 0) {
            bars[symbol] = series;
          } else {
            failures.push({ symbol, timeframe, message: 'no bars returned' });
          }
        } catch (error) {
          failures.push({ symbol, timeframe, message: describe(error) });
        }
      },
      options.maxConcurrency ?? 4
    );
  }

  failures.sort((a, b) => a.symbol.localeCompare(b.symbol));
  if (failures.length > 0) {
    logger.warn(
      { timeframe, failed: failures.length, requested: symbols.length },
      'Bars unavailable for some symbols'
    );
  }
  logger.debug({ timeframe, received: Object.keys(bars).length }, 'Bars gathered');

  return { bars, failures };
}
