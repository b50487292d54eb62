import { getEnvConfig } from '@/core/env';
import type { BarSeriesProvider, ProviderType } from './types';
import { AlpacaProvider } from './alpaca/provider';
import { CsvBarProvider } from './csv_provider';

/**
 * Create the bar provider named by the argument or BAR_PROVIDER.
 *
 * ENV:
 * - BAR_PROVIDER: 'alpaca' | 'csv' (default 'alpaca')
 * - BARS_DIR: root for the csv provider
 */
export function createProvider(providerType?: ProviderType): BarSeriesProvider {
  const type = providerType ?? getEnvConfig().barProvider;

  switch (type) {
    case 'alpaca':
      return new AlpacaProvider();
    case 'csv':
      return new CsvBarProvider(process.env.BARS_DIR);
    default: {
      const unknown: never = type;
      throw new Error(`Unknown provider type: ${String(unknown)}`);
    }
  }
}
