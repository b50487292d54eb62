/**
 * Environment variable handling with validation
 * Broker credentials are never logged or exposed
 */

import type { ProviderType } from '@/providers/types';

export type AlpacaFeed = 'iex' | 'sip';

export interface EnvConfig {
  barProvider: ProviderType;
  alpacaApiKey: string | null;
  alpacaSecretKey: string | null;
  alpacaFeed: AlpacaFeed;
  barsDir: string | null;
  dbPath: string | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
}

const LOG_LEVELS: readonly EnvConfig['logLevel'][] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function pick<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  const barProvider = pick<ProviderType>(getEnvVar('BAR_PROVIDER'), ['alpaca', 'csv'], 'alpaca');
  const alpacaApiKey = getEnvVar('ALPACA_API_KEY') ?? null;
  const alpacaSecretKey = getEnvVar('ALPACA_SECRET_KEY') ?? null;

  if (barProvider === 'alpaca' && (!alpacaApiKey || !alpacaSecretKey)) {
    throw new Error(
      'Missing required environment variable: ALPACA_API_KEY and ALPACA_SECRET_KEY must both be set when BAR_PROVIDER=alpaca'
    );
  }

  return {
    barProvider,
    alpacaApiKey,
    alpacaSecretKey,
    alpacaFeed: pick<AlpacaFeed>(getEnvVar('ALPACA_FEED'), ['iex', 'sip'], 'iex'),
    barsDir: getEnvVar('BARS_DIR') ?? null,
    dbPath: getEnvVar('DB_PATH') ?? null,
    logLevel: pick(getEnvVar('LOG_LEVEL'), LOG_LEVELS, 'info'),
    nodeEnv: pick(getEnvVar('NODE_ENV'), NODE_ENVS, 'development'),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
