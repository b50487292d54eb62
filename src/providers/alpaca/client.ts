/**
 * Alpaca market-data v2 client
 * Rate-limited multi-symbol bar requests with pagination and exponential backoff
 */

import { createChildLogger } from '@/utils/logger';
import { sleep } from '@/utils/throttler';
import type { AlpacaFeed } from '@/core/env';
import { ProviderError } from '../types';
import { getRateLimiter, type RateLimiter } from './rate_limiter';
import { isAlpacaBarsResponse, type AlpacaBar, type AlpacaTimeframe } from './types';

const logger = createChildLogger('alpaca');

export const DEFAULT_BASE_URL = 'https://data.alpaca.markets';

const PAGE_LIMIT = 10_000;

export interface AlpacaCredentials {
  keyId: string;
  secretKey: string;
}

export interface AlpacaClientOptions {
  feed?: AlpacaFeed;
  baseUrl?: string;
  maxRetries?: number;
  initialBackoffMs?: number;
  rateLimiter?: RateLimiter;
  fetchImpl?: typeof fetch;
}

export interface BarsRequest {
  symbols: readonly string[];
  timeframe: AlpacaTimeframe;
  start: Date;
  end: Date;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class AlpacaClient {
  private readonly credentials: AlpacaCredentials;
  private readonly feed: AlpacaFeed;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly rateLimiter: RateLimiter;
  private readonly fetchImpl: typeof fetch;
  private requestCount = 0;

  constructor(credentials: AlpacaCredentials, options: AlpacaClientOptions = {}) {
    this.credentials = credentials;
    this.feed = options.feed ?? 'iex';
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.maxRetries = options.maxRetries ?? 3;
    this.initialBackoffMs = options.initialBackoffMs ?? 1000;
    this.rateLimiter = options.rateLimiter ?? getRateLimiter();
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private async fetchWithRetry(url: URL): Promise<unknown> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      const backoffMs = this.initialBackoffMs * Math.pow(2, attempt);
      await this.rateLimiter.acquire();
      let response: Response;
      try {
        response = await this.fetchImpl(url.toString(), {
          headers: {
            'APCA-API-KEY-ID': this.credentials.keyId,
            'APCA-API-SECRET-KEY': this.credentials.secretKey,
            Accept: 'application/json',
          },
        });
        this.requestCount++;
      } catch (error) {
        this.rateLimiter.release();
        lastError = error instanceof Error ? error : new Error(String(error));
        if (attempt < this.maxRetries) {
          logger.warn({ attempt, backoffMs, error: lastError.message }, 'Alpaca request failed, retrying');
          await sleep(backoffMs);
        }
        continue;
      }
      this.rateLimiter.release();

      if (isRetryableStatus(response.status)) {
        lastError = new Error(`Alpaca API error: ${response.status} ${response.statusText}`);
        if (attempt < this.maxRetries) {
          logger.warn({ attempt, backoffMs, status: response.status }, 'Alpaca throttled or unavailable, backing off');
          await sleep(backoffMs);
        }
        continue;
      }

      if (!response.ok) {
        // Client errors (bad symbol, bad credentials) are not retried.
        throw new Error(`Alpaca API error: ${response.status} ${response.statusText}`);
      }

      return response.json();
    }

    throw lastError ?? new Error('Alpaca request failed after retries');
  }

  /**
   * All bars for the symbols in [start, end], following next_page_token
   * until the result set is exhausted.
   */
  async fetchBars(request: BarsRequest): Promise<Record<string, AlpacaBar[]>> {
    const collected: Record<string, AlpacaBar[]> = {};
    let pageToken: string | null = null;
    let pages = 0;

    do {
      const url = new URL('/v2/stocks/bars', this.baseUrl);
      url.searchParams.set('symbols', request.symbols.join(','));
      url.searchParams.set('timeframe', request.timeframe);
      url.searchParams.set('start', request.start.toISOString());
      url.searchParams.set('end', request.end.toISOString());
      url.searchParams.set('adjustment', 'raw');
      url.searchParams.set('feed', this.feed);
      url.searchParams.set('limit', String(PAGE_LIMIT));
      if (pageToken) url.searchParams.set('page_token', pageToken);

      let payload: unknown;
      try {
        payload = await this.fetchWithRetry(url);
      } catch (error) {
        throw new ProviderError(
          `Bars request failed for ${request.symbols.length} symbols (${request.timeframe})`,
          'alpaca',
          request.symbols.join(','),
          'fetchBars',
          error instanceof Error ? error : undefined
        );
      }

      if (!isAlpacaBarsResponse(payload)) {
        throw new ProviderError('Unexpected bars response shape', 'alpaca', request.symbols.join(','), 'fetchBars');
      }

      for (const [symbol, bars] of Object.entries(payload.bars ?? {})) {
        const existing = collected[symbol] ?? [];
        existing.push(...bars);
        collected[symbol] = existing;
      }
      pageToken = payload.next_page_token;
      pages++;
    } while (pageToken);

    logger.debug({ timeframe: request.timeframe, symbols: request.symbols.length, pages }, 'Bars fetched');
    return collected;
  }
}
