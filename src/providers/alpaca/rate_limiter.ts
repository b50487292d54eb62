/**
 * Rate limiter for the Alpaca market-data API
 * Standard plan: 200 requests per minute
 */

import { createChildLogger } from '@/utils/logger';
import { sleep } from '@/utils/throttler';

const logger = createChildLogger('rate_limiter');

export interface RateLimiterConfig {
  maxRequestsPerWindow: number;
  windowMs: number;
  maxConcurrent: number;
}

export class RateLimiter {
  private requestTimes: number[] = [];
  private activeRequests = 0;
  private waitQueue: Array<() => void> = [];
  private readonly config: RateLimiterConfig;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = {
      maxRequestsPerWindow: config.maxRequestsPerWindow ?? 200,
      windowMs: config.windowMs ?? 60_000,
      maxConcurrent: config.maxConcurrent ?? 4,
    };
  }

  private cleanOldRequests(): void {
    const windowStart = Date.now() - this.config.windowMs;
    this.requestTimes = this.requestTimes.filter((t) => t > windowStart);
  }

  private async waitForSlot(): Promise<void> {
    while (this.activeRequests >= this.config.maxConcurrent) {
      await new Promise<void>((resolve) => {
        this.waitQueue.push(resolve);
      });
    }

    this.cleanOldRequests();
    while (this.requestTimes.length >= this.config.maxRequestsPerWindow) {
      const waitTime = this.requestTimes[0] + this.config.windowMs - Date.now();
      if (waitTime > 0) {
        logger.debug({ waitTime }, 'Rate limit reached, waiting');
        await sleep(waitTime);
      }
      this.cleanOldRequests();
    }
  }

  async acquire(): Promise<void> {
    await this.waitForSlot();
    this.activeRequests++;
    this.requestTimes.push(Date.now());
  }

  release(): void {
    this.activeRequests = Math.max(0, this.activeRequests - 1);
    const next = this.waitQueue.shift();
    if (next) {
      next();
    }
  }

  getStats(): { requestsInWindow: number; activeRequests: number } {
    this.cleanOldRequests();
    return {
      requestsInWindow: this.requestTimes.length,
      activeRequests: this.activeRequests,
    };
  }
}

// Singleton instance for the application
let globalRateLimiter: RateLimiter | null = null;

export function getRateLimiter(): RateLimiter {
  if (!globalRateLimiter) {
    globalRateLimiter = new RateLimiter();
  }
  return globalRateLimiter;
}
