/**
 * FIFO throttler that spaces out bar requests.
 * Tasks start in submission order with at least `minIntervalMs` between starts;
 * a failed task does not stall the ones queued behind it.
 */
export class RequestThrottler {
  private lastStart = 0;
  private queued = 0;
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly minIntervalMs: number = 0) {}

  get pending(): number {
    return this.queued;
  }

  schedule<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    const start = this.chain.then(async () => {
      const waitMs = Math.max(0, this.minIntervalMs - (Date.now() - this.lastStart));
      if (waitMs > 0) {
        await sleep(waitMs);
      }
      this.lastStart = Date.now();
      this.queued--;
    });
    // Only starts are chained; tasks run concurrently once started.
    this.chain = start;
    return start.then(task);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
