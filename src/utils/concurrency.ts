import { ConfigurationError } from '../errors.js';

/**
 * Counting semaphore. At most `limit` tasks passed to `run` execute at once;
 * the rest wait in FIFO order.
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private active = 0;
  private peak = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ConfigurationError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  /** Highest number of tasks observed running at the same time */
  get peakCount(): number {
    return this.peak;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.take();
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.take();
        resolve();
      });
    });
  }

  private take(): void {
    this.active++;
    if (this.active > this.peak) this.peak = this.active;
  }

  private release(): void {
    this.active--;
    const next = this.waiters.shift();
    if (next) next();
  }
}

/** Maps `items` through `fn` under `limiter`, keeping input order in the output */
export function mapWithLimiter<T, R>(
  items: readonly T[],
  limiter: ConcurrencyLimiter,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  return Promise.all(items.map((item, index) => limiter.run(() => fn(item, index))));
}
