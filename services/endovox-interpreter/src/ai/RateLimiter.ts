/**
 * Sliding-window rate limiter for language model requests.
 *
 * Callers over the limit wait in FIFO order until the oldest request
 * in the window expires.
 */

export interface RateLimiterConfig {
  maxRequestsPerMinute: number;
  windowMs: number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private requestTimestamps: number[] = [];
  private waiters: Waiter[] = [];
  private drainTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.maxRequests = config.maxRequestsPerMinute ?? 60;
    this.windowMs = config.windowMs ?? 60000;
  }

  getCurrentRequestCount(): number {
    this.pruneOldTimestamps();
    return this.requestTimestamps.length;
  }

  canMakeRequest(): boolean {
    return this.getCurrentRequestCount() < this.maxRequests;
  }

  /**
   * Time until next available slot (ms)
   */
  getTimeUntilNextSlot(): number {
    if (this.canMakeRequest()) {
      return 0;
    }
    return Math.max(0, this.requestTimestamps[0] + this.windowMs - Date.now());
  }

  /**
   * Resolves once a slot has been taken for the caller
   */
  acquire(): Promise<void> {
    if (this.waiters.length === 0 && this.canMakeRequest()) {
      // eslint-disable-next-line functional/immutable-data
      this.requestTimestamps.push(Date.now());
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      // eslint-disable-next-line functional/immutable-data
      this.waiters.push({ resolve, reject });
      this.scheduleDrain();
    });
  }

  /**
   * Give back the most recent slot (the request never reached the API)
   */
  release(): void {
    // eslint-disable-next-line functional/immutable-data
    this.requestTimestamps.pop();
    this.drain();
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } catch (error) {
      // A 429 did not count against the provider's quota
      if (error instanceof Error && error.message.includes('429')) {
        this.release();
      }
      throw error;
    }
  }

  /**
   * Reset the rate limiter (for testing). Callers still waiting are rejected.
   */
  reset(): void {
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
    const pending = this.waiters;
    this.requestTimestamps = [];
    this.waiters = [];
    for (const waiter of pending) {
      waiter.reject(new Error('Rate limiter reset'));
    }
  }

  private pruneOldTimestamps(): void {
    const cutoff = Date.now() - this.windowMs;
    this.requestTimestamps = this.requestTimestamps.filter((ts) => ts > cutoff);
  }

  private drain(): void {
    while (this.waiters.length > 0 && this.canMakeRequest()) {
      // eslint-disable-next-line functional/immutable-data
      const next = this.waiters.shift();
      // eslint-disable-next-line functional/immutable-data
      this.requestTimestamps.push(Date.now());
      next?.resolve();
    }
    if (this.waiters.length > 0) {
      this.scheduleDrain();
    }
  }

  private scheduleDrain(): void {
    if (this.drainTimer) {
      return;
    }
    this.drainTimer = setTimeout(() => {
      this.drainTimer = null;
      this.drain();
    }, this.getTimeUntilNextSlot() + 10);
  }
}
