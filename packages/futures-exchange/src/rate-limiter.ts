export type RateLimiterOptions = {
  limit: number;
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/** Sliding-window limiter: at most `limit` acquisitions in any `windowMs` span. */
export class RateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private stamps: number[] = [];

  constructor(options: RateLimiterOptions) {
    this.limit = Math.max(1, Math.floor(options.limit));
    this.windowMs = options.windowMs ?? 1_000;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  async acquire(): Promise<void> {
    for (;;) {
      const now = this.now();
      this.stamps = this.stamps.filter((ts) => now - ts < this.windowMs);

      if (this.stamps.length < this.limit) {
        this.stamps.push(now);
        return;
      }

      await this.sleep(this.stamps[0] + this.windowMs - now);
    }
  }

  get inWindow(): number {
    const now = this.now();
    return this.stamps.filter((ts) => now - ts < this.windowMs).length;
  }
}
