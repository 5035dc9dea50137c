import { isTransientError } from "./errors.js";

export type RetrySettings = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0.2 spreads each delay uniformly over ±20%. */
  jitterRatio: number;
};

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxAttempts: 3,
  baseDelayMs: 300,
  maxDelayMs: 5_000,
  jitterRatio: 0.2
};

/**
 * Capped exponential backoff with jitter. Shared by order submission and the
 * market data feed's reconnect schedule.
 */
export class RetryPolicy {
  readonly settings: RetrySettings;

  constructor(settings: Partial<RetrySettings> = {}) {
    this.settings = { ...DEFAULT_RETRY_SETTINGS, ...settings };
  }

  get maxAttempts(): number {
    return this.settings.maxAttempts;
  }

  /** Delay before retry number `attempt` (1-based). */
  delayFor(attempt: number, random: () => number = Math.random): number {
    const { baseDelayMs, maxDelayMs, jitterRatio } = this.settings;
    const exponential = Math.min(baseDelayMs * 2 ** Math.max(0, attempt - 1), maxDelayMs);
    const jitter = exponential * jitterRatio * (random() * 2 - 1);
    return Math.max(0, Math.round(exponential + jitter));
  }

  canRetry(attempt: number): boolean {
    return attempt < this.settings.maxAttempts;
  }

  shouldRetry(error: unknown, attempt: number): boolean {
    return this.canRetry(attempt) && isTransientError(error);
  }
}
