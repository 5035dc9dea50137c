import assert from "node:assert/strict";
import test from "node:test";
import { BusinessRejectionError, GatewayTimeoutError, RateLimitError } from "./errors.js";
import { RateLimiter } from "./rate-limiter.js";
import { RetryPolicy } from "./retry-policy.js";

test("delays double per attempt up to the cap", () => {
  const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 300, jitterRatio: 0.2 });
  const noJitter = () => 0.5;

  assert.deepEqual(
    [1, 2, 3, 4].map((attempt) => policy.delayFor(attempt, noJitter)),
    [100, 200, 300, 300]
  );
});

test("jitter spreads the delay by the configured ratio", () => {
  const policy = new RetryPolicy({ baseDelayMs: 100, maxDelayMs: 1_000, jitterRatio: 0.2 });
  assert.equal(policy.delayFor(1, () => 1), 120);
  assert.equal(policy.delayFor(1, () => 0), 80);
});

test("only transient errors are retried, and only while attempts remain", () => {
  const policy = new RetryPolicy({ maxAttempts: 3 });

  assert.equal(policy.shouldRetry(new RateLimitError("slow down"), 1), true);
  assert.equal(policy.shouldRetry(new GatewayTimeoutError("timed out"), 2), true);
  assert.equal(policy.shouldRetry(new GatewayTimeoutError("timed out"), 3), false);
  assert.equal(policy.shouldRetry(new BusinessRejectionError("bad size"), 1), false);
  assert.equal(policy.shouldRetry(new TypeError("fetch failed"), 1), true);
  assert.equal(policy.shouldRetry(new Error("unexpected"), 1), false);
});

test("rate limiter waits for the oldest call to leave the window", async () => {
  const clock = { now: 1_000 };
  const waits: number[] = [];
  const limiter = new RateLimiter({
    limit: 2,
    windowMs: 1_000,
    now: () => clock.now,
    sleep: async (ms) => {
      waits.push(ms);
      clock.now += ms;
    }
  });

  await limiter.acquire();
  clock.now += 400;
  await limiter.acquire();
  await limiter.acquire();

  assert.deepEqual(waits, [600]);
  assert.equal(limiter.inWindow, 2);
});
