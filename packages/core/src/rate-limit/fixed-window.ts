import { InMemoryRateWindowStore } from "./in-memory.js";
import type { RateWindow, RateWindowStore } from "./store.js";

export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60_000;
export const DEFAULT_RATE_LIMIT_PERMITS = 60;

export interface FixedWindowRateLimiterOptions {
  /** Window length in milliseconds. Default: 60_000 */
  windowMs?: number;
  /** Permits granted per window. Default: 60 */
  permitLimit?: number;
  /** Clock, in epoch ms. Default: Date.now */
  now?: () => number;
  store?: RateWindowStore;
}

export type RateLimitDecision =
  | { allowed: true; limit: number; remaining: number; resetAt: number; resetInMs: number }
  | {
      allowed: false;
      limit: number;
      remaining: 0;
      resetAt: number;
      resetInMs: number;
      retryAfterMs: number;
    };

/**
 * Fixed-window permit counter.
 *
 * Each key gets a window that opens on its first request and lasts `windowMs`.
 * Up to `permitLimit` requests are admitted inside a window; the rest are
 * rejected at once. There is no queue, so a rejected caller has to retry on
 * its own after `retryAfterMs`.
 *
 * `tryAcquire` never awaits: the reset, the check and the increment happen in
 * a single turn of the event loop, so concurrent requests cannot both take the
 * last permit.
 */
export class FixedWindowRateLimiter {
  readonly windowMs: number;
  readonly permitLimit: number;
  private readonly now: () => number;
  private readonly store: RateWindowStore;

  constructor(options: FixedWindowRateLimiterOptions = {}) {
    const {
      windowMs = DEFAULT_RATE_LIMIT_WINDOW_MS,
      permitLimit = DEFAULT_RATE_LIMIT_PERMITS,
      now = Date.now,
      store = new InMemoryRateWindowStore(),
    } = options;

    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new RangeError(`windowMs must be a positive number, got ${windowMs}`);
    }
    if (!Number.isInteger(permitLimit) || permitLimit < 0) {
      throw new RangeError(`permitLimit must be a non-negative integer, got ${permitLimit}`);
    }

    this.windowMs = windowMs;
    this.permitLimit = permitLimit;
    this.now = now;
    this.store = store;
  }

  tryAcquire(key: string): RateLimitDecision {
    const now = this.now();
    let window = this.store.get(key);

    if (!window || now >= window.windowStart + this.windowMs) {
      window = { windowStart: now, count: 0 };
    }

    const resetAt = window.windowStart + this.windowMs;

    if (window.count < this.permitLimit) {
      window.count += 1;
      this.store.set(key, window);
      return {
        allowed: true,
        limit: this.permitLimit,
        remaining: this.permitLimit - window.count,
        resetAt,
        resetInMs: resetAt - now,
      };
    }

    this.store.set(key, window);
    return {
      allowed: false,
      limit: this.permitLimit,
      remaining: 0,
      resetAt,
      resetInMs: resetAt - now,
      retryAfterMs: resetAt - now,
    };
  }

  /** Current window for `key`, without consuming a permit. */
  peek(key: string): RateWindow | undefined {
    return this.store.get(key);
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.store.clear();
    } else {
      this.store.delete(key);
    }
  }
}
