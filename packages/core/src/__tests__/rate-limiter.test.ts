import { describe, it, expect, beforeEach } from "vitest";
import { FixedWindowRateLimiter } from "../rate-limit/fixed-window.js";
import { InMemoryRateWindowStore } from "../rate-limit/in-memory.js";

function fakeClock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe("FixedWindowRateLimiter", () => {
  let clock: ReturnType<typeof fakeClock>;
  let limiter: FixedWindowRateLimiter;

  beforeEach(() => {
    clock = fakeClock();
    limiter = new FixedWindowRateLimiter({ windowMs: 60_000, permitLimit: 3, now: clock.now });
  });

  it("defaults to 60 permits per 60 seconds", () => {
    const defaults = new FixedWindowRateLimiter();
    expect(defaults.permitLimit).toBe(60);
    expect(defaults.windowMs).toBe(60_000);
  });

  it("admits exactly permitLimit requests in one window", () => {
    const results = Array.from({ length: 4 }, () => limiter.tryAcquire("global").allowed);
    expect(results).toEqual([true, true, true, false]);
  });

  it("counts down the remaining permits", () => {
    expect(limiter.tryAcquire("global")).toMatchObject({ allowed: true, limit: 3, remaining: 2 });
    expect(limiter.tryAcquire("global")).toMatchObject({ allowed: true, remaining: 1 });
    expect(limiter.tryAcquire("global")).toMatchObject({ allowed: true, remaining: 0 });
  });

  it("reports when the window resets and how long to wait", () => {
    limiter.tryAcquire("global");
    clock.advance(15_000);
    limiter.tryAcquire("global");
    limiter.tryAcquire("global");

    const rejected = limiter.tryAcquire("global");
    expect(rejected).toEqual({
      allowed: false,
      limit: 3,
      remaining: 0,
      resetAt: 1_060_000,
      resetInMs: 45_000,
      retryAfterMs: 45_000,
    });
  });

  it("keeps rejecting until the window has fully elapsed", () => {
    for (let i = 0; i < 3; i++) limiter.tryAcquire("global");

    clock.advance(59_999);
    expect(limiter.tryAcquire("global").allowed).toBe(false);

    clock.advance(1);
    expect(limiter.tryAcquire("global").allowed).toBe(true);
  });

  it("opens a fresh window anchored at the first request after expiry", () => {
    limiter.tryAcquire("global");
    clock.advance(90_000);

    const decision = limiter.tryAcquire("global");
    expect(decision).toMatchObject({ allowed: true, remaining: 2, resetAt: 1_150_000 });
    expect(limiter.peek("global")).toEqual({ windowStart: 1_090_000, count: 1 });
  });

  it("does not count rejected requests against the window", () => {
    for (let i = 0; i < 10; i++) limiter.tryAcquire("global");
    expect(limiter.peek("global")?.count).toBe(3);
  });

  it("tracks keys independently", () => {
    for (let i = 0; i < 3; i++) limiter.tryAcquire("a");
    expect(limiter.tryAcquire("a").allowed).toBe(false);
    expect(limiter.tryAcquire("b").allowed).toBe(true);
  });

  it("creates windows lazily", () => {
    expect(limiter.peek("global")).toBeUndefined();
    limiter.tryAcquire("global");
    expect(limiter.peek("global")).toEqual({ windowStart: 1_000_000, count: 1 });
  });

  it("never overshoots when many callers race for the last permits", async () => {
    const attempts = await Promise.all(
      Array.from({ length: 20 }, () => Promise.resolve().then(() => limiter.tryAcquire("global").allowed)),
    );
    expect(attempts.filter(Boolean)).toHaveLength(3);
  });

  it("rejects everything when permitLimit is 0", () => {
    const closed = new FixedWindowRateLimiter({ permitLimit: 0, now: clock.now });
    expect(closed.tryAcquire("global")).toMatchObject({ allowed: false, remaining: 0, retryAfterMs: 60_000 });
  });

  it("reset clears one key or all of them", () => {
    limiter.tryAcquire("a");
    limiter.tryAcquire("b");

    limiter.reset("a");
    expect(limiter.peek("a")).toBeUndefined();
    expect(limiter.peek("b")).toBeDefined();

    limiter.reset();
    expect(limiter.peek("b")).toBeUndefined();
  });

  it("keeps its windows in the supplied store", () => {
    const store = new InMemoryRateWindowStore();
    const shared = new FixedWindowRateLimiter({ permitLimit: 1, now: clock.now, store });
    shared.tryAcquire("global");
    expect(store.get("global")).toEqual({ windowStart: 1_000_000, count: 1 });
  });

  it.each([
    [{ windowMs: 0 }],
    [{ windowMs: -5 }],
    [{ permitLimit: -1 }],
    [{ permitLimit: 1.5 }],
  ])("rejects invalid options %j", (options) => {
    expect(() => new FixedWindowRateLimiter(options)).toThrow(RangeError);
  });
});

describe("InMemoryRateWindowStore", () => {
  it("stores copies so callers cannot mutate a window in place", () => {
    const store = new InMemoryRateWindowStore();
    const window = { windowStart: 0, count: 1 };
    store.set("k", window);
    window.count = 99;

    const read = store.get("k");
    expect(read).toEqual({ windowStart: 0, count: 1 });
    if (read) read.count = 50;
    expect(store.get("k")?.count).toBe(1);
  });
});
