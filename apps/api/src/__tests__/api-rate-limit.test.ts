import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildTestServer, AUTH, type TestClock } from "./test-server.js";

describe("Rate limiting", () => {
  let app: FastifyInstance;
  let clock: TestClock;

  beforeEach(async () => {
    ({ app, clock } = await buildTestServer({ rateLimit: { permitLimit: 3, windowMs: 60_000 } }));
  });

  afterEach(async () => {
    await app.close();
  });

  const list = () => app.inject({ method: "GET", url: "/v1/items", headers: AUTH });

  it("admits exactly permitLimit requests per window", async () => {
    const statuses: number[] = [];
    for (let i = 0; i < 4; i++) {
      statuses.push((await list()).statusCode);
    }
    expect(statuses).toEqual([200, 200, 200, 429]);
  });

  it("counts down x-ratelimit-remaining", async () => {
    const remaining: unknown[] = [];
    for (let i = 0; i < 3; i++) {
      const res = await list();
      remaining.push(res.headers["x-ratelimit-remaining"]);
      expect(res.headers["x-ratelimit-limit"]).toBe("3");
    }
    expect(remaining).toEqual(["2", "1", "0"]);
  });

  it("answers 429 with a Retry-After header", async () => {
    for (let i = 0; i < 3; i++) await list();
    clock.advance(15_000);

    const res = await list();
    expect(res.statusCode).toBe(429);
    expect(res.json()).toEqual({ error: "Too Many Requests", statusCode: 429 });
    expect(res.headers["retry-after"]).toBe("45");
    expect(res.headers["x-ratelimit-remaining"]).toBe("0");
    expect(res.headers["x-ratelimit-reset"]).toBe("45");
  });

  it("admits requests again once the window elapses", async () => {
    for (let i = 0; i < 4; i++) await list();

    clock.advance(59_999);
    expect((await list()).statusCode).toBe(429);

    clock.advance(1);
    const res = await list();
    expect(res.statusCode).toBe(200);
    expect(res.headers["x-ratelimit-remaining"]).toBe("2");
  });

  it("shares one quota across methods and routes", async () => {
    const create = await app.inject({
      method: "POST",
      url: "/v1/items",
      headers: AUTH,
      payload: { name: "Widget", price: 1 },
    });
    const get = await app.inject({ method: "GET", url: "/v1/items/1", headers: AUTH });
    const del = await app.inject({ method: "DELETE", url: "/v1/items/2", headers: AUTH });
    const blocked = await app.inject({ method: "PUT", url: "/v1/items/1", headers: AUTH, payload: { name: "x", price: 1 } });

    expect([create.statusCode, get.statusCode, del.statusCode]).toEqual([201, 200, 204]);
    expect(blocked.statusCode).toBe(429);
    expect(app.itemStore.get(1).name).toBe("Alpha");
  });

  it("shares one quota across callers", async () => {
    await app.inject({ method: "GET", url: "/v1/items", headers: { ...AUTH, "x-forwarded-for": "10.0.0.1" } });
    await app.inject({ method: "GET", url: "/v1/items", headers: { ...AUTH, "x-forwarded-for": "10.0.0.2" } });
    await app.inject({ method: "GET", url: "/v1/items", headers: { ...AUTH, "x-forwarded-for": "10.0.0.3" } });

    const res = await app.inject({ method: "GET", url: "/v1/items", headers: { ...AUTH, "x-forwarded-for": "10.0.0.4" } });
    expect(res.statusCode).toBe(429);
  });

  it("spends a permit on requests that fail validation or miss", async () => {
    const invalid = await app.inject({
      method: "POST",
      url: "/v1/items",
      headers: AUTH,
      payload: { name: "", price: 0 },
    });
    const missing = await app.inject({ method: "GET", url: "/v1/items/404", headers: AUTH });

    expect(invalid.statusCode).toBe(400);
    expect(missing.statusCode).toBe(404);
    expect(app.rateLimiter.peek("global")).toMatchObject({ count: 2 });
  });

  it("keeps /health, / and the docs reachable when the quota is spent", async () => {
    for (let i = 0; i < 4; i++) await list();

    const health = await app.inject({ method: "GET", url: "/health" });
    expect(health.statusCode).toBe(200);
    expect(health.headers["x-ratelimit-limit"]).toBeUndefined();

    const root = await app.inject({ method: "GET", url: "/" });
    expect(root.statusCode).toBe(302);

    const docs = await app.inject({ method: "GET", url: "/docs/json" });
    expect(docs.statusCode).toBe(200);
  });

  it("rejects over-quota requests without touching the store", async () => {
    for (let i = 0; i < 3; i++) await list();

    const res = await app.inject({
      method: "POST",
      url: "/v1/items",
      headers: AUTH,
      payload: { name: "Late", price: 1 },
    });

    expect(res.statusCode).toBe(429);
    expect(app.itemStore.size()).toBe(5);
  });

  it("admits exactly permitLimit of a concurrent burst", async () => {
    const responses = await Promise.all(Array.from({ length: 10 }, () => list()));
    const statuses = responses.map((r) => r.statusCode);

    expect(statuses.filter((s) => s === 200)).toHaveLength(3);
    expect(statuses.filter((s) => s === 429)).toHaveLength(7);
  });
});

describe("Rate limiting defaults", () => {
  it("allows 60 requests per minute", async () => {
    const { app } = await buildTestServer();

    expect(app.rateLimiter.permitLimit).toBe(60);
    expect(app.rateLimiter.windowMs).toBe(60_000);

    const res = await app.inject({ method: "GET", url: "/v1/items", headers: AUTH });
    expect(res.headers["x-ratelimit-limit"]).toBe("60");
    expect(res.headers["x-ratelimit-remaining"]).toBe("59");
    expect(res.headers["x-ratelimit-reset"]).toBe("60");

    await app.close();
  });
});
