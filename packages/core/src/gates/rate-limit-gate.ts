import type { FixedWindowRateLimiter, RateLimitDecision } from "../rate-limit/fixed-window.js";
import type { Gate, GateHeaders, GateRequest } from "./types.js";
import { CONTINUE } from "./types.js";

/** Key shared by every caller; the service has a single quota. */
export const GLOBAL_RATE_LIMIT_KEY = "global";

export interface RateLimitGateOptions {
  limiter: FixedWindowRateLimiter;
  /** Limiter key for a request. Default: one shared key for everyone. */
  keyFor?: (request: GateRequest) => string;
}

export function rateLimitHeaders(decision: RateLimitDecision): GateHeaders {
  const headers: GateHeaders = {
    "x-ratelimit-limit": String(decision.limit),
    "x-ratelimit-remaining": String(decision.remaining),
    "x-ratelimit-reset": String(Math.ceil(decision.resetInMs / 1000)),
  };
  if (!decision.allowed) {
    headers["retry-after"] = String(Math.ceil(decision.retryAfterMs / 1000));
  }
  return headers;
}

/**
 * Spends one permit per rate-limited request. Requests to routes that are not
 * rate limited pass without touching the limiter.
 */
export function createRateLimitGate(options: RateLimitGateOptions): Gate {
  const { limiter, keyFor = () => GLOBAL_RATE_LIMIT_KEY } = options;

  return (request: GateRequest) => {
    if (!request.rateLimited) {
      return CONTINUE;
    }

    const decision = limiter.tryAcquire(keyFor(request));
    const headers = rateLimitHeaders(decision);

    if (!decision.allowed) {
      return {
        kind: "reject",
        statusCode: 429,
        error: "Too Many Requests",
        reason: "rate_limit_exceeded",
        headers,
      };
    }

    return { kind: "continue", headers };
  };
}
