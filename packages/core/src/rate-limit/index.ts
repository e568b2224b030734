export type { RateWindow, RateWindowStore } from "./store.js";
export { InMemoryRateWindowStore } from "./in-memory.js";
export {
  FixedWindowRateLimiter,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
  DEFAULT_RATE_LIMIT_PERMITS,
} from "./fixed-window.js";
export type { FixedWindowRateLimiterOptions, RateLimitDecision } from "./fixed-window.js";
