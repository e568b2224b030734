// Validation
export {
  validateItemDraft,
  isValidItemDraft,
  nameProblems,
  priceProblems,
  NAME_REQUIRED,
  PRICE_NOT_POSITIVE,
} from "./validation/item-validator.js";

// Errors
export { ItemStoreError, ItemNotFoundError, ValidationFailedError, InvalidArgumentError } from "./errors.js";

// Storage
export {
  InMemoryItemStore,
  createInMemoryItemStore,
  seedDefaultItems,
  DEFAULT_ITEMS,
} from "./storage/index.js";
export type { ItemStore } from "./storage/index.js";

// Rate limiting
export {
  FixedWindowRateLimiter,
  InMemoryRateWindowStore,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
  DEFAULT_RATE_LIMIT_PERMITS,
} from "./rate-limit/index.js";
export type {
  RateWindow,
  RateWindowStore,
  FixedWindowRateLimiterOptions,
  RateLimitDecision,
} from "./rate-limit/index.js";

// Gates
export {
  CONTINUE,
  createAuthGate,
  matchesPrefix,
  API_KEY_HEADER,
  PROTECTED_PREFIX,
  createRateLimitGate,
  rateLimitHeaders,
  GLOBAL_RATE_LIMIT_KEY,
  runGates,
  createRequestPipeline,
} from "./gates/index.js";
export type {
  Gate,
  GateHeaders,
  GateRequest,
  GateResult,
  PipelineResult,
  AuthGateOptions,
  RateLimitGateOptions,
  RequestPipeline,
  RequestPipelineOptions,
} from "./gates/index.js";
