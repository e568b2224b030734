export type { Gate, GateHeaders, GateRequest, GateResult, PipelineResult } from "./types.js";
export { CONTINUE } from "./types.js";
export { createAuthGate, matchesPrefix, API_KEY_HEADER, PROTECTED_PREFIX } from "./auth-gate.js";
export type { AuthGateOptions } from "./auth-gate.js";
export { createRateLimitGate, rateLimitHeaders, GLOBAL_RATE_LIMIT_KEY } from "./rate-limit-gate.js";
export type { RateLimitGateOptions } from "./rate-limit-gate.js";
export { runGates, createRequestPipeline } from "./pipeline.js";
export type { RequestPipeline, RequestPipelineOptions } from "./pipeline.js";
