import type { Gate, GateHeaders, GateRequest, PipelineResult } from "./types.js";

/**
 * Run gates in order. The first rejection ends the run; headers produced by
 * the gates that ran are merged into the result either way.
 */
export function runGates(gates: readonly Gate[], request: GateRequest): PipelineResult {
  const headers: GateHeaders = {};

  for (const gate of gates) {
    const result = gate(request);
    Object.assign(headers, result.headers);

    if (result.kind === "reject") {
      return {
        kind: "reject",
        statusCode: result.statusCode,
        error: result.error,
        reason: result.reason,
        headers,
      };
    }
  }

  return { kind: "continue", headers };
}

export interface RequestPipelineOptions {
  authGate: Gate;
  rateLimitGate: Gate;
}

export interface RequestPipeline {
  readonly gates: readonly Gate[];
  run(request: GateRequest): PipelineResult;
}

/**
 * Authentication always runs before rate limiting, so a request with a bad
 * key is turned away without spending a permit.
 */
export function createRequestPipeline(options: RequestPipelineOptions): RequestPipeline {
  const gates = Object.freeze([options.authGate, options.rateLimitGate]);
  return {
    gates,
    run: (request) => runGates(gates, request),
  };
}
