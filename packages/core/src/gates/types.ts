export type GateHeaders = Record<string, string>;

/** What a gate sees of an incoming request. */
export interface GateRequest {
  method: string;
  /**
   * Request path, raw or percent-decoded. A query string, if present, is
   * ignored by the gates.
   */
  path: string;
  /** Header names are lower-case, as Node delivers them. */
  headers: Record<string, string | string[] | undefined>;
  /** Whether the matched route takes part in rate limiting. */
  rateLimited: boolean;
}

export type GateResult =
  | { kind: "continue"; headers?: GateHeaders }
  | {
      kind: "reject";
      statusCode: number;
      error: string;
      /** Machine-readable cause, for logs. */
      reason: string;
      headers?: GateHeaders;
    };

export type Gate = (request: GateRequest) => GateResult;

export type PipelineResult =
  | { kind: "continue"; headers: GateHeaders }
  | { kind: "reject"; statusCode: number; error: string; reason: string; headers: GateHeaders };

export const CONTINUE: GateResult = { kind: "continue" };
