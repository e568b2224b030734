import crypto from "node:crypto";
import type { Gate, GateRequest, GateResult } from "./types.js";
import { CONTINUE } from "./types.js";

export const API_KEY_HEADER = "x-api-key";
export const PROTECTED_PREFIX = "/v1";

export interface AuthGateOptions {
  /** The only accepted key. Empty or undefined rejects every protected request. */
  secret: string | undefined;
  /** Path prefix, matched by whole segments. Default: "/v1" */
  protectedPrefix?: string;
  /** Default: "x-api-key" */
  headerName?: string;
}

function hashKey(key: string): Buffer {
  return crypto.createHash("sha256").update(key).digest();
}

function stripQuery(path: string): string {
  const q = path.indexOf("?");
  return q < 0 ? path : path.slice(0, q);
}

// The router matches routes on the decoded path, so "/%761" reaches "/v1".
function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    return path;
  }
}

/**
 * True when `path` is `prefix` itself or lies beneath it
 * ("/v1", "/v1/items", "/%761/items"), but not for "/v10" or "/v1items".
 */
export function matchesPrefix(path: string, prefix: string): boolean {
  const p = decodePath(stripQuery(path)).toLowerCase();
  const pre = prefix.toLowerCase().replace(/\/+$/, "");
  if (pre === "") return true;
  return p === pre || p.startsWith(`${pre}/`);
}

/**
 * API key check for a protected path prefix.
 *
 * The presented key must equal the configured secret exactly. Both sides are
 * SHA-256 hashed and compared with `timingSafeEqual`, so the comparison time
 * does not depend on how much of the key matched.
 */
export function createAuthGate(options: AuthGateOptions): Gate {
  const protectedPrefix = options.protectedPrefix ?? PROTECTED_PREFIX;
  const headerName = (options.headerName ?? API_KEY_HEADER).toLowerCase();
  const secretHash = options.secret ? hashKey(options.secret) : null;

  return (request: GateRequest) => {
    if (!matchesPrefix(request.path, protectedPrefix)) {
      return CONTINUE;
    }

    const presented = request.headers[headerName];
    if (typeof presented !== "string") {
      return unauthorized(presented === undefined ? "missing_api_key" : "ambiguous_api_key");
    }
    if (!secretHash) {
      return unauthorized("no_api_key_configured");
    }

    const presentedHash = hashKey(presented);
    if (!crypto.timingSafeEqual(secretHash, presentedHash)) {
      return unauthorized("invalid_api_key");
    }

    return CONTINUE;
  };
}

function unauthorized(reason: string): GateResult {
  return { kind: "reject", statusCode: 401, error: "Unauthorized", reason };
}
