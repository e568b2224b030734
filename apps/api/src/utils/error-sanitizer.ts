/**
 * Sanitizes error messages before returning them to API clients.
 * Keeps stack frames, file system paths and Node internals out of responses.
 */

const SENSITIVE_PATTERNS = [
  /at\s+\S+\s+\(.*:\d+:\d+\)/, // stack traces
  /(?:^|\s)(?:\/[\w.-]+){2,}/, // absolute paths
  /node_modules/,
  /ERR_[A-Z_]+/, // Node error codes
];

export function sanitizeErrorMessage(err: unknown, statusCode: number): string {
  if (statusCode >= 500) {
    return "Internal server error";
  }

  const message = err instanceof Error ? err.message : String(err);

  for (const pattern of SENSITIVE_PATTERNS) {
    if (pattern.test(message)) {
      return "Request failed";
    }
  }

  return message;
}
