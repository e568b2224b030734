import type { ErrorResponse } from "@itemgate/schemas";
import { InvalidArgumentError, ItemNotFoundError, ValidationFailedError } from "@itemgate/core";
import { sanitizeErrorMessage } from "./error-sanitizer.js";

function statusCodeOf(error: Error): number {
  if ("statusCode" in error && typeof error.statusCode === "number") {
    const code = error.statusCode;
    if (code >= 400 && code <= 599) return code;
  }
  return 500;
}

/**
 * Map any error raised while handling a request to the response body shared
 * by every failure: `{ error, statusCode }`, plus `errors` for field problems.
 */
export function toErrorResponse(error: Error): ErrorResponse {
  if (error instanceof ValidationFailedError) {
    return { error: "Validation failed", statusCode: 400, errors: error.problems };
  }
  if (error instanceof InvalidArgumentError) {
    return { error: "Invalid pagination parameters", statusCode: 400, errors: error.problems };
  }
  if (error instanceof ItemNotFoundError) {
    return { error: "Item not found", statusCode: 404 };
  }

  const statusCode = statusCodeOf(error);
  return { error: sanitizeErrorMessage(error, statusCode), statusCode };
}
