import type { ItemId, ProblemMap } from "@itemgate/schemas";

/**
 * Base class for failures raised by the item store. Each subclass carries the
 * HTTP status it maps to so the transport layer does not have to know about
 * individual error types.
 */
export abstract class ItemStoreError extends Error {
  abstract readonly statusCode: number;
}

export class ItemNotFoundError extends ItemStoreError {
  readonly statusCode = 404;

  constructor(public readonly id: ItemId) {
    super(`Item not found: ${id}`);
    this.name = "ItemNotFoundError";
  }
}

export class ValidationFailedError extends ItemStoreError {
  readonly statusCode = 400;

  constructor(public readonly problems: ProblemMap) {
    super(`Validation failed: ${Object.keys(problems).join(", ")}`);
    this.name = "ValidationFailedError";
  }
}

export class InvalidArgumentError extends ItemStoreError {
  readonly statusCode = 400;

  constructor(public readonly problems: ProblemMap) {
    super(`Invalid argument: ${Object.keys(problems).join(", ")}`);
    this.name = "InvalidArgumentError";
  }
}
