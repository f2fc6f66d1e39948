/**
 * Errors for the statuses guards and handlers answer most often.
 */

import type { HttpMethod } from "@waymark/router";
import { WaymarkError } from "./base.ts";
import type { ErrorBody, ValidationIssue } from "./types.ts";

export class BadRequestError extends WaymarkError {
  constructor(message = "Bad Request", details?: unknown) {
    super(message, { status: 400, code: "BAD_REQUEST", details });
    this.name = "BadRequestError";
  }
}

export class UnauthorizedError extends WaymarkError {
  constructor(message = "Unauthorized", details?: unknown) {
    super(message, { status: 401, code: "UNAUTHORIZED", details });
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends WaymarkError {
  constructor(message = "Forbidden", details?: unknown) {
    super(message, { status: 403, code: "FORBIDDEN", details });
    this.name = "ForbiddenError";
  }
}

export class NotFoundError extends WaymarkError {
  constructor(message = "Not Found", details?: unknown) {
    super(message, { status: 404, code: "NOT_FOUND", details });
    this.name = "NotFoundError";
  }
}

/**
 * The path exists but not for this method. The response lists the accepted
 * methods in its `Allow` header and in `error.allowed`.
 */
export class MethodNotAllowedError extends WaymarkError {
  readonly allowed: readonly HttpMethod[];

  constructor(allowed: readonly HttpMethod[], message = "Method Not Allowed") {
    super(message, { status: 405, code: "METHOD_NOT_ALLOWED" });
    this.name = "MethodNotAllowedError";
    this.allowed = allowed;
  }

  protected override publicFields(): Pick<ErrorBody["error"], "allowed"> {
    return { allowed: this.allowed };
  }

  protected override headers(): Record<string, string> {
    return { Allow: this.allowed.join(", ") };
  }
}

/**
 * A schema rejected query parameters or a request body.
 */
export class ValidationError extends WaymarkError {
  readonly errors: ValidationIssue[];

  constructor(message = "Validation Error", errors: ValidationIssue[] = []) {
    super(message, { status: 422, code: "VALIDATION_ERROR", details: errors });
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * A fault on the server side. Always logged by the dispatcher.
 */
export class InternalError extends WaymarkError {
  constructor(
    message = "Internal Server Error",
    details?: unknown,
    cause?: unknown,
  ) {
    super(message, { details, cause });
    this.name = "InternalError";
  }
}
