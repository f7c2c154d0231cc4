/**
 * HTTP error classes.
 *
 * Client errors (4xx) are quiet by default: they are expected and the
 * default error path does not log them.
 */

import { FaultlineError } from "~/errors/base.ts";
import type { ValidationIssue } from "~/errors/types.ts";

/**
 * 400 Bad Request error.
 */
export class BadRequestError extends FaultlineError {
  constructor(message = "Bad Request", details?: unknown) {
    super(message, 400, "BAD_REQUEST", details);
    this.name = "BadRequestError";
  }
}

/**
 * 401 Unauthorized error.
 */
export class UnauthorizedError extends FaultlineError {
  constructor(message = "Unauthorized", details?: unknown) {
    super(message, 401, "UNAUTHORIZED", details);
    this.name = "UnauthorizedError";
  }
}

/**
 * 403 Forbidden error.
 */
export class ForbiddenError extends FaultlineError {
  constructor(message = "Forbidden", details?: unknown) {
    super(message, 403, "FORBIDDEN", details);
    this.name = "ForbiddenError";
  }
}

/**
 * 404 Not Found error.
 */
export class NotFoundError extends FaultlineError {
  constructor(message = "Not Found", details?: unknown) {
    super(message, 404, "NOT_FOUND", details);
    this.name = "NotFoundError";
  }
}

/**
 * 405 Method Not Allowed error.
 */
export class MethodNotAllowedError extends FaultlineError {
  readonly allowed: string[];

  constructor(message = "Method Not Allowed", allowed: string[] = []) {
    super(message, 405, "METHOD_NOT_ALLOWED", { allowed });
    this.name = "MethodNotAllowedError";
    this.allowed = allowed;
  }

  override headers(): Record<string, string> {
    return this.allowed.length > 0 ? { Allow: this.allowed.join(", ") } : {};
  }
}

/**
 * 408 Request Timeout error.
 */
export class RequestTimeoutError extends FaultlineError {
  constructor(message = "Request Timeout", details?: unknown) {
    super(message, 408, "REQUEST_TIMEOUT", details);
    this.name = "RequestTimeoutError";
  }
}

/**
 * 409 Conflict error.
 */
export class ConflictError extends FaultlineError {
  constructor(message = "Conflict", details?: unknown) {
    super(message, 409, "CONFLICT", details);
    this.name = "ConflictError";
  }
}

/**
 * 413 Payload Too Large error.
 */
export class PayloadTooLargeError extends FaultlineError {
  constructor(message = "Payload Too Large", details?: unknown) {
    super(message, 413, "PAYLOAD_TOO_LARGE", details);
    this.name = "PayloadTooLargeError";
  }
}

/**
 * 422 Unprocessable Entity error (validation error).
 */
export class ValidationError extends FaultlineError {
  readonly errors: ValidationIssue[];

  constructor(message = "Validation Error", errors: ValidationIssue[] = []) {
    super(message, 422, "VALIDATION_ERROR", errors);
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * 429 Too Many Requests error.
 */
export class RateLimitError extends FaultlineError {
  readonly retryAfter?: number;

  constructor(message = "Too Many Requests", retryAfter?: number) {
    super(
      message,
      429,
      "RATE_LIMIT_EXCEEDED",
      retryAfter ? { retryAfter } : undefined,
    );
    this.name = "RateLimitError";
    this.retryAfter = retryAfter;
  }

  override headers(): Record<string, string> {
    return this.retryAfter ? { "Retry-After": String(this.retryAfter) } : {};
  }
}

/**
 * 500 Internal Server Error.
 */
export class InternalError extends FaultlineError {
  constructor(message = "Internal Server Error", details?: unknown) {
    super(message, 500, "INTERNAL_ERROR", details, false);
    this.name = "InternalError";
  }
}

/**
 * 503 Service Unavailable error.
 */
export class ServiceUnavailableError extends FaultlineError {
  readonly retryAfter?: number;

  constructor(message = "Service Unavailable", retryAfter?: number) {
    super(
      message,
      503,
      "SERVICE_UNAVAILABLE",
      retryAfter ? { retryAfter } : undefined,
    );
    this.name = "ServiceUnavailableError";
    this.retryAfter = retryAfter;
  }

  override headers(): Record<string, string> {
    return this.retryAfter ? { "Retry-After": String(this.retryAfter) } : {};
  }
}
