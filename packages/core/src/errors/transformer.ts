/**
 * Fault normalization and inspection.
 */

import { FaultlineError } from "~/errors/base.ts";
import { BadRequestError, InternalError } from "~/errors/http.ts";

/**
 * String form of a thrown non-Error value.
 *
 * Values without a usable `toString` (e.g. `Object.create(null)`) fall back
 * to their `[object Tag]` form.
 */
export function describeValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    try {
      return Object.prototype.toString.call(value);
    } catch {
      return "[unprintable value]";
    }
  }
}

/**
 * Normalize any thrown value into an Error.
 *
 * Error instances pass through untouched so their runtime class still
 * drives handler resolution. Everything else is wrapped in an InternalError.
 */
export function toFault(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  return new InternalError("An unexpected error occurred", {
    value: describeValue(error),
  });
}

/**
 * Convert any error into a FaultlineError, mapping well-known runtime
 * errors onto HTTP errors.
 */
export function defaultErrorTransformer(error: unknown): FaultlineError {
  if (error instanceof FaultlineError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === "SyntaxError" && error.message.includes("JSON")) {
      return new BadRequestError("Invalid JSON in request body", {
        originalMessage: error.message,
      });
    }

    return new InternalError(error.message, { originalName: error.name });
  }

  return new InternalError("An unexpected error occurred", {
    value: describeValue(error),
  });
}

/**
 * Type guard to check if a value is a FaultlineError.
 */
export function isFaultlineError(error: unknown): error is FaultlineError {
  return error instanceof FaultlineError;
}

/**
 * Type guard to check if an error is operational (expected).
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof FaultlineError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Whether a fault opted out of default-path logging.
 *
 * Any object may carry the flag; only a literal `true` counts.
 */
export function isQuiet(error: unknown): boolean {
  return typeof error === "object" && error !== null && "quiet" in error &&
    error.quiet === true;
}
