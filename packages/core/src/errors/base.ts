/**
 * Base error class for Faultline.
 */

import type { ErrorResponse } from "./types.ts";

/**
 * Base error class for all Faultline errors.
 *
 * Carries an HTTP status, a machine-readable code and a `quiet` flag.
 * Quiet errors are not logged by the default error path unless the
 * application turns on `noisyExceptions`.
 *
 * @example
 * ```typescript
 * throw new FaultlineError("Something went wrong", 500, "INTERNAL_ERROR");
 * ```
 */
export class FaultlineError extends Error {
  /** HTTP status code */
  readonly status: number;
  /** Machine-readable error code */
  readonly code: string;
  /** Additional error details (shown in debug mode) */
  readonly details?: unknown;
  /** Whether this error is operational (expected) vs programming error */
  readonly isOperational: boolean;
  /** Suppresses logging in the default error path */
  readonly quiet: boolean;

  constructor(
    message: string,
    status = 500,
    code = "INTERNAL_ERROR",
    details?: unknown,
    isOperational = true,
    quiet = status < 500,
  ) {
    super(message);
    this.name = "FaultlineError";
    this.status = status;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    this.quiet = quiet;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Extra headers the rendered response should carry.
   */
  headers(): Record<string, string> {
    return {};
  }

  /**
   * Convert error to JSON response object.
   * @param debug Include stack trace and details
   */
  toJSON(debug = false): ErrorResponse {
    const response: ErrorResponse = {
      error: {
        message: this.message,
        code: this.code,
        status: this.status,
      },
    };

    if (debug) {
      if (this.details !== undefined) {
        response.error.details = this.details;
      }
      if (this.stack) {
        response.error.stack = this.stack.split("\n").map((l) => l.trim());
      }
    }

    return response;
  }
}
