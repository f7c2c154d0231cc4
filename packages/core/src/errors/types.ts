/**
 * Error type definitions.
 */

/**
 * Validation issue structure.
 */
export interface ValidationIssue {
  /** Field path (e.g., "user.email" or "items[0].name") */
  field: string;
  /** Error message */
  message: string;
  /** Error code (e.g., "required", "invalid_type") */
  code?: string;
}

/**
 * Standard error response structure.
 */
export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    status: number;
    details?: unknown;
    stack?: string[];
  };
}

/**
 * Any class whose instances are faults.
 *
 * `Error` itself qualifies and is the root of every ancestor chain.
 */
export type FaultType<T extends Error = Error> = abstract new (
  ...args: never[]
) => T;

/**
 * Converts an arbitrary thrown value into an Error instance.
 */
export type ErrorTransformer = (error: unknown) => Error;

/**
 * Response format used when rendering a fault.
 *
 * `auto` negotiates through the request's Accept header.
 */
export type FallbackFormat = "auto" | "html" | "text" | "json";
