/**
 * Errors module - structured error handling.
 */

export { FaultlineError } from "~/errors/base.ts";
export {
  BadRequestError,
  ConflictError,
  ForbiddenError,
  InternalError,
  MethodNotAllowedError,
  NotFoundError,
  PayloadTooLargeError,
  RateLimitError,
  RequestTimeoutError,
  ServiceUnavailableError,
  UnauthorizedError,
  ValidationError,
} from "~/errors/http.ts";
export {
  defaultErrorTransformer,
  describeValue,
  isFaultlineError,
  isOperationalError,
  isQuiet,
  toFault,
} from "~/errors/transformer.ts";
export { escapeHtml, negotiateFormat, renderError } from "~/errors/render.ts";
export type { ErrorRenderer, RenderableRequest } from "~/errors/render.ts";
export type {
  ErrorResponse,
  ErrorTransformer,
  FallbackFormat,
  FaultType,
  ValidationIssue,
} from "~/errors/types.ts";
