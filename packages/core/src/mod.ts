/**
 * Faultline Core
 *
 * Routes, route-scoped exception handlers and a dispatcher that never lets
 * a failing error handler escape.
 */

export { Faultline } from "~/app/mod.ts";
export {
  ConfigError,
  configFromEnv,
  createLogger,
  DEFAULT_SETTINGS,
  FaultlineConfigSchema,
  LOG_LEVEL_NAMES,
  resolveSettings,
  validateSettings,
} from "~/app/mod.ts";
export type {
  ExceptionOptions,
  FaultlineConfig,
  FaultlineSettings,
  LogFields,
  Logger,
  LoggerConfig,
  LogLevel,
  LogStream,
  RouteOptions,
} from "~/app/mod.ts";

export { Context } from "~/context/mod.ts";

export {
  BadRequestError,
  ConflictError,
  defaultErrorTransformer,
  describeValue,
  escapeHtml,
  FaultlineError,
  ForbiddenError,
  InternalError,
  isFaultlineError,
  isOperationalError,
  isQuiet,
  MethodNotAllowedError,
  negotiateFormat,
  NotFoundError,
  PayloadTooLargeError,
  RateLimitError,
  renderError,
  RequestTimeoutError,
  ServiceUnavailableError,
  toFault,
  UnauthorizedError,
  ValidationError,
} from "~/errors/mod.ts";
export type {
  ErrorRenderer,
  ErrorResponse,
  ErrorTransformer,
  FallbackFormat,
  FaultType,
  RenderableRequest,
  ValidationIssue,
} from "~/errors/mod.ts";

export {
  ancestorsOf,
  describeUrl,
  DOUBLE_FAULT_BODY,
  ErrorDispatcher,
  ErrorHandlerRegistry,
  fail,
  settle,
  succeed,
} from "~/handlers/mod.ts";
export type {
  AncestorResolver,
  ErrorDispatcherOptions,
  ErrorHandlerFn,
  ErrorHandlerRegistryOptions,
  FaultRequest,
  HandlerEntry,
  HandlerResult,
  LookupStrategy,
  Outcome,
} from "~/handlers/mod.ts";

export { HTTP_METHODS, Router } from "~/router/mod.ts";
export type { Handler, HttpMethod, Match } from "~/router/mod.ts";
