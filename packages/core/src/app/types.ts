import type { Context } from "~/context/context.ts";
import type { FallbackFormat } from "~/errors/types.ts";
import type { ErrorDispatcher } from "~/handlers/dispatcher.ts";
import type { LookupStrategy } from "~/handlers/types.ts";

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export type LogFields = Record<string, unknown>;

/**
 * Anything with a `write(chunk)` method, e.g. `process.stdout`.
 */
export interface LogStream {
  write(chunk: string): unknown;
}

export interface LoggerConfig {
  level?: LogLevel;
  name?: string;
  timestamp?: boolean;
  json?: boolean;
  stream?: LogStream;
}

export interface Logger {
  trace(msg: string, data?: LogFields): void;
  debug(msg: string, data?: LogFields): void;
  info(msg: string, data?: LogFields): void;
  warn(msg: string, data?: LogFields): void;
  error(msg: string, data?: LogFields): void;
  fatal(msg: string, data?: LogFields): void;
  child(bindings: LogFields): Logger;
}

/**
 * Serializable application settings. See `FaultlineConfigSchema`.
 */
export interface FaultlineSettings {
  prefix?: string;
  /** Expose stack traces and handler names in error responses */
  debug?: boolean;
  /** Error response format; `auto` negotiates on Accept */
  fallback?: FallbackFormat;
  /** Log quiet faults too */
  noisyExceptions?: boolean;
  /** Whether route names take part in error handler lookup */
  lookup?: LookupStrategy;
  logLevel?: LogLevel;
  logJson?: boolean;
}

export interface FaultlineConfig extends FaultlineSettings {
  /** Custom dispatcher, e.g. a subclass overriding `default` */
  errorHandler?: ErrorDispatcher<Context>;
  logger?: Logger;
}

export interface RouteOptions {
  /** Route name used as the error handler scope */
  name?: string;
}

export interface ExceptionOptions {
  /** Limit the handler to these route names */
  routes?: Iterable<string>;
}
