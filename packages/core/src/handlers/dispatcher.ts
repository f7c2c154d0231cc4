import { createLogger } from "~/app/logger.ts";
import type { Logger } from "~/app/types.ts";
import { type ErrorRenderer, renderError } from "~/errors/render.ts";
import { isQuiet, toFault } from "~/errors/transformer.ts";
import type { FallbackFormat, FaultType } from "~/errors/types.ts";
import type { Outcome } from "~/handlers/outcome.ts";
import { ErrorHandlerRegistry } from "~/handlers/registry.ts";
import type {
  ErrorHandlerFn,
  FaultRequest,
  LookupStrategy,
} from "~/handlers/types.ts";

const TEXT_HEADERS = Object.freeze({
  "Content-Type": "text/plain; charset=utf-8",
});

export const DOUBLE_FAULT_BODY = "An error occurred while handling an error";

export interface ErrorDispatcherOptions<TRequest extends FaultRequest> {
  debug?: boolean;
  fallback?: FallbackFormat;
  /** Log quiet faults too */
  noisyExceptions?: boolean;
  /** Ignored when `registry` is given */
  lookup?: LookupStrategy;
  registry?: ErrorHandlerRegistry<ErrorHandlerFn<TRequest>>;
  renderer?: ErrorRenderer;
  logger?: Logger;
}

/**
 * Best-effort URL of a request for log lines and debug output.
 */
export function describeUrl(request: FaultRequest | null): string {
  if (!request) return "unknown";
  try {
    const url = request.url;
    return url === undefined ? "unknown" : String(url);
  } catch {
    return "unknown";
  }
}

/**
 * Turns faults into responses.
 *
 * Resolves a registered handler for the fault, falls back to the built-in
 * default renderer, and contains faults thrown by the handlers
 * themselves: a failing handler yields a plain 500 response, never an
 * exception.
 *
 * Subclasses may override `default`, e.g. to report faults elsewhere:
 *
 * @example
 * ```typescript
 * class ReportingDispatcher extends ErrorDispatcher<Context> {
 *   override default(request: Context | null, fault: Error) {
 *     tracker.report(fault);
 *     return super.default(request, fault);
 *   }
 * }
 * ```
 */
export class ErrorDispatcher<TRequest extends FaultRequest = FaultRequest> {
  debug: boolean;
  fallback: FallbackFormat;
  noisyExceptions: boolean;

  readonly registry: ErrorHandlerRegistry<ErrorHandlerFn<TRequest>>;
  protected readonly renderer: ErrorRenderer;
  protected readonly logger: Logger;

  constructor(options: ErrorDispatcherOptions<TRequest> = {}) {
    this.debug = options.debug ?? false;
    this.fallback = options.fallback ?? "auto";
    this.noisyExceptions = options.noisyExceptions ?? false;
    this.renderer = options.renderer ?? renderError;
    this.logger = options.logger ?? createLogger({ name: "faultline:errors" });
    this.registry = options.registry ??
      new ErrorHandlerRegistry<ErrorHandlerFn<TRequest>>({
        lookup: options.lookup,
        logger: this.logger,
      });
  }

  /**
   * Merge an application-level fallback format into a dispatcher.
   *
   * The application's format wins only when it is not `auto` and the
   * dispatcher was left on `auto`.
   */
  static finalize<T extends FaultRequest>(
    dispatcher: ErrorDispatcher<T>,
    fallback?: FallbackFormat,
  ): ErrorDispatcher<T> {
    if (fallback && fallback !== "auto" && dispatcher.fallback === "auto") {
      dispatcher.fallback = fallback;
    }
    return dispatcher;
  }

  add(
    type: FaultType,
    handler: ErrorHandlerFn<TRequest>,
    routeScopes?: Iterable<string>,
  ): void {
    this.registry.add(type, handler, routeScopes);
  }

  /**
   * Produce the response for a fault raised while serving `request`.
   *
   * `request` is null when the fault happened before a request existed.
   */
  async respond(request: TRequest | null, fault: Error): Promise<Response> {
    const handler = this.registry.resolve(fault, request?.name);
    let running = handler ? handler.name || "anonymous" : "default";

    try {
      const response = handler ? await handler(request, fault) : null;
      if (response) {
        return response;
      }
      running = "default";
      return await this.default(request, fault);
    } catch (secondary) {
      return this.contain(request, running, secondary);
    }
  }

  /**
   * Turn an outcome into a response; faults go through `respond`.
   */
  async complete(request: TRequest | null, outcome: Outcome): Promise<Response> {
    if (outcome.ok) {
      return outcome.response;
    }
    return await this.respond(request, outcome.fault);
  }

  /**
   * Built-in handling: log the fault and render it.
   */
  default(request: TRequest | null, fault: Error): Response | Promise<Response> {
    this.log(request, fault);
    return this.renderer(request, fault, this.debug, this.fallback);
  }

  /**
   * Log a fault unless it is quiet and `noisyExceptions` is off.
   */
  log(request: TRequest | null, fault: Error): void {
    if (isQuiet(fault) && !this.noisyExceptions) {
      return;
    }
    this.logger.error(
      `Exception occurred while handling uri: ${describeUrl(request)}`,
      { error: fault },
    );
  }

  private contain(
    request: TRequest | null,
    handlerName: string,
    secondary: unknown,
  ): Response {
    const message = `Exception raised in exception handler "${handlerName}" ` +
      `for uri: ${describeUrl(request)}`;
    this.logger.error(message, { error: toFault(secondary) });

    return new Response(this.debug ? message : DOUBLE_FAULT_BODY, {
      status: 500,
      headers: TEXT_HEADERS,
    });
  }
}
