/**
 * Error handler type definitions.
 */

/**
 * What the dispatch path reads from a request.
 *
 * Every field is optional: faults can happen before routing completes,
 * and reading `url` may itself throw.
 */
export interface FaultRequest {
  readonly url?: string | URL;
  /** Route name, used as the handler lookup scope */
  readonly name?: string;
  readonly headers?: Headers;
}

export type HandlerResult = Response | null | undefined | void;

/**
 * Renders a response for a fault.
 *
 * Returning nothing hands the fault to the built-in default.
 */
export type ErrorHandlerFn<TRequest extends FaultRequest = FaultRequest> = (
  request: TRequest | null,
  error: Error,
) => HandlerResult | Promise<HandlerResult>;

/**
 * `route` consults route-scoped entries before global ones;
 * `global` ignores the route name entirely.
 */
export type LookupStrategy = "route" | "global";

/**
 * Returns the superclasses of a fault class, nearest first, ending at Error.
 */
export type AncestorResolver = (type: Function) => readonly Function[];

export interface HandlerEntry<THandler> {
  type: Function;
  scope: string | null;
  handler: THandler;
}
