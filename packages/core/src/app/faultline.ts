import { resolveSettings } from "~/app/config.ts";
import { extractPathname, normalizePath } from "~/app/helpers.ts";
import { createLogger } from "~/app/logger.ts";
import type {
  ExceptionOptions,
  FaultlineConfig,
  FaultlineSettings,
  Logger,
  RouteOptions,
} from "~/app/types.ts";
import { Context } from "~/context/mod.ts";
import { MethodNotAllowedError, NotFoundError } from "~/errors/http.ts";
import type { FaultType } from "~/errors/types.ts";
import { ErrorDispatcher } from "~/handlers/dispatcher.ts";
import { fail, type Outcome, settle } from "~/handlers/outcome.ts";
import type { ErrorHandlerFn } from "~/handlers/types.ts";
import {
  type Handler,
  HTTP_METHODS,
  type HttpMethod,
  Router,
} from "~/router/mod.ts";

/**
 * Application: named routes plus exception handlers scoped to them.
 *
 * Every fault raised by a route, and every unmatched request, goes through
 * `errorHandler`. Handlers registered with `routes` apply only to faults
 * from those named routes.
 *
 * @example
 * ```typescript
 * const app = new Faultline({ debug: true });
 *
 * app.get("/users/:id", (ctx) => loadUser(ctx.params.id), { name: "users" });
 *
 * app.exception(NotFoundError, (ctx, error) =>
 *   Response.json({ missing: error.message }, { status: 404 }),
 *   { routes: ["users"] },
 * );
 *
 * const response = await app.fetch(new Request("http://localhost/users/1"));
 * ```
 */
export class Faultline {
  readonly settings: Readonly<Required<FaultlineSettings>>;
  readonly errorHandler: ErrorDispatcher<Context>;
  readonly logger: Logger;

  private router = new Router<Context>();

  constructor(config: FaultlineConfig = {}) {
    const { errorHandler, logger, ...settings } = config;
    this.settings = resolveSettings(settings);

    this.logger = logger ?? createLogger({
      name: "faultline",
      level: this.settings.logLevel,
      json: this.settings.logJson,
    });

    if (errorHandler) {
      this.errorHandler = ErrorDispatcher.finalize(
        errorHandler,
        this.settings.fallback,
      );
      if (config.debug !== undefined) {
        this.errorHandler.debug = config.debug;
      }
      if (config.noisyExceptions !== undefined) {
        this.errorHandler.noisyExceptions = config.noisyExceptions;
      }
      // The registry's strategy is fixed when the dispatcher is built.
      if (
        config.lookup !== undefined &&
        config.lookup !== this.errorHandler.registry.lookup
      ) {
        this.logger.warn(
          "Lookup setting ignored; the supplied error handler keeps its own",
          { lookup: config.lookup, actual: this.errorHandler.registry.lookup },
        );
      }
    } else {
      this.errorHandler = new ErrorDispatcher<Context>({
        debug: this.settings.debug,
        fallback: this.settings.fallback,
        noisyExceptions: this.settings.noisyExceptions,
        lookup: this.settings.lookup,
        logger: this.logger.child({ name: "errors" }),
      });
    }
  }

  get(path: string, handler: Handler<Context>, options?: RouteOptions): this {
    return this.route("GET", path, handler, options);
  }

  post(path: string, handler: Handler<Context>, options?: RouteOptions): this {
    return this.route("POST", path, handler, options);
  }

  put(path: string, handler: Handler<Context>, options?: RouteOptions): this {
    return this.route("PUT", path, handler, options);
  }

  patch(path: string, handler: Handler<Context>, options?: RouteOptions): this {
    return this.route("PATCH", path, handler, options);
  }

  delete(
    path: string,
    handler: Handler<Context>,
    options?: RouteOptions,
  ): this {
    return this.route("DELETE", path, handler, options);
  }

  head(path: string, handler: Handler<Context>, options?: RouteOptions): this {
    return this.route("HEAD", path, handler, options);
  }

  options(
    path: string,
    handler: Handler<Context>,
    options?: RouteOptions,
  ): this {
    return this.route("OPTIONS", path, handler, options);
  }

  /**
   * Register an error handler for one or more fault classes.
   *
   * Subclasses of a registered class are handled too unless they have a
   * closer registration. Register handlers before serving requests.
   */
  exception(
    types: FaultType | FaultType[],
    handler: ErrorHandlerFn<Context>,
    options: ExceptionOptions = {},
  ): this {
    const list = Array.isArray(types) ? types : [types];
    const routes = options.routes ? [...options.routes] : undefined;
    for (const type of list) {
      this.errorHandler.add(type, handler, routes);
    }
    return this;
  }

  fetch = (req: Request): Promise<Response> => {
    return this.handleRequest(req);
  };

  private route(
    method: HttpMethod,
    path: string,
    handler: Handler<Context>,
    options: RouteOptions = {},
  ): this {
    const name = options.name ?? (handler.name || undefined);
    this.router.add(
      method,
      normalizePath(this.settings.prefix, path),
      handler,
      name,
    );
    return this;
  }

  private async handleRequest(req: Request): Promise<Response> {
    const pathname = extractPathname(req.url);
    const upper = req.method.toUpperCase();
    const method = HTTP_METHODS.find((m) => m === upper);

    const match = method ? this.router.find(method, pathname) : null;
    const ctx = new Context(req, match?.params, match?.name, pathname);

    let outcome: Outcome;
    if (match) {
      outcome = await settle(() => match.handler(ctx));
    } else {
      const allowed = this.router.allowedMethods(pathname);
      outcome = fail(
        allowed.length > 0
          ? new MethodNotAllowedError(
            `Method ${req.method} not allowed for URL ${pathname}`,
            allowed,
          )
          : new NotFoundError(`Requested URL ${pathname} not found`),
      );
    }

    return await this.errorHandler.complete(ctx, outcome);
  }
}
