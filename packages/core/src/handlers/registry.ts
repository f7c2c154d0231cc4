import { createLogger } from "~/app/logger.ts";
import type { Logger } from "~/app/types.ts";
import type { FaultType } from "~/errors/types.ts";
import { ancestorsOf } from "~/handlers/hierarchy.ts";
import type {
  AncestorResolver,
  HandlerEntry,
  LookupStrategy,
} from "~/handlers/types.ts";

export interface ErrorHandlerRegistryOptions {
  /** Resolution strategy, fixed for the registry's lifetime */
  lookup?: LookupStrategy;
  /** Ancestor chain source; defaults to the memoized prototype walk */
  ancestors?: AncestorResolver;
  logger?: Logger;
}

type Scope = string | null;

/**
 * Maps (fault class, route scope) pairs to error handlers.
 *
 * Resolution tries, in order: the exact class at the route scope, the
 * exact class globally, then each ancestor (nearest first) at the route
 * scope, then each ancestor globally. Every outcome, including "no
 * handler", is cached per (runtime class, route scope).
 *
 * The cache is never invalidated. Register every handler before the first
 * `resolve`: a later `add` can be shadowed by a cached result, and logs a
 * warning when it happens.
 *
 * @example
 * ```typescript
 * const registry = new ErrorHandlerRegistry<ErrorHandlerFn>();
 * registry.add(ValidationError, renderJSON);
 * registry.add(ValidationError, renderHTML, ["web"]);
 *
 * registry.resolve(new ValidationError(), "web"); // renderHTML
 * registry.resolve(new ValidationError(), "api"); // renderJSON
 * registry.resolve(new Error("boom"), "api"); // null
 * ```
 */
export class ErrorHandlerRegistry<THandler> {
  readonly lookup: LookupStrategy;

  private readonly handlers = new Map<Function, Map<Scope, THandler>>();
  private readonly cache = new Map<Function, Map<Scope, THandler | null>>();
  private readonly ancestors: AncestorResolver;
  private readonly logger: Logger;
  private resolved = false;

  constructor(options: ErrorHandlerRegistryOptions = {}) {
    this.lookup = options.lookup ?? "route";
    this.ancestors = options.ancestors ?? ancestorsOf;
    this.logger = options.logger ??
      createLogger({ name: "faultline:registry" });
  }

  /**
   * Register `handler` for `type`.
   *
   * With route scopes, one entry is created per scope; without, a single
   * global entry. Re-registering the same (type, scope) replaces it.
   */
  add(type: FaultType, handler: THandler, routeScopes?: Iterable<string>): void {
    const scopes: Scope[] = routeScopes ? [...routeScopes] : [];
    if (scopes.length === 0) {
      scopes.push(null);
    }

    if (this.resolved) {
      this.logger.warn(
        "Error handler registered after the first resolution; cached lookups may shadow it",
        { type: type.name, scopes: scopes.join(",") },
      );
    }

    if (this.lookup === "global" && scopes.some((scope) => scope !== null)) {
      this.logger.warn(
        "Route-scoped error handler is ignored by global lookup",
        { type: type.name, scopes: scopes.join(",") },
      );
    }

    let byScope = this.handlers.get(type);
    if (!byScope) {
      byScope = new Map();
      this.handlers.set(type, byScope);
    }
    for (const scope of scopes) {
      byScope.set(scope, handler);
    }
  }

  /**
   * Find the handler for a fault raised under `routeScope`.
   *
   * @returns The handler, or null when nothing matches. Never throws.
   */
  resolve(fault: Error, routeScope?: string | null): THandler | null {
    this.resolved = true;

    const type = fault.constructor;
    const scope: Scope = this.lookup === "route" ? routeScope ?? null : null;

    let cached = this.cache.get(type);
    if (cached?.has(scope)) {
      return cached.get(scope) ?? null;
    }

    const handler = this.find(type, scope);

    if (!cached) {
      cached = new Map();
      this.cache.set(type, cached);
    }
    cached.set(scope, handler);

    return handler;
  }

  private find(type: Function, scope: Scope): THandler | null {
    const scopes: Scope[] = scope === null ? [null] : [scope, null];

    const exact = this.handlers.get(type);
    if (exact) {
      for (const s of scopes) {
        const handler = exact.get(s);
        if (handler !== undefined) return handler;
      }
    }

    const ancestors = this.ancestors(type);
    for (const s of scopes) {
      for (const ancestor of ancestors) {
        const handler = this.handlers.get(ancestor)?.get(s);
        if (handler !== undefined) return handler;
      }
    }

    return null;
  }

  /**
   * Every registered (type, scope, handler) triple.
   */
  entries(): HandlerEntry<THandler>[] {
    const result: HandlerEntry<THandler>[] = [];
    for (const [type, byScope] of this.handlers) {
      for (const [scope, handler] of byScope) {
        result.push({ type, scope, handler });
      }
    }
    return result;
  }

  get size(): number {
    let count = 0;
    for (const byScope of this.handlers.values()) {
      count += byScope.size;
    }
    return count;
  }

  get cacheSize(): number {
    let count = 0;
    for (const byScope of this.cache.values()) {
      count += byScope.size;
    }
    return count;
  }
}
