/**
 * Faultline - routes with route-scoped exception handlers.
 *
 * @example
 * ```typescript
 * import { Faultline, NotFoundError } from "@faultline/core";
 *
 * const app = new Faultline();
 *
 * app.get("/", () => ({ message: "Hello from Faultline!" }), { name: "home" });
 * app.exception(NotFoundError, () => new Response("gone", { status: 404 }));
 *
 * const response = await app.fetch(new Request("http://localhost/"));
 * ```
 *
 * @module
 */

export * from "@faultline/core";
