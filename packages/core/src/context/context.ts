/**
 * Request context for Faultline.
 *
 * Wraps the incoming request with its route params, route name and
 * response helpers. It is also the request error handlers receive.
 */

const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
const HTML_CONTENT_TYPE = "text/html; charset=utf-8";

const TEXT_HEADERS = Object.freeze({ "Content-Type": TEXT_CONTENT_TYPE });
const HTML_HEADERS = Object.freeze({ "Content-Type": HTML_CONTENT_TYPE });

const TEXT_INIT_200: ResponseInit = { headers: TEXT_HEADERS };
const HTML_INIT_200: ResponseInit = { headers: HTML_HEADERS };

/**
 * Request context passed to route handlers and error handlers.
 *
 * @example
 * ```typescript
 * app.get("/users/:id", (ctx) => {
 *   const id = ctx.params.id;
 *   return ctx.json({ userId: id, route: ctx.name });
 * }, { name: "users.show" });
 * ```
 */
export class Context {
  readonly request: Request;

  /**
   * Route path parameters extracted from URL.
   *
   * @example
   * For route "/users/:id", accessing "/users/123" gives { id: "123" }
   */
  readonly params: Record<string, string>;

  /**
   * Name of the matched route; undefined when nothing matched.
   */
  readonly name?: string;

  private _state: Record<string, unknown> | null = null;
  private _url: URL | null = null;
  private _pathname: string | null;

  constructor(
    request: Request,
    params: Record<string, string> = {},
    name?: string,
    pathname?: string,
  ) {
    this.request = request;
    this.params = params;
    this.name = name;
    this._pathname = pathname ?? null;
  }

  /**
   * Custom state for sharing data between a route and its error handler.
   */
  get state(): Record<string, unknown> {
    const state: Record<string, unknown> = this._state ?? Object.create(null);
    this._state = state;
    return state;
  }

  /**
   * Parsed request URL. Throws for a malformed request URL.
   */
  get url(): URL {
    if (!this._url) {
      this._url = new URL(this.request.url);
    }
    return this._url;
  }

  get method(): string {
    return this.request.method;
  }

  get headers(): Headers {
    return this.request.headers;
  }

  /**
   * Get URL query parameters.
   *
   * @example
   * ```typescript
   * // For URL "/search?q=node&limit=10"
   * const query = ctx.query.get("q"); // "node"
   * ```
   */
  get query(): URLSearchParams {
    return this.url.searchParams;
  }

  /**
   * Get request pathname.
   */
  get path(): string {
    if (this._pathname === null) {
      this._pathname = this.url.pathname;
    }
    return this._pathname;
  }

  /**
   * Helper to create JSON response.
   */
  json(data: unknown, status = 200): Response {
    if (status === 200) {
      return Response.json(data);
    }
    return Response.json(data, { status });
  }

  /**
   * Helper to create text response.
   */
  text(text: string, status = 200): Response {
    if (status === 200) {
      return new Response(text, TEXT_INIT_200);
    }
    return new Response(text, { status, headers: TEXT_HEADERS });
  }

  /**
   * Helper to create HTML response.
   */
  html(html: string, status = 200): Response {
    if (status === 200) {
      return new Response(html, HTML_INIT_200);
    }
    return new Response(html, { status, headers: HTML_HEADERS });
  }

  /**
   * Helper to create redirect response.
   */
  redirect(url: string, status = 302): Response {
    return new Response(null, {
      status,
      headers: {
        Location: url,
      },
    });
  }

  noContent(): Response {
    return new Response(null, { status: 204 });
  }
}
