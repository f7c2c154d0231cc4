/**
 * Default error renderer.
 *
 * Turns a fault into a text, HTML or JSON response. The format is either
 * forced by the fallback setting or negotiated from the Accept header.
 */

import type { FaultlineError } from "~/errors/base.ts";
import {
  defaultErrorTransformer,
  isOperationalError,
} from "~/errors/transformer.ts";
import type { ErrorResponse, FallbackFormat } from "~/errors/types.ts";

const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
const HTML_CONTENT_TYPE = "text/html; charset=utf-8";
const JSON_CONTENT_TYPE = "application/json";

const GENERIC_MESSAGE =
  "The server encountered an internal error and cannot complete your request.";

const STATUS_TEXT: Record<number, string> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  408: "Request Timeout",
  409: "Conflict",
  413: "Payload Too Large",
  422: "Unprocessable Entity",
  429: "Too Many Requests",
  500: "Internal Server Error",
  502: "Bad Gateway",
  503: "Service Unavailable",
  504: "Gateway Timeout",
};

/**
 * The parts of a request the renderer looks at.
 */
export interface RenderableRequest {
  readonly headers?: Headers;
}

/**
 * Renders a fault into a response.
 */
export type ErrorRenderer = (
  request: RenderableRequest | null,
  fault: Error,
  debug: boolean,
  fallback: FallbackFormat,
) => Response;

type Format = Exclude<FallbackFormat, "auto">;

interface MediaRange {
  type: string;
  q: number;
}

function parseAccept(header: string): MediaRange[] {
  const ranges: MediaRange[] = [];
  for (const part of header.split(",")) {
    const [type, ...params] = part.split(";").map((s) => s.trim());
    if (!type) continue;
    let q = 1;
    for (const param of params) {
      if (param.startsWith("q=")) {
        const value = Number(param.slice(2));
        q = Number.isNaN(value) ? 0 : value;
      }
    }
    ranges.push({ type: type.toLowerCase(), q });
  }
  // Array.prototype.sort is stable, so equal q keeps header order.
  return ranges.filter((r) => r.q > 0).sort((a, b) => b.q - a.q);
}

function formatFor(mediaType: string): Format | null {
  if (mediaType === "text/html") return "html";
  if (mediaType === "application/json" || mediaType.endsWith("+json")) {
    return "json";
  }
  if (mediaType === "text/plain") return "text";
  return null;
}

/**
 * Pick the response format for a request.
 */
export function negotiateFormat(
  request: RenderableRequest | null,
  fallback: FallbackFormat,
): Format {
  if (fallback !== "auto") {
    return fallback;
  }

  const accept = request?.headers?.get("Accept");
  if (!accept) {
    return "text";
  }

  for (const range of parseAccept(accept)) {
    const format = formatFor(range.type);
    if (format) return format;
  }
  return "text";
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function renderText(title: string, message: string, stack?: string): string {
  const body = `${title}\n\n${message}`;
  return stack ? `${body}\n\n${stack}` : body;
}

function renderHtml(title: string, message: string, stack?: string): string {
  const lines = [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
    `<h1>${escapeHtml(title)}</h1>`,
    `<p>${escapeHtml(message)}</p>`,
  ];
  if (stack) {
    lines.push(`<pre>${escapeHtml(stack)}</pre>`);
  }
  lines.push("</body>", "</html>");
  return lines.join("\n");
}

function renderJson(
  error: FaultlineError,
  fault: Error,
  message: string,
  debug: boolean,
): ErrorResponse {
  const body = error.toJSON(debug);
  body.error.message = message;
  if (debug && fault.stack) {
    body.error.stack = fault.stack.split("\n").map((l) => l.trim());
  }
  return body;
}

/**
 * Render a fault as an error response.
 *
 * Messages of unexpected (non-operational) faults are replaced by a
 * generic sentence unless `debug` is on. Debug output adds the stack.
 *
 * @example
 * ```typescript
 * const response = renderError(ctx, new NotFoundError(), false, "json");
 * // 404 {"error":{"message":"Not Found","code":"NOT_FOUND","status":404}}
 * ```
 */
export const renderError: ErrorRenderer = (request, fault, debug, fallback) => {
  const error = defaultErrorTransformer(fault);
  const status = error.status;
  const title = `${status} ${STATUS_TEXT[status] ?? "Error"}`;
  const message = debug || isOperationalError(error)
    ? error.message
    : GENERIC_MESSAGE;
  const stack = debug ? fault.stack : undefined;
  const format = negotiateFormat(request, fallback);

  if (format === "json") {
    return new Response(
      JSON.stringify(renderJson(error, fault, message, debug)),
      {
        status,
        headers: { ...error.headers(), "Content-Type": JSON_CONTENT_TYPE },
      },
    );
  }

  if (format === "html") {
    return new Response(renderHtml(title, message, stack), {
      status,
      headers: { ...error.headers(), "Content-Type": HTML_CONTENT_TYPE },
    });
  }

  return new Response(renderText(title, message, stack), {
    status,
    headers: { ...error.headers(), "Content-Type": TEXT_CONTENT_TYPE },
  });
};
