const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
const OCTET_CONTENT_TYPE = "application/octet-stream";
const TEXT_HEADERS: HeadersInit = { "Content-Type": TEXT_CONTENT_TYPE };
const BINARY_HEADERS: HeadersInit = { "Content-Type": OCTET_CONTENT_TYPE };

export const TEXT_INIT_200: ResponseInit = { headers: TEXT_HEADERS };
export const BINARY_INIT_200: ResponseInit = { headers: BINARY_HEADERS };

export function normalizePath(base: string, path: string): string {
  if (base === "/") {
    return path.startsWith("/") ? path : `/${path}`;
  }
  const normalizedBase = base.endsWith("/") ? base.slice(0, -1) : base;
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  return `${normalizedBase}${normalizedPath}`;
}

/**
 * Pathname of an absolute URL string, without building a URL object.
 */
export function extractPathname(url: string): string {
  const schemeEnd = url.indexOf("://");
  if (schemeEnd === -1) return "/";

  const pathStart = url.indexOf("/", schemeEnd + 3);
  if (pathStart === -1) return "/";

  let pathEnd = url.indexOf("?", pathStart);
  if (pathEnd === -1) pathEnd = url.indexOf("#", pathStart);
  if (pathEnd === -1) pathEnd = url.length;
  return url.slice(pathStart, pathEnd);
}

export function resultToResponse(result: unknown): Response {
  if (result instanceof Response) {
    return result;
  }

  if (result == null) {
    return new Response(null, { status: 204 });
  }

  if (typeof result === "object") {
    if (result instanceof Uint8Array) {
      return new Response(result as BodyInit, BINARY_INIT_200);
    }
    if (result instanceof ArrayBuffer) {
      return new Response(result, BINARY_INIT_200);
    }
    if (result instanceof ReadableStream) {
      return new Response(result, BINARY_INIT_200);
    }
    return Response.json(result);
  }
  if (typeof result === "string") {
    return new Response(result, TEXT_INIT_200);
  }
  return Response.json(result);
}
