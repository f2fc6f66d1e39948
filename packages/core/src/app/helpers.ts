const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
const OCTET_CONTENT_TYPE = "application/octet-stream";
const TEXT_HEADERS: HeadersInit = { "Content-Type": TEXT_CONTENT_TYPE };
const BINARY_HEADERS: HeadersInit = { "Content-Type": OCTET_CONTENT_TYPE };

export const TEXT_INIT_200: ResponseInit = { headers: TEXT_HEADERS };
export const BINARY_INIT_200: ResponseInit = { headers: BINARY_HEADERS };

/**
 * Status nginx uses for a client that went away before the response.
 */
export const CLIENT_CLOSED_REQUEST = 499;

/**
 * Join a group prefix and a route path. An empty or `/` path binds to the
 * prefix itself.
 *
 * @example
 * joinPaths("/api", "/users") // "/api/users"
 * joinPaths("/api/", "users") // "/api/users"
 * joinPaths("/api", "/")      // "/api"
 * joinPaths("/", "/")         // "/"
 */
export function joinPaths(base: string, path: string): string {
  const normalizedBase = base.endsWith("/") ? base.slice(0, -1) : base;

  if (path === "" || path === "/") {
    return normalizedBase === "" ? "/" : normalizedBase;
  }

  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  return `${normalizedBase}${normalizedPath}`;
}

/**
 * Pathname of a request URL without building a URL object.
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

/**
 * Convert a handler's return value into a Response.
 */
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
    if (result instanceof ArrayBuffer || result instanceof ReadableStream) {
      return new Response(result, BINARY_INIT_200);
    }
    return Response.json(result);
  }
  if (typeof result === "string") {
    return new Response(result, TEXT_INIT_200);
  }
  return Response.json(result);
}
