/**
 * Request context for Waymark.
 *
 * Created by the dispatcher for one matched request and dropped once the
 * response exists. Guards and handlers share it, and nothing else does.
 */

import type { ParamEntries } from "@waymark/router";
import {
  BadRequestError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
} from "../errors/http.ts";

const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";

const TEXT_HEADERS = Object.freeze({ "Content-Type": TEXT_CONTENT_TYPE });

const TEXT_INIT_200: ResponseInit = { headers: TEXT_HEADERS };

const EMPTY_PARAMS: ParamEntries = Object.freeze([]);

export interface ContextInit {
  /** Captured path parameters in path order. */
  params?: ParamEntries;
  /** Pattern of the matched route. */
  pattern?: string;
  /** Raw pathname, when the caller already extracted it. */
  pathname?: string;
}

/**
 * Request context passed to guards and handlers.
 *
 * @example
 * ```typescript
 * router.get("/users/:id", (ctx) => {
 *   const id = ctx.params.id;
 *   const auth = ctx.headers.get("Authorization");
 *   return ctx.json({ userId: id });
 * });
 * ```
 */
export class Context<
  TParams extends Record<string, string> = Record<string, string>,
> {
  /**
   * Original HTTP request.
   */
  readonly request: Request;

  /**
   * Route path parameters extracted from URL.
   *
   * @example
   * For route "/users/:id", accessing "/users/123" gives { id: "123" }
   */
  readonly params: Readonly<TParams>;

  /**
   * The same parameters as ordered `[name, value]` pairs.
   */
  readonly paramEntries: ParamEntries;

  /**
   * Pattern of the route that matched, e.g. "/users/:id".
   */
  readonly pattern: string;

  /**
   * Custom state for sharing data between guards and the handler.
   *
   * @example
   * ```typescript
   * // In an auth guard
   * ctx.state.user = { id: 123, name: "Alice" };
   *
   * // In the route handler
   * const user = ctx.state.user;
   * ```
   */
  readonly state: Record<string, unknown> = Object.create(null);

  private _url: URL | null = null;
  private _pathname: string | null;
  private _body: Promise<Uint8Array> | null = null;

  constructor(request: Request, init: ContextInit = {}) {
    this.request = request;
    this.paramEntries = init.params ?? EMPTY_PARAMS;
    this.params = Object.freeze(paramsToObject<TParams>(this.paramEntries));
    this.pattern = init.pattern ?? "";
    this._pathname = init.pathname ?? null;
  }

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
   * Get URL query parameters. Parsed once per context.
   *
   * @example
   * ```typescript
   * // For URL "/search?q=routing&limit=10"
   * const query = ctx.query.get("q"); // "routing"
   * const limit = ctx.query.get("limit"); // "10"
   * ```
   */
  get query(): URLSearchParams {
    return this.url.searchParams;
  }

  /**
   * Get raw request pathname.
   *
   * @example
   * For URL "http://localhost:8000/users/123?foo=bar"
   * returns "/users/123"
   */
  get path(): string {
    if (this._pathname === null) {
      this._pathname = this.url.pathname;
    }
    return this._pathname;
  }

  /**
   * Read the request body once; later calls share the same bytes.
   */
  body(): Promise<Uint8Array> {
    if (!this._body) {
      this._body = this.request.arrayBuffer().then((buf) =>
        new Uint8Array(buf)
      );
    }
    return this._body;
  }

  /**
   * Helper to create JSON response.
   *
   * @param data - Object to serialize as JSON
   * @param status - HTTP status code
   */
  json(data: unknown, status = 200): Response {
    if (status === 200) {
      return Response.json(data);
    }
    return Response.json(data, { status });
  }

  /**
   * Helper to create text response.
   *
   * @param text - Text content
   * @param status - HTTP status code
   */
  text(text: string, status = 200): Response {
    if (status === 200) {
      return new Response(text, TEXT_INIT_200);
    }
    return new Response(text, { status, headers: TEXT_HEADERS });
  }

  noContent(): Response {
    return new Response(null, { status: 204 });
  }

  /*
   * Short-circuit answers for guards. Bodies match the ones the dispatcher
   * writes for thrown errors.
   */

  notFound(message?: string): Response {
    return new NotFoundError(message).toResponse();
  }

  badRequest(message?: string): Response {
    return new BadRequestError(message).toResponse();
  }

  unauthorized(message?: string): Response {
    return new UnauthorizedError(message).toResponse();
  }

  forbidden(message?: string): Response {
    return new ForbiddenError(message).toResponse();
  }
}

function paramsToObject<TParams extends Record<string, string>>(
  entries: ParamEntries,
): TParams {
  const params: Record<string, string> = Object.create(null);
  for (const [name, value] of entries) {
    params[name] = value;
  }
  return params as TParams;
}
