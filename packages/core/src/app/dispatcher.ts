import type { MatchFound, RouteTable } from "@waymark/router";
import { Context } from "../context/context.ts";
import { WaymarkError } from "../errors/base.ts";
import { MalformedPathError } from "../errors/extraction.ts";
import { MethodNotAllowedError, NotFoundError } from "../errors/http.ts";
import type { HandlerBinding } from "../routing/types.ts";
import { resolveConfig } from "./config.ts";
import {
  CLIENT_CLOSED_REQUEST,
  extractPathname,
  resultToResponse,
} from "./helpers.ts";
import type {
  DispatcherConfig,
  Logger,
  ResolvedDispatcherConfig,
} from "./types.ts";

/**
 * Runs requests against a frozen route table.
 *
 * The table is only read, so one dispatcher serves any number of concurrent
 * requests. Each request gets its own {@link Context}.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher(router.build(), { development: true });
 * const response = await dispatcher.fetch(new Request("http://localhost/hello"));
 * ```
 */
export class Dispatcher {
  private readonly table: RouteTable<HandlerBinding>;
  private readonly config: ResolvedDispatcherConfig;
  private readonly log: Logger;

  constructor(
    table: RouteTable<HandlerBinding>,
    config: DispatcherConfig = {},
  ) {
    this.table = table;
    this.config = resolveConfig(config);
    this.log = this.config.logger.child({ name: "dispatch" });
  }

  /**
   * Bound {@link Dispatcher.dispatch}, for servers that take a fetch-style
   * handler.
   */
  readonly fetch = (request: Request): Promise<Response> =>
    this.dispatch(request);

  async dispatch(request: Request): Promise<Response> {
    const start = performance.now();
    const path = extractPathname(request.url);
    const response = await this.route(request, path);

    if (this.log.isLevelEnabled("debug")) {
      this.log.debug("request", {
        method: request.method,
        path,
        status: response.status,
        ms: Math.round((performance.now() - start) * 100) / 100,
      });
    }

    return response;
  }

  private route(request: Request, path: string): Promise<Response> | Response {
    const match = this.table.match(request.method, path);
    const development = this.config.development;

    switch (match.kind) {
      case "found":
        return this.run(request, path, match);
      case "not-found":
        return new NotFoundError().toResponse(development);
      case "method-not-allowed":
        return new MethodNotAllowedError(match.allowed).toResponse(
          development,
        );
      case "malformed-path":
        return new MalformedPathError(match.segment).toResponse(development);
    }
  }

  private async run(
    request: Request,
    path: string,
    match: MatchFound<HandlerBinding>,
  ): Promise<Response> {
    const ctx = new Context(request, {
      params: match.params,
      pattern: match.pattern,
      pathname: path,
    });
    const { guards, handler } = match.binding;

    try {
      for (const guard of guards) {
        if (request.signal.aborted) return this.clientClosed();

        const result: unknown = await guard(ctx);
        if (result instanceof Response) return result;
      }

      if (request.signal.aborted) return this.clientClosed();
      return resultToResponse(await handler(ctx));
    } catch (error) {
      return this.handleError(error, ctx);
    }
  }

  private async handleError(error: unknown, ctx: Context): Promise<Response> {
    for (const hook of this.config.onError) {
      try {
        const response = await hook(error, ctx);
        if (response) return response;
      } catch (hookError) {
        this.log.error("onError hook failed", {
          error: describeError(hookError),
        });
      }
    }

    const waymarkError = this.config.errorTransformer(error);

    if (!waymarkError.isOperational) {
      this.log.error("unhandled error", {
        method: ctx.method,
        path: ctx.path,
        pattern: ctx.pattern,
        code: waymarkError.code,
        error: describeError(error),
      });
    }

    return waymarkError.toResponse(this.config.development);
  }

  private clientClosed(): Response {
    return new WaymarkError("Client Closed Request", {
      status: CLIENT_CLOSED_REQUEST,
      code: "CLIENT_CLOSED_REQUEST",
    }).toResponse(this.config.development);
  }
}

function describeError(error: unknown): Record<string, unknown> | string {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return String(error);
}
