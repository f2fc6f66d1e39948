import type { HttpMethod } from "@waymark/router";
import type { Context } from "../context/context.ts";

/**
 * Extract path parameter names from a path pattern.
 *
 * @example
 * ExtractPathParams<"/users/:id/posts/:postId"> // "id" | "postId"
 * ExtractPathParams<"/files/*rest"> // "rest"
 */
export type ExtractPathParams<T extends string> = T extends
  `${string}:${infer Param}/${infer Rest}`
  ? Param | ExtractPathParams<`/${Rest}`>
  : T extends `${string}:${infer Param}` ? Param
  : T extends `${string}/*${infer Rest}` ? Rest extends "" ? "*" : Rest
  : never;

/**
 * Create a params object type from a path pattern.
 *
 * @example
 * PathParams<"/users/:id"> // { id: string }
 */
export type PathParams<T extends string> = {
  [K in ExtractPathParams<T>]: string;
};

/**
 * A guard either lets the request through (returns nothing, possibly after
 * writing to `ctx.state`) or answers it with a Response.
 */
export type Guard = (
  ctx: Context,
) => Response | void | Promise<Response | void>;

/**
 * Terminal route handler. The return value becomes the response body.
 */
export type Handler<
  TParams extends Record<string, string> = Record<string, string>,
> = (ctx: Context<TParams>) => unknown;

/**
 * What the route table stores for one (method, pattern): the full guard
 * chain, outermost group first, and the handler.
 */
export interface HandlerBinding {
  readonly method: HttpMethod;
  readonly pattern: string;
  readonly guards: readonly Guard[];
  readonly handler: Handler;
}

export interface RouteGroupSpec {
  /** Prepended to every route below. Defaults to "". */
  prefix?: string;
  /** Run before the guards of nested groups and leaves. */
  guards?: readonly Guard[];
  routes: readonly RouteNodeSpec[];
}

export interface RouteLeafSpec {
  method: HttpMethod | readonly HttpMethod[];
  /** `""` or `/` binds the route to the group prefix itself. */
  path?: string;
  guards?: readonly Guard[];
  handler: Handler;
}

export type RouteNodeSpec = RouteGroupSpec | RouteLeafSpec;

/**
 * Route registration: a bare handler, or a handler with its own guards.
 */
export type RouteDefinition<TPath extends string> =
  | Handler<PathParams<TPath>>
  | {
    guards?: readonly Guard[];
    handler: Handler<PathParams<TPath>>;
  };
