import {
  type HttpMethod,
  type RouteTable,
  RouteTableBuilder,
} from "@waymark/router";
import { joinPaths } from "../app/helpers.ts";
import type { Logger } from "../app/types.ts";
import type {
  Guard,
  HandlerBinding,
  RouteGroupSpec,
  RouteLeafSpec,
  RouteNodeSpec,
} from "./types.ts";

export interface CompileOptions {
  logger?: Logger;
}

export function isGroupSpec(node: RouteNodeSpec): node is RouteGroupSpec {
  return "routes" in node;
}

/**
 * Compile a declarative route tree into a frozen route table.
 *
 * Each leaf gets the guards of every enclosing group, outer to inner,
 * followed by its own.
 *
 * @throws {ConflictError} On a duplicate (method, path) or a parameter name
 * that disagrees with another route at the same position
 * @throws {PatternError} On a malformed path
 *
 * @example
 * ```typescript
 * const table = compileRoutes({
 *   prefix: "/api",
 *   guards: [requireAuth],
 *   routes: [
 *     { method: "GET", path: "/users/:id", handler: showUser },
 *     { prefix: "/admin", guards: [requireAdmin], routes: [...] },
 *   ],
 * });
 * ```
 */
export function compileRoutes(
  spec: RouteGroupSpec,
  options: CompileOptions = {},
): RouteTable<HandlerBinding> {
  const builder = new RouteTableBuilder<HandlerBinding>();
  collect(builder, spec, "", []);

  const table = builder.freeze();
  options.logger?.debug("route table built", { routes: table.size });
  return table;
}

function collect(
  builder: RouteTableBuilder<HandlerBinding>,
  group: RouteGroupSpec,
  parentPrefix: string,
  parentGuards: readonly Guard[],
): void {
  const prefix = joinPaths(parentPrefix, group.prefix ?? "");
  const guards = group.guards?.length
    ? [...parentGuards, ...group.guards]
    : parentGuards;

  for (const node of group.routes) {
    if (isGroupSpec(node)) {
      collect(builder, node, prefix, guards);
    } else {
      insertLeaf(builder, node, prefix, guards);
    }
  }
}

function insertLeaf(
  builder: RouteTableBuilder<HandlerBinding>,
  leaf: RouteLeafSpec,
  prefix: string,
  groupGuards: readonly Guard[],
): void {
  const pattern = joinPaths(prefix, leaf.path ?? "");
  const guards = Object.freeze([...groupGuards, ...(leaf.guards ?? [])]);
  const methods: readonly HttpMethod[] = typeof leaf.method === "string"
    ? [leaf.method]
    : leaf.method;

  for (const method of methods) {
    builder.insert(
      pattern,
      method,
      Object.freeze({ method, pattern, guards, handler: leaf.handler }),
    );
  }
}
