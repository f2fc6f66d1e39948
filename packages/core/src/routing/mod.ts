/**
 * Routing module - route definitions and their compilation.
 */

export { compileRoutes, isGroupSpec } from "./builder.ts";
export type { CompileOptions } from "./builder.ts";
export { createRouter, RouterBuilder } from "./router.ts";
export type {
  ExtractPathParams,
  Guard,
  Handler,
  HandlerBinding,
  PathParams,
  RouteDefinition,
  RouteGroupSpec,
  RouteLeafSpec,
  RouteNodeSpec,
} from "./types.ts";
