/**
 * Context module - per-request state.
 */

export { Context } from "./context.ts";
export type { ContextInit } from "./context.ts";
