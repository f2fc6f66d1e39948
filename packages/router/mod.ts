/**
 * Radix tree routing engine for Waymark.
 *
 * Routes are inserted into a mutable {@link RouteTableBuilder} and frozen into
 * a {@link RouteTable} before any request is matched.
 *
 * @example
 * ```typescript
 * import { RouteTableBuilder } from "@waymark/router";
 *
 * const table = new RouteTableBuilder<string>()
 *   .insert("/users/me", "GET", "me")
 *   .insert("/users/:id", "GET", "user")
 *   .freeze();
 *
 * table.match("GET", "/users/me"); // literal wins: binding "me"
 * ```
 *
 * @module
 */

export * from "./src/mod.ts";
