/**
 * Routing core for Waymark: route definitions, dispatch and typed request
 * extraction.
 *
 * @example
 * ```typescript
 * import { createRouter, Dispatcher, pathParam } from "@waymark/core";
 *
 * const table = createRouter()
 *   .get("/hello", () => "hello")
 *   .get("/users/:id", (ctx) => ({ id: pathParam(ctx, "id") }))
 *   .build();
 *
 * const dispatcher = new Dispatcher(table);
 * const response = await dispatcher.fetch(
 *   new Request("http://localhost/users/42"),
 * );
 * ```
 *
 * @module
 */

export * from "./src/mod.ts";
