/**
 * Waymark - request routing core for fetch-style HTTP servers.
 *
 * @example
 * ```typescript
 * import { createRouter, Dispatcher } from "@waymark/core";
 *
 * const table = createRouter()
 *   .get("/", () => ({ message: "Hello from Waymark!" }))
 *   .build();
 *
 * const dispatcher = new Dispatcher(table);
 * ```
 *
 * @module
 */

export * from "@waymark/core";
