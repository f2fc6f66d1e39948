/**
 * Build-time routing errors.
 *
 * Both are raised while a route table is being assembled, never while
 * requests are matched. A table that throws either one must not serve traffic.
 */

import type { HttpMethod } from "./types.ts";

export type ConflictReason =
  | "duplicate-route"
  | "parameter-name"
  | "wildcard-name";

/**
 * Two registrations disagree about the same position in the tree.
 *
 * @example
 * ```typescript
 * builder.insert("/users/:id", "GET", a);
 * builder.insert("/users/:userId/posts", "GET", b);
 * // ConflictError: GET /users/:userId/posts: parameter ":userId" conflicts with ":id"
 * ```
 */
export class ConflictError extends Error {
  readonly method: HttpMethod;
  readonly pattern: string;
  readonly reason: ConflictReason;

  constructor(
    method: HttpMethod,
    pattern: string,
    reason: ConflictReason,
    message: string,
  ) {
    super(`${method} ${pattern}: ${message}`);
    this.name = "ConflictError";
    this.method = method;
    this.pattern = pattern;
    this.reason = reason;
  }
}

/**
 * A route pattern that cannot be parsed.
 */
export class PatternError extends Error {
  readonly pattern: string;

  constructor(pattern: string, message: string) {
    super(`Invalid route pattern "${pattern}": ${message}`);
    this.name = "PatternError";
    this.pattern = pattern;
  }
}
