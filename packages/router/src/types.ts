/**
 * Type definitions for the router module.
 */

export type HttpMethod =
  | "GET"
  | "HEAD"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "OPTIONS";

/**
 * Canonical method order, used wherever a set of methods is reported.
 */
export const HTTP_METHODS: readonly HttpMethod[] = Object.freeze([
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "OPTIONS",
]);

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/**
 * One parsed segment of a route pattern.
 *
 * @example
 * parsePattern("/users/:id/*rest")
 * // [
 * //   { type: "literal", value: "users" },
 * //   { type: "dynamic", name: "id" },
 * //   { type: "wildcard", name: "rest" },
 * // ]
 */
export type SegmentSpec =
  | { readonly type: "literal"; readonly value: string }
  | { readonly type: "dynamic"; readonly name: string }
  | { readonly type: "wildcard"; readonly name: string };

/**
 * Captured path parameters in path order.
 */
export type ParamEntries = ReadonlyArray<readonly [name: string, value: string]>;

export interface RouteInfo {
  readonly method: HttpMethod;
  readonly pattern: string;
}

export interface MatchFound<T> {
  readonly kind: "found";
  readonly binding: T;
  readonly pattern: string;
  readonly params: ParamEntries;
}

export interface MatchNotFound {
  readonly kind: "not-found";
}

export interface MatchMethodNotAllowed {
  readonly kind: "method-not-allowed";
  readonly allowed: readonly HttpMethod[];
}

export interface MatchMalformedPath {
  readonly kind: "malformed-path";
  readonly segment: string;
}

/**
 * Outcome of a route lookup. Routing failures are values, never exceptions.
 */
export type Match<T> =
  | MatchFound<T>
  | MatchNotFound
  | MatchMethodNotAllowed
  | MatchMalformedPath;
