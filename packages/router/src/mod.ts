/**
 * Routing engine for Waymark.
 *
 * @module
 */

export { RouteTable, RouteTableBuilder } from "./radix.ts";
export { ConflictError, PatternError } from "./errors.ts";
export type { ConflictReason } from "./errors.ts";
export {
  decodeSegment,
  encodeLiteral,
  formatPattern,
  parsePattern,
  splitPath,
} from "./path.ts";
export {
  matchDynamic,
  matchLiteral,
  matchSegment,
  matchWildcard,
} from "./segment.ts";
export type { SegmentStep } from "./segment.ts";
export type { ParamChild, RouteNode } from "./node.ts";
export { HTTP_METHODS, isHttpMethod } from "./types.ts";
export type {
  HttpMethod,
  Match,
  MatchFound,
  MatchMalformedPath,
  MatchMethodNotAllowed,
  MatchNotFound,
  ParamEntries,
  RouteInfo,
  SegmentSpec,
} from "./types.ts";
