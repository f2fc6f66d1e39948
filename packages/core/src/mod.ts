/**
 * Waymark Core
 */

import { Type } from "@sinclair/typebox";

/**
 * TypeBox schema builder, for use with {@link fromTypeBox}.
 *
 * @example
 * ```typescript
 * import { fromTypeBox, t } from "@waymark/core";
 *
 * const params = fromTypeBox(t.Object({ id: t.Number() }));
 * ```
 */
export const t = Type;
export type { Static, TSchema } from "@sinclair/typebox";

export { Dispatcher } from "./app/mod.ts";
export {
  createLogger,
  defaultLogLevel,
  isLogger,
  joinPaths,
  resolveConfig,
  resultToResponse,
} from "./app/mod.ts";
export type {
  DispatcherConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogWriter,
  OnErrorHook,
} from "./app/mod.ts";

export { Context } from "./context/mod.ts";
export type { ContextInit } from "./context/mod.ts";

export { compileRoutes, createRouter, RouterBuilder } from "./routing/mod.ts";
export type {
  CompileOptions,
  ExtractPathParams,
  Guard,
  Handler,
  HandlerBinding,
  PathParams,
  RouteDefinition,
  RouteGroupSpec,
  RouteLeafSpec,
  RouteNodeSpec,
} from "./routing/mod.ts";

export {
  bytesBody,
  header,
  jsonBody,
  pathParam,
  pathParamList,
  pathParams,
  queryParam,
  queryParams,
  requireHeader,
  textBody,
} from "./extract/mod.ts";

export { fromTypeBox, isStandardSchema, validate } from "./schema/mod.ts";
export type { Infer, InferInput, StandardSchema } from "./schema/mod.ts";

export {
  BadRequestError,
  defaultErrorTransformer,
  errorToResponse,
  ForbiddenError,
  InternalError,
  isOperationalError,
  isWaymarkError,
  MalformedBodyError,
  MalformedPathError,
  MethodNotAllowedError,
  MissingHeaderError,
  MissingParameterError,
  NotFoundError,
  PathParseError,
  UnauthorizedError,
  ValidationError,
  WaymarkError,
} from "./errors/mod.ts";
export type {
  ErrorBody,
  ErrorTransformer,
  ValidationIssue,
} from "./errors/mod.ts";

export {
  ConflictError,
  HTTP_METHODS,
  PatternError,
  RouteTable,
} from "@waymark/router";
export type { HttpMethod, Match, RouteInfo } from "@waymark/router";
