/**
 * Pull-based accessors over a request context.
 *
 * Handlers ask for exactly what they need. Every failure is a typed
 * {@link WaymarkError}, so a handler may catch it or let the dispatcher map it
 * to a status.
 */

import type { ParamEntries } from "@waymark/router";
import type { Context } from "../context/context.ts";
import {
  MalformedBodyError,
  MissingHeaderError,
  MissingParameterError,
  PathParseError,
} from "../errors/extraction.ts";
import { ValidationError } from "../errors/http.ts";
import { formatIssues } from "../schema/errors.ts";
import {
  type Infer,
  type StandardSchema,
  validate,
} from "../schema/standard.ts";

const decoder = new TextDecoder();

/**
 * A single captured path parameter.
 *
 * @throws {MissingParameterError} If the matched route captures no such
 * parameter
 */
export function pathParam(ctx: Context, name: string): string {
  for (const [key, value] of ctx.paramEntries) {
    if (key === name) return value;
  }
  throw new MissingParameterError(name, ctx.pattern);
}

/**
 * Captured parameters as `[name, value]` pairs in path order.
 */
export function pathParamList(ctx: Context): ParamEntries {
  return ctx.paramEntries;
}

/**
 * All captured parameters as one object, optionally validated.
 *
 * @throws {PathParseError} If the schema rejects the parameters
 *
 * @example
 * ```typescript
 * // GET /users/42/posts/7 on "/users/:userId/posts/:postId"
 * const { userId, postId } = await pathParams(
 *   ctx,
 *   z.object({ userId: z.coerce.number(), postId: z.coerce.number() }),
 * );
 * ```
 */
export function pathParams<TParams extends Record<string, string>>(
  ctx: Context<TParams>,
): Readonly<TParams>;
export function pathParams<S extends StandardSchema>(
  ctx: Context,
  schema: S,
): Promise<Infer<S>>;
export function pathParams(
  ctx: Context,
  schema?: StandardSchema,
): Readonly<Record<string, string>> | Promise<unknown> {
  if (!schema) return ctx.params;
  return parsePathParams(ctx, schema);
}

async function parsePathParams<S extends StandardSchema>(
  ctx: Context,
  schema: S,
): Promise<Infer<S>> {
  const result = await validate(schema, { ...ctx.params });
  if (!result.success) {
    throw new PathParseError(formatIssues(result.issues));
  }
  return result.data;
}

/**
 * First value of one query parameter, `null` when absent.
 */
export function queryParam(ctx: Context, name: string): string | null {
  return ctx.query.get(name);
}

/**
 * The query string as an object, optionally validated. A repeated key keeps
 * its last value.
 *
 * @throws {ValidationError} If the schema rejects the query
 */
export function queryParams(ctx: Context): Record<string, string>;
export function queryParams<S extends StandardSchema>(
  ctx: Context,
  schema: S,
): Promise<Infer<S>>;
export function queryParams(
  ctx: Context,
  schema?: StandardSchema,
): Record<string, string> | Promise<unknown> {
  const query = Object.fromEntries(ctx.query);
  if (!schema) return query;
  return parseQuery(query, schema);
}

async function parseQuery<S extends StandardSchema>(
  query: Record<string, string>,
  schema: S,
): Promise<Infer<S>> {
  const result = await validate(schema, query);
  if (!result.success) {
    throw new ValidationError(
      "Invalid query parameters",
      formatIssues(result.issues),
    );
  }
  return result.data;
}

export function header(ctx: Context, name: string): string | null {
  return ctx.headers.get(name);
}

/**
 * @throws {MissingHeaderError} If the header is absent
 */
export function requireHeader(ctx: Context, name: string): string {
  const value = ctx.headers.get(name);
  if (value === null) {
    throw new MissingHeaderError(name);
  }
  return value;
}

export function bytesBody(ctx: Context): Promise<Uint8Array> {
  return ctx.body();
}

export async function textBody(ctx: Context): Promise<string> {
  return decoder.decode(await ctx.body());
}

/**
 * Parse the body as JSON, optionally validated.
 *
 * A request without Content-Type is still parsed; one that names a non-JSON
 * type is rejected.
 *
 * @throws {MalformedBodyError} If the body is not JSON
 * @throws {ValidationError} If the schema rejects the parsed body
 */
export function jsonBody(ctx: Context): Promise<unknown>;
export function jsonBody<S extends StandardSchema>(
  ctx: Context,
  schema: S,
): Promise<Infer<S>>;
export async function jsonBody(
  ctx: Context,
  schema?: StandardSchema,
): Promise<unknown> {
  const contentType = ctx.headers.get("Content-Type");
  if (contentType !== null && !isJsonContentType(contentType)) {
    throw new MalformedBodyError(
      `Expected a JSON request body, got "${contentType}"`,
    );
  }

  const data = parseJson(await textBody(ctx));
  if (!schema) return data;

  const result = await validate(schema, data);
  if (!result.success) {
    throw new ValidationError(
      "Invalid request body",
      formatIssues(result.issues),
    );
  }
  return result.data;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedBodyError("Invalid JSON in request body", {
      originalMessage: error instanceof Error ? error.message : String(error),
    });
  }
}

function isJsonContentType(contentType: string): boolean {
  const mediaType = contentType.split(";")[0].trim().toLowerCase();
  return mediaType === "application/json" || mediaType.endsWith("+json");
}
