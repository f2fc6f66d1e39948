import { WaymarkError } from "./base.ts";
import { InternalError } from "./http.ts";
import type { ErrorTransformer } from "./types.ts";

/**
 * Library errors answer with their own status. Anything else is a server
 * fault and answers 500, keeping the original as `cause`.
 */
export function defaultErrorTransformer(error: unknown): WaymarkError {
  if (error instanceof WaymarkError) return error;

  if (error instanceof Error) {
    return new InternalError(error.message, { name: error.name }, error);
  }
  return new InternalError(
    "An unexpected error occurred",
    { value: String(error) },
    error,
  );
}

export function errorToResponse(
  error: unknown,
  development = false,
  transformer: ErrorTransformer = defaultErrorTransformer,
): Response {
  return transformer(error).toResponse(development);
}

export function isWaymarkError(error: unknown): error is WaymarkError {
  return error instanceof WaymarkError;
}

/**
 * Whether the error is an expected client-facing outcome rather than a fault.
 */
export function isOperationalError(error: unknown): boolean {
  return error instanceof WaymarkError && error.isOperational;
}
