import type { HttpMethod } from "@waymark/router";
import type { WaymarkError } from "./base.ts";

/**
 * One rejected field, e.g. `{ field: "items[0].name", message: "Required" }`.
 */
export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * JSON body of every error response the dispatcher writes.
 */
export interface ErrorBody {
  error: {
    message: string;
    code: string;
    status: number;
    /** Methods the path accepts. Only on 405 responses. */
    allowed?: readonly HttpMethod[];
    /** Development mode only. */
    details?: unknown;
    /** Development mode only. Stack frames without the message line. */
    stack?: string[];
  };
}

/**
 * Maps anything a guard or handler throws to the error that answers it.
 */
export type ErrorTransformer = (error: unknown) => WaymarkError;
