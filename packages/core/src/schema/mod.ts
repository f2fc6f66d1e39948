/**
 * Schema module - Standard Schema validation and the TypeBox adapter.
 */

export { formatIssues, formatPath } from "./errors.ts";
export { isStandardSchema, validate } from "./standard.ts";
export type {
  Infer,
  InferInput,
  SchemaIssue,
  SchemaResult,
  StandardSchema,
} from "./standard.ts";
export { fromTypeBox } from "./typebox.ts";
