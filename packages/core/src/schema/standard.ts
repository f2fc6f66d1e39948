import type { StandardSchemaV1 } from "@standard-schema/spec";

/**
 * Any library implementing Standard Schema (Zod, Valibot, ArkType, etc.)
 * can be used directly without wrappers.
 */
export type StandardSchema<TInput = unknown, TOutput = TInput> =
  StandardSchemaV1<TInput, TOutput>;

/**
 * Infer the output type from any Standard Schema compliant schema.
 *
 * @example
 * ```typescript
 * import { z } from "zod";
 * const schema = z.object({ name: z.string() });
 * type User = Infer<typeof schema>; // { name: string }
 * ```
 */
export type Infer<S> = S extends StandardSchemaV1<unknown, infer TOutput>
  ? TOutput
  : never;

export type InferInput<S> = S extends StandardSchemaV1<infer TInput, unknown>
  ? TInput
  : never;

/**
 * Validation issue as returned by Standard Schema.
 */
export interface SchemaIssue {
  readonly message: string;
  readonly path?: ReadonlyArray<PropertyKey | StandardSchemaV1.PathSegment>;
}

export type SchemaResult<T> =
  | { success: true; data: T }
  | { success: false; issues: SchemaIssue[] };

/**
 * Check if a value implements the Standard Schema interface.
 */
export function isStandardSchema(value: unknown): value is StandardSchema {
  if (typeof value !== "object" || value === null) return false;
  if (!("~standard" in value)) return false;

  const standard = value["~standard"];
  return (
    typeof standard === "object" &&
    standard !== null &&
    "validate" in standard &&
    typeof standard.validate === "function"
  );
}

/**
 * Validate data against a Standard Schema.
 *
 * @example
 * ```typescript
 * const result = await validate(z.object({ name: z.string() }), input);
 * if (result.success) {
 *   result.data.name;
 * }
 * ```
 */
export async function validate<T extends StandardSchema>(
  schema: T,
  data: unknown,
): Promise<SchemaResult<Infer<T>>> {
  let result = schema["~standard"].validate(data);

  if (result instanceof Promise) {
    result = await result;
  }

  if (result.issues) {
    return {
      success: false,
      issues: result.issues.map((issue) => ({
        message: issue.message,
        path: issue.path,
      })),
    };
  }

  return {
    success: true,
    data: result.value as Infer<T>,
  };
}
