import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const NUMERIC = /^\d+$/;

/**
 * Wrap a TypeBox schema as a Standard Schema.
 *
 * Input is converted toward the declared types before checking, so string
 * values taken from a path or query string can satisfy `t.Number()` or
 * `t.Boolean()`.
 *
 * @example
 * ```typescript
 * const params = await pathParams(
 *   ctx,
 *   fromTypeBox(t.Object({ id: t.Number() })),
 * );
 * params.id; // 42 for /users/42
 * ```
 */
export function fromTypeBox<T extends TSchema>(
  schema: T,
): StandardSchemaV1<unknown, Static<T>> {
  return {
    "~standard": {
      version: 1,
      vendor: "typebox",
      validate(input) {
        const value = Value.Convert(schema, Value.Clone(input));
        if (Value.Check(schema, value)) {
          return { value };
        }

        return {
          issues: [...Value.Errors(schema, value)].map((error) => ({
            message: error.message,
            path: pointerToPath(error.path),
          })),
        };
      },
    },
  };
}

function pointerToPath(pointer: string): PropertyKey[] {
  if (pointer === "") return [];
  return pointer
    .slice(1)
    .split("/")
    .map((segment) => NUMERIC.test(segment) ? Number(segment) : segment);
}
