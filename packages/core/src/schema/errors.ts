import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { ValidationIssue } from "../errors/types.ts";
import type { SchemaIssue } from "./standard.ts";

type PathSegment = PropertyKey | StandardSchemaV1.PathSegment;

/**
 * Convert a path array to dot-notation string.
 *
 * @example
 * formatPath(['user', 'email']) // "user.email"
 * formatPath(['items', 0, 'name']) // "items[0].name"
 * formatPath([]) // "(root)"
 */
export function formatPath(path?: ReadonlyArray<PathSegment>): string {
  if (!path || path.length === 0) {
    return "(root)";
  }

  return path.reduce<string>((acc, segment, index) => {
    const key =
      typeof segment === "object" && segment !== null && "key" in segment
        ? segment.key
        : segment;

    if (typeof key === "number") {
      return `${acc}[${key}]`;
    }
    if (index === 0) {
      return String(key);
    }
    return `${acc}.${String(key)}`;
  }, "");
}

/**
 * Flatten schema issues into the `{ field, message }` pairs error responses
 * carry.
 */
export function formatIssues(
  issues: readonly SchemaIssue[],
): ValidationIssue[] {
  return issues.map((issue) => ({
    field: formatPath(issue.path),
    message: issue.message,
  }));
}
