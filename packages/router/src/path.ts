/**
 * Pattern parsing and request path splitting.
 */

import { PatternError } from "./errors.ts";
import type { SegmentSpec } from "./types.ts";

const SLASH = 47; // '/'
const COLON = 58; // ':'
const STAR = 42; // '*'
const PERCENT = 37; // '%'

const LITERAL_ESCAPES = /[%/]/g;

const NO_SEGMENTS: readonly string[] = Object.freeze([]);

/**
 * Parse a route pattern into segment specs. Literal segments are
 * percent-decoded, the same way request segments are.
 *
 * @throws {PatternError} If the pattern does not start with `/`, names a
 * parameter with an empty or repeated name, has a wildcard before its last
 * segment, or carries malformed percent-encoding.
 */
export function parsePattern(pattern: string): SegmentSpec[] {
  if (pattern.charCodeAt(0) !== SLASH) {
    throw new PatternError(pattern, "must start with /");
  }

  const specs: SegmentSpec[] = [];
  if (pattern.length === 1) return specs;

  const raw = pattern.slice(1).split("/");
  const seen = new Set<string>();

  for (let i = 0; i < raw.length; i++) {
    const segment = raw[i];
    const firstChar = segment.charCodeAt(0);

    if (firstChar === COLON || firstChar === STAR) {
      const isWildcard = firstChar === STAR;
      const name = isWildcard ? segment.slice(1) || "*" : segment.slice(1);

      if (name.length === 0) {
        throw new PatternError(pattern, "parameter name must not be empty");
      }
      if (seen.has(name)) {
        throw new PatternError(pattern, `parameter "${name}" is repeated`);
      }
      if (isWildcard && i !== raw.length - 1) {
        throw new PatternError(
          pattern,
          `wildcard "*${name === "*" ? "" : name}" must be the last segment`,
        );
      }

      seen.add(name);
      specs.push(
        isWildcard ? { type: "wildcard", name } : { type: "dynamic", name },
      );
      continue;
    }

    const value = decodeSegment(segment);
    if (value === null) {
      throw new PatternError(
        pattern,
        `malformed percent-encoding in "${segment}"`,
      );
    }
    specs.push({ type: "literal", value });
  }

  return specs;
}

/**
 * Render segment specs back into pattern form.
 */
export function formatPattern(specs: readonly SegmentSpec[]): string {
  let out = "";
  for (const spec of specs) {
    switch (spec.type) {
      case "literal":
        out += `/${encodeLiteral(spec.value)}`;
        break;
      case "dynamic":
        out += `/:${spec.name}`;
        break;
      case "wildcard":
        out += spec.name === "*" ? "/*" : `/*${spec.name}`;
        break;
    }
  }
  return out || "/";
}

/**
 * Escape the characters a decoded literal cannot carry in raw form.
 *
 * @example
 * encodeLiteral("100%") // "100%25"
 * encodeLiteral("café") // "café"
 * encodeLiteral(":id") // "%3Aid", so it does not read as a parameter
 */
export function encodeLiteral(literal: string): string {
  const escaped = literal.replace(LITERAL_ESCAPES, (char) =>
    char === "%" ? "%25" : "%2F"
  );
  const firstChar = escaped.charCodeAt(0);
  if (firstChar === COLON) return `%3A${escaped.slice(1)}`;
  if (firstChar === STAR) return `%2A${escaped.slice(1)}`;
  return escaped;
}

/**
 * Split a request path into percent-decoded segments.
 *
 * Returns the first offending raw segment when decoding fails.
 *
 * @example
 * splitPath("/files/a%20b/c") // { ok: true, segments: ["files", "a b", "c"] }
 * splitPath("/bad/%E0%A4%A") // { ok: false, segment: "%E0%A4%A" }
 */
export function splitPath(
  path: string,
):
  | { ok: true; segments: readonly string[] }
  | { ok: false; segment: string } {
  if (path === "/" || path === "") {
    return { ok: true, segments: NO_SEGMENTS };
  }

  const start = path.charCodeAt(0) === SLASH ? 1 : 0;
  const raw = path.slice(start).split("/");
  const segments: string[] = new Array(raw.length);

  for (let i = 0; i < raw.length; i++) {
    const decoded = decodeSegment(raw[i]);
    if (decoded === null) {
      return { ok: false, segment: raw[i] };
    }
    segments[i] = decoded;
  }

  return { ok: true, segments };
}

/**
 * Percent-decode one segment. `null` when the escapes are malformed or do
 * not form valid UTF-8.
 */
export function decodeSegment(segment: string): string | null {
  let hasEscape = false;
  for (let i = 0; i < segment.length; i++) {
    if (segment.charCodeAt(i) === PERCENT) {
      hasEscape = true;
      break;
    }
  }
  if (!hasEscape) return segment;

  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}
