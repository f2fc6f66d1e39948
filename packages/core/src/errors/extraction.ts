/**
 * Errors raised while pulling data out of a request context.
 *
 * Handlers may catch them and answer on their own; anything left uncaught is
 * mapped to its status by the dispatcher.
 */

import { WaymarkError } from "./base.ts";
import type { ValidationIssue } from "./types.ts";

/**
 * The handler asked for a path parameter its route never captures.
 *
 * This is a mismatch between handler and route pattern, not a client error,
 * hence 500.
 */
export class MissingParameterError extends WaymarkError {
  readonly parameter: string;
  readonly pattern: string;

  constructor(parameter: string, pattern: string) {
    super(
      `Route ${pattern} has no path parameter "${parameter}"`,
      { code: "MISSING_PARAMETER", details: { parameter, pattern } },
    );
    this.name = "MissingParameterError";
    this.parameter = parameter;
    this.pattern = pattern;
  }
}

/**
 * Captured path parameters failed schema validation or conversion.
 */
export class PathParseError extends WaymarkError {
  readonly errors: ValidationIssue[];

  constructor(errors: ValidationIssue[]) {
    super("Invalid URL: path parameters", {
      status: 400,
      code: "INVALID_PATH_PARAMS",
      details: errors,
    });
    this.name = "PathParseError";
    this.errors = errors;
  }
}

/**
 * A required request header is absent.
 */
export class MissingHeaderError extends WaymarkError {
  readonly header: string;

  constructor(header: string) {
    super(`Missing required header "${header}"`, {
      status: 400,
      code: "MISSING_HEADER",
      details: { header },
    });
    this.name = "MissingHeaderError";
    this.header = header;
  }
}

/**
 * The request body could not be decoded.
 */
export class MalformedBodyError extends WaymarkError {
  constructor(message = "Malformed request body", details?: unknown) {
    super(message, { status: 400, code: "MALFORMED_BODY", details });
    this.name = "MalformedBodyError";
  }
}

/**
 * A path segment carries invalid percent-encoding.
 */
export class MalformedPathError extends WaymarkError {
  readonly segment: string;

  constructor(segment: string) {
    super(
      `Invalid URL: malformed percent-encoding in "${segment}"`,
      { status: 400, code: "MALFORMED_PATH", details: { segment } },
    );
    this.name = "MalformedPathError";
    this.segment = segment;
  }
}
