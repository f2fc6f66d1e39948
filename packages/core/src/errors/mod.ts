/**
 * Errors module - structured error handling.
 */

export { WaymarkError } from "./base.ts";
export {
  BadRequestError,
  ForbiddenError,
  InternalError,
  MethodNotAllowedError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from "./http.ts";
export {
  MalformedBodyError,
  MalformedPathError,
  MissingHeaderError,
  MissingParameterError,
  PathParseError,
} from "./extraction.ts";
export {
  defaultErrorTransformer,
  errorToResponse,
  isOperationalError,
  isWaymarkError,
} from "./transformer.ts";
export type {
  ErrorBody,
  ErrorTransformer,
  ValidationIssue,
} from "./types.ts";
