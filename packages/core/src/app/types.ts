import type { Context } from "../context/context.ts";
import type { ErrorTransformer } from "../errors/types.ts";

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export interface LogEntry {
  level: LogLevel;
  time: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * Receives each formatted line. Defaults to stdout, or stderr for
 * `error` and `fatal`.
 */
export type LogWriter = (line: string, level: LogLevel) => void;

export interface LoggerConfig {
  level?: LogLevel;
  name?: string;
  timestamp?: boolean;
  json?: boolean;
  write?: LogWriter;
}

export interface Logger {
  readonly level: LogLevel;
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Turns an error raised by a guard or handler into a response. Returning
 * `null` passes the error on to the next hook, then to the error transformer.
 */
export type OnErrorHook = (
  error: unknown,
  ctx: Context,
) => Response | null | Promise<Response | null>;

export interface DispatcherConfig {
  /**
   * Include error details and stack traces in error responses.
   * Defaults to `NODE_ENV === "development"`.
   */
  development?: boolean;
  logger?: Logger | LoggerConfig;
  errorTransformer?: ErrorTransformer;
  onError?: OnErrorHook[];
}

export interface ResolvedDispatcherConfig {
  development: boolean;
  logger: Logger;
  errorTransformer: ErrorTransformer;
  onError: readonly OnErrorHook[];
}
