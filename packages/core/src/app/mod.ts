export { Dispatcher } from "./dispatcher.ts";
export { resolveConfig } from "./config.ts";
export { joinPaths, resultToResponse } from "./helpers.ts";
export {
  createLogger,
  defaultLogLevel,
  formatJson,
  formatPretty,
  isLogger,
  isLogLevel,
} from "./logger.ts";
export type {
  DispatcherConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogWriter,
  OnErrorHook,
  ResolvedDispatcherConfig,
} from "./types.ts";
