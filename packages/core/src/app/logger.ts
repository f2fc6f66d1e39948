import process from "node:process";
import type {
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogWriter,
} from "./types.ts";

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Infinity,
};

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const levelColors: Record<LogLevel, string> = {
  trace: colors.gray,
  debug: colors.blue,
  info: colors.green,
  warn: colors.yellow,
  error: colors.red,
  fatal: colors.magenta,
  silent: "",
};

const writeToProcess: LogWriter = (line, level) => {
  const stream = level === "error" || level === "fatal"
    ? process.stderr
    : process.stdout;
  stream.write(line);
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);
}

function formatTime(timestamp: number): string {
  const date = new Date(timestamp);
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

export function formatPretty(
  entry: LogEntry,
  name: string | undefined,
  showTimestamp: boolean,
): string {
  const { level, time, msg, ...rest } = entry;
  const color = levelColors[level];
  const levelStr = level.toUpperCase().padEnd(5);

  let line = "";

  if (showTimestamp) {
    line += `${colors.gray}${formatTime(time)}${colors.reset} `;
  }

  if (name) {
    line += `${colors.cyan}${colors.bold}[${name}]${colors.reset} `;
  }

  line += `${color}${levelStr}${colors.reset} ${msg}`;

  const keys = Object.keys(rest);
  if (keys.length > 0) {
    const extra = keys
      .map((k) => {
        const v = rest[k];
        const val = typeof v === "string" ? v : JSON.stringify(v);
        return `${colors.dim}${k}=${colors.reset}${val}`;
      })
      .join(" ");
    line += ` ${extra}`;
  }

  return line + "\n";
}

export function formatJson(entry: LogEntry, name: string | undefined): string {
  const obj: Record<string, unknown> = { ...entry };
  if (name) obj.name = name;
  return JSON.stringify(obj) + "\n";
}

/**
 * Create a structured logger.
 *
 * @example
 * ```typescript
 * const log = createLogger({ name: "api", level: "debug" });
 * log.info("route table built", { routes: 12 });
 * // 10:42:07.113 [api] INFO  route table built routes=12
 * ```
 */
export function createLogger(
  options: LoggerConfig = {},
  bindings: Record<string, unknown> = {},
): Logger {
  const currentLevel = options.level ?? defaultLogLevel();
  const name = options.name;
  const showTimestamp = options.timestamp ?? true;
  const jsonMode = options.json ?? false;
  const write = options.write ?? writeToProcess;

  const shouldLog = (level: LogLevel): boolean => {
    return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
  };

  const log = (
    level: LogLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void => {
    if (!shouldLog(level)) return;

    const entry: LogEntry = {
      ...bindings,
      ...data,
      level,
      time: Date.now(),
      msg,
    };

    const output = jsonMode
      ? formatJson(entry, name)
      : formatPretty(entry, name, showTimestamp);

    write(output, level);
  };

  return {
    level: currentLevel,
    trace(msg, data) {
      log("trace", msg, data);
    },
    debug(msg, data) {
      log("debug", msg, data);
    },
    info(msg, data) {
      log("info", msg, data);
    },
    warn(msg, data) {
      log("warn", msg, data);
    },
    error(msg, data) {
      log("error", msg, data);
    },
    fatal(msg, data) {
      log("fatal", msg, data);
    },
    isLevelEnabled: shouldLog,
    child(childBindings) {
      const { name: childSuffix, ...rest } = childBindings;
      const childName = childSuffix
        ? name ? `${name}:${String(childSuffix)}` : String(childSuffix)
        : name;

      return createLogger(
        { ...options, level: currentLevel, name: childName },
        { ...bindings, ...rest },
      );
    },
  };
}

/**
 * Level taken from `WAYMARK_LOG_LEVEL`, `info` when unset or unknown.
 */
export function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.WAYMARK_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

export function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "info" in value &&
    "error" in value &&
    "child" in value &&
    typeof value.info === "function" &&
    typeof value.error === "function" &&
    typeof value.child === "function"
  );
}
