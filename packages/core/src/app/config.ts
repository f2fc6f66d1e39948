import process from "node:process";
import { defaultErrorTransformer } from "../errors/transformer.ts";
import { createLogger, isLogger } from "./logger.ts";
import type { DispatcherConfig, ResolvedDispatcherConfig } from "./types.ts";

/**
 * Fill in dispatcher defaults from the environment.
 */
export function resolveConfig(
  config: DispatcherConfig = {},
): ResolvedDispatcherConfig {
  const logger = isLogger(config.logger)
    ? config.logger
    : createLogger({ name: "waymark", ...config.logger });

  return {
    development: config.development ??
      process.env.NODE_ENV === "development",
    logger,
    errorTransformer: config.errorTransformer ?? defaultErrorTransformer,
    onError: Object.freeze([...(config.onError ?? [])]),
  };
}
