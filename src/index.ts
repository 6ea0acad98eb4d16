export * from "./core/index.js";
export * from "./infrastructure/formatting/index.js";
export {
  type AppConfig,
  type LogConfig,
  DEFAULT_TEMPLATE_NAME,
  loadConfig,
  toFormatterOptions,
} from "./infrastructure/config/config.js";
export { type LoggerOptions, createLogger, withRequestId } from "./infrastructure/logging/logger.js";
export { createLoggerFromEnv } from "./bootstrap.js";
