export type { Logger, LogLevel } from "./logger.js";
export { LOG_LEVELS, LEVEL_PRIORITY } from "./logger.js";
export type { Fields, Formatter, FormatterConfig, LogRecord, TimeZone } from "./formatter.js";
export { REQUEST_ID_KEY } from "./formatter.js";
