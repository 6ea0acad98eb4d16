/**
 * Port: Formatter: turns one finished log record into one output line.
 */
import type { FormatError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";
import type { LogLevel } from "./logger.js";

/** Field key whose value is treated as the request-correlation id. */
export const REQUEST_ID_KEY = "X-Request-ID";

export type Fields = Readonly<Record<string, unknown>>;

export interface LogRecord {
  readonly time: Date;
  readonly level: LogLevel;
  readonly message: string;
  readonly fields: Fields;
}

export type TimeZone = "utc" | "local";

export interface FormatterConfig {
  /** Elide " [<id>]" and " [<msg>]" when their value is missing. */
  readonly isDefaultTemplate: boolean;
  readonly jsonOutput: boolean;
  readonly separator: string;
  /** Stored for callers; never applied by the formatter itself. */
  readonly prefix: string;
  readonly template: string;
  readonly timeLayout: string;
  readonly timeZone: TimeZone;
}

export interface Formatter {
  readonly config: FormatterConfig;
  format(record: LogRecord): Result<Uint8Array, FormatError>;
  formatToString(record: LogRecord): Result<string, FormatError>;
}
