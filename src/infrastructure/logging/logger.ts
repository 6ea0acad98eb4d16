import type { Fields, Formatter, LogRecord } from "../../core/ports/formatter.js";
import { REQUEST_ID_KEY } from "../../core/ports/formatter.js";
import { LEVEL_PRIORITY, type LogLevel, type Logger } from "../../core/ports/logger.js";

export interface LoggerOptions {
  readonly formatter: Formatter;
  readonly level?: LogLevel;
  readonly bindings?: Fields;
  /** Clock used to stamp records */
  readonly now?: () => Date;
}

/**
 * Logger: builds a LogRecord per call and writes the formatter's line.
 * warn and above go to stderr, everything else to stdout. A failed JSON
 * encoding still writes the formatter's best-effort line.
 */
export const createLogger = ({
  formatter,
  level = "info",
  bindings = {},
  now = () => new Date(),
}: LoggerOptions): Logger => {
  const minPriority = LEVEL_PRIORITY[level];

  const write = (entryLevel: LogLevel, msg: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[entryLevel] < minPriority) return;

    const record: LogRecord = {
      time: now(),
      level: entryLevel,
      message: msg,
      fields: { ...bindings, ...meta },
    };
    const result = formatter.format(record);
    const bytes = result.ok ? result.value : result.error.partial;

    if (LEVEL_PRIORITY[entryLevel] >= LEVEL_PRIORITY.warn) {
      process.stderr.write(bytes);
    } else {
      process.stdout.write(bytes);
    }
  };

  return {
    trace: (msg, meta) => write("trace", msg, meta),
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    panic: (msg, meta) => write("panic", msg, meta),
    child: (extra) => createLogger({ formatter, level, bindings: { ...bindings, ...extra }, now }),
  };
};

/** Child logger whose lines carry the given request id. */
export const withRequestId = (logger: Logger, requestId: string): Logger =>
  logger.child({ [REQUEST_ID_KEY]: requestId });
