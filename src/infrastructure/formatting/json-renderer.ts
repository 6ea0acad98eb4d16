import { encodingError, type FormatError } from "../../core/errors/app-error.js";
import { formatFieldValue, withSortedKeys } from "../../core/fields/field-value.js";
import { type FormatterConfig, type LogRecord, REQUEST_ID_KEY } from "../../core/ports/formatter.js";
import { err, ok, type Result, tryCatch } from "../../core/types/result.js";
import { renderTemplate } from "./template.js";
import { DEFAULT_TIME_LAYOUT, formatTime } from "./time-layout.js";

export interface JsonLine {
  readonly timestamp: string;
  readonly level: string;
  readonly id?: string;
  readonly message: string;
  readonly data?: unknown;
}

const encoder = new TextEncoder();

// Errors carry no enumerable properties; emit their message instead of "{}".
const replacer = (_key: string, value: unknown): unknown =>
  value instanceof Error ? value.message : value;

export const buildJsonLine = (config: FormatterConfig, record: LogRecord): JsonLine => {
  const { fields } = record;
  const hasId = Object.hasOwn(fields, REQUEST_ID_KEY);
  return {
    timestamp: formatTime(record.time, DEFAULT_TIME_LAYOUT, config.timeZone),
    level: record.level.toUpperCase(),
    ...(hasId ? { id: formatFieldValue(fields[REQUEST_ID_KEY]) } : {}),
    message: renderTemplate(config, record).message,
    ...(Object.keys(fields).length > 0 ? { data: withSortedKeys(fields) } : {}),
  };
};

/**
 * One JSON object per line. `timestamp` always uses RFC3339 whatever the
 * configured layout. When `data` cannot be encoded the error carries the
 * line without it.
 */
export const renderJson = (config: FormatterConfig, record: LogRecord): Result<string, FormatError> => {
  const line = buildJsonLine(config, record);
  const encoded = tryCatch(() => JSON.stringify(line, replacer));
  if (encoded.ok) return ok(`${encoded.value}\n`);

  const { data: _dropped, ...rest } = line;
  const partial = `${JSON.stringify(rest)}\n`;
  return err(encodingError(encoder.encode(partial), encoded.error));
};
