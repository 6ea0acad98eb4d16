import { classifyField, renderFieldValue, sortedKeys, withSortedKeys } from "../../core/fields/field-value.js";
import { type FormatterConfig, type LogRecord, REQUEST_ID_KEY } from "../../core/ports/formatter.js";
import { tryCatch } from "../../core/types/result.js";
import { renderTemplate } from "./template.js";

/**
 * Value of a trailing `key = value` pair. Maps are embedded as JSON with
 * sorted keys; when
 * that fails (cycles, bigint) the default representation is used instead.
 */
export const renderTextValue = (value: unknown): string => {
  const field = classifyField(value);
  if (field.kind === "map") {
    const encoded = tryCatch(() => JSON.stringify(withSortedKeys(field.value)));
    if (encoded.ok) return encoded.value;
  }
  return renderFieldValue(field);
};

/**
 * Templated message followed by every field the template did not consume.
 *
 *   [2024-05-01T10:00:00Z] [ INFO] [abc123] served | status = 200
 */
export const renderText = (config: FormatterConfig, record: LogRecord): string => {
  const { message, consumed } = renderTemplate(config, record);
  let line = message;
  for (const key of sortedKeys(record.fields)) {
    if (key === REQUEST_ID_KEY || consumed.has(key)) continue;
    line += `${config.separator} ${key} = ${renderTextValue(record.fields[key])}`;
  }
  return `${line}\n`;
};
