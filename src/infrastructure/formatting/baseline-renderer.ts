import { sortedKeys } from "../../core/fields/field-value.js";
import type { LogRecord, TimeZone } from "../../core/ports/formatter.js";
import { renderTextValue } from "./text-renderer.js";
import { DEFAULT_TIME_LAYOUT, formatTime } from "./time-layout.js";

// Empty values stay bare: `msg=`.
const BARE_VALUE = /^[A-Za-z0-9\-._/@^+]*$/;

const quoteIfNeeded = (value: string): string => (BARE_VALUE.test(value) ? value : JSON.stringify(value));

/**
 * Plain `key=value` line used when no template is configured.
 *
 *   time="2024-05-01T10:00:00Z" level=info msg=started port=8080
 */
export const renderBaseline = (record: LogRecord, zone: TimeZone = "utc"): string => {
  const pairs = [
    `time=${quoteIfNeeded(formatTime(record.time, DEFAULT_TIME_LAYOUT, zone))}`,
    `level=${record.level}`,
    `msg=${quoteIfNeeded(record.message)}`,
  ];
  for (const key of sortedKeys(record.fields)) {
    pairs.push(`${key}=${quoteIfNeeded(renderTextValue(record.fields[key]))}`);
  }
  return `${pairs.join(" ")}\n`;
};
