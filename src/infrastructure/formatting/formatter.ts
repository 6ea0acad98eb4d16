import { z } from "zod";
import { type AppError, type FormatError, validation } from "../../core/errors/app-error.js";
import type { Formatter, FormatterConfig, LogRecord, TimeZone } from "../../core/ports/formatter.js";
import { err, map, ok, type Result } from "../../core/types/result.js";
import { renderBaseline } from "./baseline-renderer.js";
import { renderJson } from "./json-renderer.js";
import { DEFAULT_TEMPLATE } from "./template.js";
import { renderText } from "./text-renderer.js";
import { DEFAULT_TIME_LAYOUT } from "./time-layout.js";

/** Conventional prefixes for the phases of a request's log lines. */
export const PREFIX_REQUEST_INCOMING = ">>>";
export const PREFIX_REQUEST_HANDLING = "===";
export const PREFIX_REQUEST_OUTGOING = "<<<";

export const DEFAULT_SEPARATOR = " |";

/**
 * Formatter options: validated once by build(), frozen afterwards.
 */
export const formatterOptionsSchema = z.object({
  isDefaultTemplate: z.boolean().default(false),
  jsonOutput: z.boolean().default(false),
  separator: z.string().default(DEFAULT_SEPARATOR),
  prefix: z.string().default(""),
  template: z.string().default(""),
  timeLayout: z.string().min(1).default(DEFAULT_TIME_LAYOUT),
  timeZone: z.enum(["utc", "local"]).default("utc"),
});

export type FormatterOptions = z.input<typeof formatterOptionsSchema>;

export interface FormatterBuilder {
  setTemplate(template: string): FormatterBuilder;
  setPrefix(prefix: string): FormatterBuilder;
  setSeparator(separator: string): FormatterBuilder;
  setJsonOutput(enabled?: boolean): FormatterBuilder;
  setTimeLayout(layout: string): FormatterBuilder;
  setTimeZone(zone: TimeZone): FormatterBuilder;
  build(): Result<Formatter, AppError>;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const renderLine = (config: FormatterConfig, record: LogRecord): Result<string, FormatError> => {
  if (config.template === "") return ok(renderBaseline(record, config.timeZone));
  if (config.jsonOutput) return renderJson(config, record);
  return ok(renderText(config, record));
};

const bindFormatter = (config: FormatterConfig): Formatter => ({
  config,
  format: (record) => map(renderLine(config, record), (line) => encoder.encode(line)),
  formatToString: (record) => renderLine(config, record),
});

/** Validate plain options into a frozen Formatter. */
export const formatterFromOptions = (options: FormatterOptions = {}): Result<Formatter, AppError> => {
  const parsed = formatterOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const flat = parsed.error.flatten();
    return err(
      validation(
        { fieldErrors: flat.fieldErrors, formErrors: flat.formErrors },
        "Invalid formatter options",
      ),
    );
  }
  return ok(bindFormatter(Object.freeze({ ...parsed.data })));
};

/**
 * Chainable builder. Setters mutate the builder only; every build() takes a
 * snapshot, so a built Formatter never changes.
 */
export const createFormatter = (initial: FormatterOptions = {}): FormatterBuilder => {
  const options: FormatterOptions = { ...initial };

  const builder: FormatterBuilder = {
    setTemplate: (template) => {
      options.template = template;
      return builder;
    },
    setPrefix: (prefix) => {
      options.prefix = prefix;
      return builder;
    },
    setSeparator: (separator) => {
      options.separator = separator;
      return builder;
    },
    setJsonOutput: (enabled = true) => {
      options.jsonOutput = enabled;
      return builder;
    },
    setTimeLayout: (layout) => {
      options.timeLayout = layout;
      return builder;
    },
    setTimeZone: (zone) => {
      options.timeZone = zone;
      return builder;
    },
    build: () => formatterFromOptions({ ...options }),
  };

  return builder;
};

/**
 * Builder preloaded with "[<time>] [<level>] [<id>] <msg>" and elision of
 * missing id / message segments. Elision stays on if the template is
 * replaced later.
 */
export const defaultFormatter = (prefix = ""): FormatterBuilder =>
  createFormatter({
    isDefaultTemplate: true,
    template: DEFAULT_TEMPLATE,
    prefix,
  });
