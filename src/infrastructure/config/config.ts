import { z } from "zod";
import { type AppError, validation } from "../../core/errors/app-error.js";
import { LOG_LEVELS } from "../../core/ports/logger.js";
import { err, ok, type Result } from "../../core/types/result.js";
import { DEFAULT_SEPARATOR, type FormatterOptions } from "../formatting/formatter.js";
import { DEFAULT_TEMPLATE } from "../formatting/template.js";
import { DEFAULT_TIME_LAYOUT } from "../formatting/time-layout.js";

/** LOG_TEMPLATE value that selects the built-in template with elision. */
export const DEFAULT_TEMPLATE_NAME = "default";

/**
 * Logging config: read from the environment and validated via Zod.
 */
const configSchema = z.object({
  log: z.object({
    level: z.enum(LOG_LEVELS).default("info"),
    format: z.enum(["text", "json"]).default("text"),
    template: z.string().default(DEFAULT_TEMPLATE_NAME),
    separator: z.string().default(DEFAULT_SEPARATOR),
    prefix: z.string().default(""),
    timeLayout: z.string().min(1).default(DEFAULT_TIME_LAYOUT),
    timeZone: z.enum(["utc", "local"]).default("utc"),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;
export type LogConfig = AppConfig["log"];

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Result<AppConfig, AppError> => {
  const result = configSchema.safeParse({
    log: {
      level: env["LOG_LEVEL"],
      format: env["LOG_FORMAT"],
      template: env["LOG_TEMPLATE"],
      separator: env["LOG_SEPARATOR"],
      prefix: env["LOG_PREFIX"],
      timeLayout: env["LOG_TIME_LAYOUT"],
      timeZone: env["LOG_TIME_ZONE"],
    },
  });

  if (!result.success) {
    const formatted = result.error.flatten();
    return err(validation({ fieldErrors: formatted.fieldErrors }, "Invalid logging configuration"));
  }

  return ok(result.data);
};

/** Translate validated log config into formatter options. */
export const toFormatterOptions = (log: LogConfig): FormatterOptions => {
  const isDefault = log.template === DEFAULT_TEMPLATE_NAME;
  return {
    isDefaultTemplate: isDefault,
    jsonOutput: log.format === "json",
    separator: log.separator,
    prefix: log.prefix,
    template: isDefault ? DEFAULT_TEMPLATE : log.template,
    timeLayout: log.timeLayout,
    timeZone: log.timeZone,
  };
};
