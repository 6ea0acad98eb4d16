import { formatFieldValue, sortedKeys } from "../../core/fields/field-value.js";
import { type FormatterConfig, type LogRecord, REQUEST_ID_KEY } from "../../core/ports/formatter.js";
import { formatTime } from "./time-layout.js";

export const TIME_TOKEN = "<time>";
export const LEVEL_TOKEN = "<level>";
export const ID_TOKEN = "<id>";
export const MSG_TOKEN = "<msg>";

export const DEFAULT_TEMPLATE = `[${TIME_TOKEN}] [${LEVEL_TOKEN}] [${ID_TOKEN}] ${MSG_TOKEN}`;

const LEVEL_WIDTH = 5;

/** Placeholder form of a field key: "region" → "<region>". */
export const formatIdentifier = (key: string): string => `<${key}>`;

/** Replace the first literal occurrence only; no `$` pattern expansion. */
export const replaceFirst = (source: string, search: string, replacement: string): string => {
  const at = source.indexOf(search);
  if (at === -1) return source;
  return source.slice(0, at) + replacement + source.slice(at + search.length);
};

export const formatLevel = (level: string): string => level.toUpperCase().padStart(LEVEL_WIDTH);

export interface RenderedTemplate {
  readonly message: string;
  /** Field keys inlined through their placeholder. */
  readonly consumed: ReadonlySet<string>;
}

interface RuleContext {
  readonly config: FormatterConfig;
  readonly record: LogRecord;
  readonly consumed: Set<string>;
}

type TemplateRule = (output: string, ctx: RuleContext) => string;

const timeRule: TemplateRule = (output, { config, record }) =>
  replaceFirst(output, TIME_TOKEN, formatTime(record.time, config.timeLayout, config.timeZone));

const levelRule: TemplateRule = (output, { record }) =>
  replaceFirst(output, LEVEL_TOKEN, formatLevel(record.level));

const idRule: TemplateRule = (output, { config, record }) => {
  if (Object.hasOwn(record.fields, REQUEST_ID_KEY)) {
    return replaceFirst(output, ID_TOKEN, formatFieldValue(record.fields[REQUEST_ID_KEY]));
  }
  if (config.isDefaultTemplate) {
    return replaceFirst(output, ` [${ID_TOKEN}]`, "");
  }
  return output;
};

const fieldsRule: TemplateRule = (output, { record, consumed }) => {
  let next = output;
  for (const key of sortedKeys(record.fields)) {
    if (key === REQUEST_ID_KEY) continue;
    const token = formatIdentifier(key);
    if (!next.includes(token)) continue;
    next = replaceFirst(next, token, formatFieldValue(record.fields[key]));
    consumed.add(key);
  }
  return next;
};

// The default template ends in a bare "<msg>", so elision falls back to
// " <msg>" when there is no bracketed segment.
const messageRule: TemplateRule = (output, { config, record }) => {
  if (record.message !== "") {
    return replaceFirst(output, MSG_TOKEN, record.message);
  }
  if (!config.isDefaultTemplate) return output;
  const bracketed = ` [${MSG_TOKEN}]`;
  return output.includes(bracketed)
    ? replaceFirst(output, bracketed, "")
    : replaceFirst(output, ` ${MSG_TOKEN}`, "");
};

const RULES: readonly TemplateRule[] = [timeRule, levelRule, idRule, fieldsRule, messageRule];

/**
 * Apply the template to one record. Rule order matters: a field value that
 * happens to contain "<msg>" is itself substituted by the message rule.
 */
export const renderTemplate = (config: FormatterConfig, record: LogRecord): RenderedTemplate => {
  const consumed = new Set<string>();
  const ctx: RuleContext = { config, record, consumed };
  const message = RULES.reduce((output, rule) => rule(output, ctx), config.template);
  return { message, consumed };
};
