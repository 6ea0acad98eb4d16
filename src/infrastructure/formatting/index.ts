export {
  type FormatterBuilder,
  type FormatterOptions,
  DEFAULT_SEPARATOR,
  PREFIX_REQUEST_HANDLING,
  PREFIX_REQUEST_INCOMING,
  PREFIX_REQUEST_OUTGOING,
  createFormatter,
  defaultFormatter,
  formatterFromOptions,
  formatterOptionsSchema,
} from "./formatter.js";
export {
  type RenderedTemplate,
  DEFAULT_TEMPLATE,
  ID_TOKEN,
  LEVEL_TOKEN,
  MSG_TOKEN,
  TIME_TOKEN,
  formatIdentifier,
  renderTemplate,
} from "./template.js";
export { renderText, renderTextValue } from "./text-renderer.js";
export { type JsonLine, buildJsonLine, renderJson } from "./json-renderer.js";
export { renderBaseline } from "./baseline-renderer.js";
export { type NamedLayout, DEFAULT_TIME_LAYOUT, TIME_LAYOUTS, formatTime, resolveLayout } from "./time-layout.js";
