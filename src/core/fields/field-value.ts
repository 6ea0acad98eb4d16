import { inspect } from "node:util";

/**
 * Classified field value. Renderers switch on `kind` instead of inspecting
 * the raw value again.
 */
export type FieldValue =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "bigint"; readonly value: bigint }
  | { readonly kind: "nil" }
  | { readonly kind: "date"; readonly value: Date }
  | { readonly kind: "error"; readonly value: Error }
  | { readonly kind: "list"; readonly value: readonly unknown[] }
  | { readonly kind: "map"; readonly value: Readonly<Record<string, unknown>> }
  | { readonly kind: "other"; readonly value: unknown };

export type FieldKind = FieldValue["kind"];

const NIL = "<nil>";

/** Plain object literal or Object.create(null); anything else is "other". */
export const isPlainMap = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/** Field keys in a stable order, so identical records render identically. */
export const sortedKeys = (fields: Readonly<Record<string, unknown>>): string[] =>
  Object.keys(fields).sort();

/**
 * Copy of `value` with every plain map rebuilt in sorted key order, lists
 * included. A map that contains itself is left as the original reference.
 */
export const withSortedKeys = (value: unknown, seen: ReadonlySet<object> = new Set()): unknown => {
  if (Array.isArray(value)) {
    if (seen.has(value)) return value;
    const inner = new Set(seen).add(value);
    return value.map((item: unknown) => withSortedKeys(item, inner));
  }
  if (!isPlainMap(value) || seen.has(value)) return value;
  const inner = new Set(seen).add(value);
  // Null prototype so a "__proto__" key stays an ordinary property.
  const sorted: Record<string, unknown> = Object.create(null);
  for (const key of sortedKeys(value)) {
    sorted[key] = withSortedKeys(value[key], inner);
  }
  return sorted;
};

export const classifyField = (value: unknown): FieldValue => {
  switch (typeof value) {
    case "string":
      return { kind: "string", value };
    case "number":
      return { kind: "number", value };
    case "boolean":
      return { kind: "boolean", value };
    case "bigint":
      return { kind: "bigint", value };
    case "undefined":
      return { kind: "nil" };
    default:
      break;
  }
  if (value === null) return { kind: "nil" };
  if (value instanceof Date) return { kind: "date", value };
  if (value instanceof Error) return { kind: "error", value };
  if (Array.isArray(value)) return { kind: "list", value };
  if (isPlainMap(value)) return { kind: "map", value };
  return { kind: "other", value };
};

const inspectOneLine = (value: unknown): string =>
  inspect(value, { breakLength: Number.POSITIVE_INFINITY, compact: true, sorted: true });

const assertNever = (value: never): never => {
  throw new Error(`Unhandled field kind: ${JSON.stringify(value)}`);
};

/**
 * Default string representation of a classified value, used for template
 * substitution and for scalar values in text output.
 */
export const renderFieldValue = (field: FieldValue): string => {
  switch (field.kind) {
    case "string":
      return field.value;
    case "number":
      return String(field.value);
    case "boolean":
      return field.value ? "true" : "false";
    case "bigint":
      return field.value.toString();
    case "nil":
      return NIL;
    case "date":
      return Number.isNaN(field.value.getTime()) ? "Invalid Date" : field.value.toISOString();
    case "error":
      return field.value.message;
    case "list":
      return `[${field.value.map(renderListItem).join(", ")}]`;
    case "map":
    case "other":
      return inspectOneLine(field.value);
    default:
      return assertNever(field);
  }
};

// Nested lists go through inspect, which copes with self-references.
const renderListItem = (item: unknown): string => {
  const field = classifyField(item);
  return field.kind === "list" ? inspectOneLine(field.value) : renderFieldValue(field);
};

export const formatFieldValue = (value: unknown): string => renderFieldValue(classifyField(value));
