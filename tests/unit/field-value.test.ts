import { describe, expect, it } from "vitest";
import { classifyField, formatFieldValue, isPlainMap, withSortedKeys } from "../../src/core/fields/field-value.js";

class Point {
  readonly x = 1;
}

describe("classifyField", () => {
  it("classifies scalars", () => {
    expect(classifyField("a").kind).toBe("string");
    expect(classifyField(1.5).kind).toBe("number");
    expect(classifyField(false).kind).toBe("boolean");
    expect(classifyField(10n).kind).toBe("bigint");
  });

  it("treats null and undefined as nil", () => {
    expect(classifyField(null)).toEqual({ kind: "nil" });
    expect(classifyField(undefined)).toEqual({ kind: "nil" });
  });

  it("separates plain maps from class instances", () => {
    expect(classifyField({ a: 1 }).kind).toBe("map");
    expect(classifyField(Object.create(null)).kind).toBe("map");
    expect(classifyField(new Point()).kind).toBe("other");
  });

  it("recognises dates, errors and lists", () => {
    expect(classifyField(new Date(0)).kind).toBe("date");
    expect(classifyField(new Error("x")).kind).toBe("error");
    expect(classifyField([1, 2]).kind).toBe("list");
  });

  it("isPlainMap rejects arrays and null", () => {
    expect(isPlainMap([])).toBe(false);
    expect(isPlainMap(null)).toBe(false);
    expect(isPlainMap({})).toBe(true);
  });
});

describe("formatFieldValue", () => {
  it("renders scalars", () => {
    expect(formatFieldValue("us-east")).toBe("us-east");
    expect(formatFieldValue(1.5)).toBe("1.5");
    expect(formatFieldValue(true)).toBe("true");
    expect(formatFieldValue(10n)).toBe("10");
  });

  it("renders nil as <nil>", () => {
    expect(formatFieldValue(null)).toBe("<nil>");
    expect(formatFieldValue(undefined)).toBe("<nil>");
  });

  it("renders dates as ISO-8601", () => {
    expect(formatFieldValue(new Date(Date.UTC(2024, 4, 1, 10, 0, 0)))).toBe("2024-05-01T10:00:00.000Z");
    expect(formatFieldValue(new Date(Number.NaN))).toBe("Invalid Date");
  });

  it("renders errors by message", () => {
    expect(formatFieldValue(new Error("boom"))).toBe("boom");
  });

  it("renders lists element by element", () => {
    expect(formatFieldValue([1, "a", true])).toBe("[1, a, true]");
  });

  it("renders nested lists through inspect", () => {
    expect(formatFieldValue([1, [2]])).toBe("[1, [ 2 ]]");
  });

  it("renders maps on one line", () => {
    expect(formatFieldValue({ a: 1, b: "x" })).toBe("{ a: 1, b: 'x' }");
  });
});

describe("withSortedKeys", () => {
  it("rebuilds nested maps in key order", () => {
    expect(JSON.stringify(withSortedKeys({ b: 1, a: { d: 1, c: 2 } }))).toBe('{"a":{"c":2,"d":1},"b":1}');
  });

  it("leaves scalars and class instances alone", () => {
    const point = new Point();
    expect(withSortedKeys(point)).toBe(point);
    expect(withSortedKeys("x")).toBe("x");
  });

  it("keeps a self-reference pointing at the original map", () => {
    const cyclic: Record<string, unknown> = { b: 1 };
    cyclic["self"] = cyclic;
    const sorted = withSortedKeys(cyclic);
    expect(isPlainMap(sorted) && sorted["self"]).toBe(cyclic);
  });

  it("keeps a __proto__ key as data", () => {
    const parsed: unknown = JSON.parse('{"a":2,"__proto__":1}');
    expect(JSON.stringify(withSortedKeys(parsed))).toBe('{"__proto__":1,"a":2}');
  });
});
