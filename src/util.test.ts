import { describe, it, expect } from "vitest";
import { checkRange, checkUndefined, isBoolean, normalizeText, parseId, readStringRecord } from "./util";

describe("parseId", () => {
  it("reads positive integers", () => {
    expect(parseId("123")).toBe(123);
    expect(parseId(" 0042 ")).toBe(42);
    expect(parseId("+7")).toBe(7);
  });

  it("falls back for anything else", () => {
    expect(parseId(undefined)).toBe(0);
    expect(parseId("")).toBe(0);
    expect(parseId("-1")).toBe(0);
    expect(parseId("0")).toBe(0);
    expect(parseId("12abc")).toBe(0);
    expect(parseId("1.5")).toBe(0);
    expect(parseId("99999999999999999999")).toBe(0);
    expect(parseId("x", 5)).toBe(5);
  });
});

describe("normalizeText", () => {
  it("lower-cases and collapses whitespace", () => {
    expect(normalizeText("  Love \t  SONG\n")).toBe("love song");
  });
});

describe("json helpers", () => {
  it("finds the first missing field", () => {
    expect(checkUndefined({ a: 1 }, ["a", "b", "c"])).toBe("b");
    expect(checkUndefined({ a: 1 }, ["a"])).toBeNull();
  });

  it("validates string records", () => {
    expect(readStringRecord({ extra: { Tags: "x" } }, "extra")).toEqual({ Tags: "x" });
    expect(() => readStringRecord({ extra: { Mode: 1 } }, "extra")).toThrow("extra.Mode should be a string");
    expect(() => readStringRecord({ extra: [] }, "extra")).toThrow(TypeError);
  });

  it("checks booleans and ranges", () => {
    expect(isBoolean(false)).toBe(true);
    expect(isBoolean("true")).toBe(false);
    expect(checkRange(16, 1, 16)).toBe(true);
    expect(checkRange(0, 1, 16)).toBe(false);
  });
});
