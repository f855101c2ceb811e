/**
 * JSON 種別判定のテスト
 */

import { describe, it, expect } from "vitest";
import { jsonKindOf, describeJsonKind } from "../src/pack/json-kind.js";

describe("jsonKindOf", () => {
  it("should tag every JSON value kind", () => {
    expect(jsonKindOf(null)).toBe("null");
    expect(jsonKindOf(true)).toBe("boolean");
    expect(jsonKindOf(0)).toBe("number");
    expect(jsonKindOf("")).toBe("string");
    expect(jsonKindOf([])).toBe("list");
    expect(jsonKindOf({})).toBe("object");
  });
});

describe("describeJsonKind", () => {
  it("should label strings, lists and objects", () => {
    expect(describeJsonKind("not a list")).toBe("str");
    expect(describeJsonKind(["a"])).toBe("list");
    expect(describeJsonKind({ a: 1 })).toBe("dict");
  });

  it("should split numbers into int and float", () => {
    expect(describeJsonKind(42)).toBe("int");
    expect(describeJsonKind(-3)).toBe("int");
    expect(describeJsonKind(1.5)).toBe("float");
  });

  it("should label integral decimals by their parsed value", () => {
    expect(describeJsonKind(JSON.parse("1.0"))).toBe("int");
    expect(describeJsonKind(JSON.parse("1e5"))).toBe("int");
  });

  it("should label booleans and null", () => {
    expect(describeJsonKind(false)).toBe("bool");
    expect(describeJsonKind(null)).toBe("null");
  });
});
