/**
 * モード判定のテスト
 */

import { describe, it, expect } from "vitest";
import { detectMode } from "../src/pack/detector.js";
import { validGlobalPack, validThreadPack } from "./helpers/fixtures.js";

describe("detectMode", () => {
  it("should detect global from a single global key", () => {
    expect(detectMode({ failure_patterns: "anything" })).toEqual({ mode: "global" });
  });

  it("should detect thread from a single thread key", () => {
    expect(detectMode({ priority_rules: 7 })).toEqual({ mode: "thread" });
  });

  it("should detect full packs without warnings", () => {
    expect(detectMode(validGlobalPack())).toEqual({ mode: "global" });
    expect(detectMode(validThreadPack())).toEqual({ mode: "thread" });
  });

  it("should fall back to global with MIXED_KEYS when both key sets appear", () => {
    const document = { ...validThreadPack(), multi_llm_roles: [] };
    expect(detectMode(document)).toEqual({ mode: "global", warning: "MIXED_KEYS" });
  });

  it("should fall back to global with UNDETERMINED when no known key appears", () => {
    expect(detectMode({ unrelated: [] })).toEqual({ mode: "global", warning: "UNDETERMINED" });
    expect(detectMode({})).toEqual({ mode: "global", warning: "UNDETERMINED" });
  });

  it("should not depend on key order", () => {
    const forward = { thread_name: "x", reasoning_strategy_pack: [] };
    const backward = { reasoning_strategy_pack: [], thread_name: "x" };
    expect(detectMode(forward)).toEqual(detectMode(backward));
  });
});
