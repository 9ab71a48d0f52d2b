import { describe, expect, it } from "vitest";
import {
  clamp,
  parseBooleanFlag,
  parseNumericEnv,
  parseOptionalBoolean,
} from "../env.js";

describe("env helpers", () => {
  it("clamps values and maps NaN to the lower bound", () => {
    expect(clamp(1.4, 0, 1)).toBe(1);
    expect(clamp(-0.2, 0, 1)).toBe(0);
    expect(clamp(0.42, 0, 1)).toBe(0.42);
    expect(clamp(Number.NaN, 0, 1)).toBe(0);
    expect(clamp(Number.POSITIVE_INFINITY, 0, 1)).toBe(1);
  });

  it("parses boolean flags", () => {
    expect(parseOptionalBoolean(" YES ")).toBe(true);
    expect(parseOptionalBoolean("off")).toBe(false);
    expect(parseOptionalBoolean("maybe")).toBeNull();
    expect(parseOptionalBoolean(undefined)).toBeNull();
    expect(parseBooleanFlag("maybe", true)).toBe(true);
    expect(parseBooleanFlag("0", true)).toBe(false);
  });

  it("parses numeric values without range checks", () => {
    expect(parseNumericEnv("2.5")).toBe(2.5);
    expect(parseNumericEnv("-3")).toBe(-3);
    expect(parseNumericEnv("12.9", { integer: true })).toBe(12);
    expect(parseNumericEnv("   ")).toBeNull();
    expect(parseNumericEnv("abc")).toBeNull();
    expect(parseNumericEnv("Infinity")).toBeNull();
    expect(parseNumericEnv(null)).toBeNull();
  });
});
