import { describe, expect, it } from "vitest";
import { isEnabled, readEnv } from "./env.js";

describe("isEnabled", () => {
  it("returns true for true-like values", () => {
    expect(isEnabled("true")).toBe(true);
    expect(isEnabled("1")).toBe(true);
    expect(isEnabled("TRUE")).toBe(true);
    expect(isEnabled(" yes ")).toBe(true);
  });

  it("returns false for other values", () => {
    expect(isEnabled("false")).toBe(false);
    expect(isEnabled(undefined)).toBe(false);
    expect(isEnabled("0")).toBe(false);
    expect(isEnabled("")).toBe(false);
  });
});

describe("readEnv", () => {
  it("trims values and treats blanks as unset", () => {
    const env = { CRF: " 20 ", PRESET: "   " };
    expect(readEnv(env, "CRF")).toBe("20");
    expect(readEnv(env, "PRESET")).toBeUndefined();
    expect(readEnv(env, "GOP")).toBeUndefined();
  });
});
