/**
 * Amount and argument parsing.
 */

import { describe, it, expect } from "vitest";
import {
  formatUnits,
  parseIndexes,
  parseNonNegativeInt,
  parseUnits,
  requireAccount,
  withSlippage,
} from "../src/lib/units.js";

describe("parseUnits", () => {
  it("scales decimals to base units", () => {
    expect(parseUnits("1.5", 18)).toBe(1_500_000_000_000_000_000n);
    expect(parseUnits("10000", 18)).toBe(10_000n * 10n ** 18n);
    expect(parseUnits("0.000000001", 9)).toBe(1n);
  });

  it("rejects more fractional digits than the token has", () => {
    expect(() => parseUnits("0.0000000001", 9)).toThrow("more than 9 decimals");
  });

  it("rejects signs and exponents", () => {
    expect(() => parseUnits("-1", 18)).toThrow("Invalid amount");
    expect(() => parseUnits("1e5", 18)).toThrow("Invalid amount");
  });
});

describe("formatUnits", () => {
  it("drops trailing zeros", () => {
    expect(formatUnits(25_000_000_000n, 9)).toBe("25");
    expect(formatUnits(1_500_000_000_000_000_000n, 18)).toBe("1.5");
  });

  it("pads small amounts", () => {
    expect(formatUnits(5n, 9)).toBe("0.000000005");
    expect(formatUnits(0n, 9)).toBe("0");
  });

  it("passes through zero-decimal tokens", () => {
    expect(formatUnits(42n, 0)).toBe("42");
  });
});

describe("withSlippage", () => {
  it("adds basis points, rounding down", () => {
    expect(withSlippage(400_000_000_000n, 100)).toBe(404_000_000_000n);
    expect(withSlippage(999n, 1)).toBe(999n);
    expect(withSlippage(123n, 0)).toBe(123n);
  });
});

describe("argument parsing", () => {
  it("parses comma-separated indexes", () => {
    expect(parseIndexes("0, 2,3")).toEqual([0, 2, 3]);
    expect(() => parseIndexes("1,x")).toThrow("Invalid note index");
  });

  it("rejects negative and fractional integers", () => {
    expect(parseNonNegativeInt("3600", "duration")).toBe(3600);
    expect(() => parseNonNegativeInt("-1", "duration")).toThrow("Invalid duration");
    expect(() => parseNonNegativeInt("1.5", "duration")).toThrow("Invalid duration");
  });

  it("lowercases and checks accounts", () => {
    expect(requireAccount("AB".repeat(32), "recipient")).toBe("ab".repeat(32));
    expect(() => requireAccount("abc", "recipient")).toThrow("Invalid recipient");
  });
});
