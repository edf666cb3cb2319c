/**
 * Golden test vectors — canonical serialization and digests.
 * These vectors are FROZEN. If a test breaks, the code is wrong, not the vector.
 */

import { describe, it, expect } from "vitest";
import { canonicalEncode, canonicalDecode } from "../../src/canonical.js";
import { digestBytes, digestObject, toHex } from "../../src/digest.js";

describe("canonical serialization", () => {
  it("produces deterministic output regardless of key insertion order", () => {
    const a = canonicalEncode({ z: 1, a: 2, m: { y: 1, b: 2 } });
    const b = canonicalEncode({ m: { b: 2, y: 1 }, a: 2, z: 1 });
    expect(toHex(a)).toBe(toHex(b));
  });

  it("encodes bigint amounts as decimal strings", () => {
    const decoded = canonicalDecode(canonicalEncode({ amount: 10n ** 30n }));
    expect(decoded).toEqual({ amount: "1000000000000000000000000000000" });
  });

  it("drops undefined fields", () => {
    const withUndefined = canonicalEncode({ a: 1, b: undefined });
    const without = canonicalEncode({ a: 1 });
    expect(toHex(withUndefined)).toBe(toHex(without));
  });

  it("round-trips a deposit payload", () => {
    const payload = {
      action: "deposit",
      amount: "400000000000000000000",
      market_id: 0,
      max_price: "400000000000",
      recipient: "ab".repeat(32),
      referrer: "00".repeat(32),
      timestamp: 1_700_000_000,
    };
    expect(canonicalDecode(canonicalEncode(payload))).toEqual(payload);
  });
});

describe("digests", () => {
  it("hashes empty input to the SHA256 of nothing", () => {
    expect(digestBytes(new Uint8Array(0))).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("object digest ignores key order", () => {
    expect(digestObject({ b: 1, a: 2 })).toBe(digestObject({ a: 2, b: 1 }));
    expect(digestObject({ b: 1, a: 2 })).toMatch(/^[0-9a-f]{64}$/);
  });
});
