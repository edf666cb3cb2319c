/**
 * Signed request envelopes — Ed25519 over canonical(payload).
 */

import { describe, it, expect } from "vitest";
import { generateKeypair } from "../../src/ed25519.js";
import { toHex } from "../../src/digest.js";
import { signRequest, verifyRequestSignature } from "../../src/request-signature.js";

const payload = {
  action: "rewards.claim",
  timestamp: 1_700_000_000,
};

describe("request signatures", () => {
  it("signer is the hex public key and the signature verifies", () => {
    const { publicKey, privateKey } = generateKeypair();
    const signed = signRequest(privateKey, payload);

    expect(signed.signer).toBe(toHex(publicKey));
    expect(verifyRequestSignature(signed.signer, signed.sig, signed.payload)).toBe(true);
  });

  it("verification ignores payload key order", () => {
    const { privateKey } = generateKeypair();
    const signed = signRequest(privateKey, payload);
    const reordered = { timestamp: payload.timestamp, action: payload.action };
    expect(verifyRequestSignature(signed.signer, signed.sig, reordered)).toBe(true);
  });

  it("rejects a tampered payload", () => {
    const { privateKey } = generateKeypair();
    const signed = signRequest(privateKey, payload);
    expect(
      verifyRequestSignature(signed.signer, signed.sig, { ...payload, timestamp: payload.timestamp + 1 }),
    ).toBe(false);
  });

  it("rejects another signer's key", () => {
    const alice = generateKeypair();
    const bob = generateKeypair();
    const signed = signRequest(alice.privateKey, payload);
    expect(verifyRequestSignature(toHex(bob.publicKey), signed.sig, payload)).toBe(false);
  });

  it("rejects malformed keys and signatures", () => {
    const { privateKey } = generateKeypair();
    const signed = signRequest(privateKey, payload);
    expect(verifyRequestSignature("xyz", signed.sig, payload)).toBe(false);
    expect(verifyRequestSignature(signed.signer, "AAAA", payload)).toBe(false);
    expect(verifyRequestSignature(signed.signer, "", payload)).toBe(false);
  });
});
