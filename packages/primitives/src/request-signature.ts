/**
 * Signed requests — every mutating call carries the principal's signature.
 *
 *   sig = Ed25519_sign(private_key, canonical(payload))
 *
 * The signature covers the canonical-encoded payload, not the JSON wire
 * format, so it is stable across serializations. `payload.action` binds the
 * signature to one operation and `payload.timestamp` bounds its replay window.
 */

import { canonicalEncode } from "./canonical.js";
import { ACCOUNT_PATTERN } from "./constants.js";
import { fromHex, toHex } from "./digest.js";
import { ed25519Sign, ed25519Verify, publicKeyFor } from "./ed25519.js";

export interface SignedRequest<P> {
  /** Signer's public key (hex). */
  signer: string;
  /** Base64 Ed25519 signature over canonical(payload). */
  sig: string;
  payload: P;
}

export interface RequestPayload {
  action: string;
  /** Seconds since epoch. */
  timestamp: number;
}

export function signRequestPayload(privateKey: Uint8Array, payload: unknown): string {
  const sig = ed25519Sign(privateKey, canonicalEncode(payload));
  return Buffer.from(sig).toString("base64");
}

export function signRequest<P extends RequestPayload>(
  privateKey: Uint8Array,
  payload: P,
): SignedRequest<P> {
  return {
    signer: toHex(publicKeyFor(privateKey)),
    sig: signRequestPayload(privateKey, payload),
    payload,
  };
}

export function verifyRequestSignature(
  pubkeyHex: string,
  sigBase64: string,
  payload: unknown,
): boolean {
  if (!pubkeyHex || !sigBase64) return false;
  if (!ACCOUNT_PATTERN.test(pubkeyHex)) return false;

  const sigBytes = new Uint8Array(Buffer.from(sigBase64, "base64"));
  if (sigBytes.length !== 64) return false;

  return ed25519Verify(fromHex(pubkeyHex), sigBytes, canonicalEncode(payload));
}
