/**
 * Ed25519 keys, signing and verification via @noble/ed25519.
 *
 * Principals (administrator, buyers, note holders) are identified by their
 * 32-byte public key in hex.
 */

import * as ed from "@noble/ed25519";
import { sha512 } from "@noble/hashes/sha512";

// The sync API needs a SHA-512 implementation.
ed.etc.sha512Sync = (...msgs: Uint8Array[]) => sha512(ed.etc.concatBytes(...msgs));

export function generateKeypair(): { publicKey: Uint8Array; privateKey: Uint8Array } {
  const privateKey = ed.utils.randomPrivateKey();
  return { publicKey: ed.getPublicKey(privateKey), privateKey };
}

export function publicKeyFor(privateKey: Uint8Array): Uint8Array {
  return ed.getPublicKey(privateKey);
}

/** 64-byte signature over `message`. */
export function ed25519Sign(privateKey: Uint8Array, message: Uint8Array): Uint8Array {
  return ed.sign(message, privateKey);
}

export function ed25519Verify(
  publicKey: Uint8Array,
  signature: Uint8Array,
  message: Uint8Array,
): boolean {
  try {
    return ed.verify(signature, message, publicKey);
  } catch {
    // malformed key or signature bytes
    return false;
  }
}
