/**
 * SHA256 digests of bytes and canonically-encoded objects, as hex.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { canonicalEncode } from "./canonical.js";

/** 32-byte hex-encoded SHA256 hash. */
export type Digest = string;

export function digestBytes(bytes: Uint8Array): Digest {
  return bytesToHex(sha256(bytes));
}

export function digestObject(obj: unknown): Digest {
  return bytesToHex(sha256(canonicalEncode(obj)));
}

export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}
