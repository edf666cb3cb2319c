/**
 * Canonical serialization — deterministic CBOR encoding.
 *
 * Rules:
 *   1. Stable field order (lexicographic by key)
 *   2. bigint amounts become decimal strings, matching the JSON wire format
 *   3. undefined fields are dropped
 *   4. CBOR (RFC 8949) with canonical map key ordering
 *
 * Request signatures and event-log ids are computed over these bytes.
 */

import { Encoder } from "cbor-x";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

function normalize(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return value;
  if (Array.isArray(value)) return value.map(normalize);
  if (typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, field] of entries) {
      if (field === undefined) continue;
      sorted[key] = normalize(field);
    }
    return sorted;
  }
  return value;
}

export function canonicalEncode(obj: unknown): Uint8Array {
  return encoder.encode(normalize(obj));
}

export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}
