/**
 * Key management — load/save Ed25519 keypair from ~/.curvebond/key.json.
 *
 * Key file format:
 * {
 *   "publicKey": "hex64",
 *   "privateKey": "hex64"
 * }
 */

import { readFile, writeFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { toHex, fromHex, generateKeypair } from "@curvebond/primitives";
import { ensureConfigDir } from "./config.js";

const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

export const KeyFile = Type.Object({
  publicKey: Hex32,
  privateKey: Hex32, // seed
});
export type KeyFile = Static<typeof KeyFile>;

export interface LoadedKeys {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
  publicKeyHex: string;
}

/** Load keypair from disk. Throws if not found. */
export async function loadKeys(keyPath: string): Promise<LoadedKeys> {
  let raw: string;
  try {
    raw = await readFile(keyPath, "utf-8");
  } catch {
    throw new Error(`No key file at ${keyPath}\nRun 'curvebond keygen' to generate one.`);
  }

  const data: unknown = JSON.parse(raw);
  if (!Value.Check(KeyFile, data)) {
    throw new Error(`Invalid key file at ${keyPath}: publicKey and privateKey must be 64-char hex`);
  }

  return {
    publicKey: fromHex(data.publicKey),
    privateKey: fromHex(data.privateKey),
    publicKeyHex: data.publicKey,
  };
}

/** Generate and save a new keypair. Returns hex strings. */
export async function generateAndSaveKeys(keyPath: string): Promise<KeyFile> {
  await ensureConfigDir();

  const kp = generateKeypair();
  const keyFile: KeyFile = {
    publicKey: toHex(kp.publicKey),
    privateKey: toHex(kp.privateKey),
  };

  await writeFile(keyPath, JSON.stringify(keyFile, null, 2) + "\n", { encoding: "utf-8", mode: 0o600 });
  return keyFile;
}
