/**
 * curvebond keygen
 *
 * Generate Ed25519 keypair → write to ~/.curvebond/key.json.
 * The public key is the account that signs deposits and owns notes.
 */

import { existsSync } from "node:fs";
import type { CliConfig } from "../lib/config.js";
import { generateAndSaveKeys } from "../lib/keys.js";

interface KeygenOptions {
  force?: boolean;
}

export async function keygenCommand(
  config: CliConfig,
  opts: KeygenOptions,
): Promise<void> {
  const keyPath = config.keyPath;

  if (existsSync(keyPath) && !opts.force) {
    throw new Error(`Key file already exists at ${keyPath}\nUse --force to overwrite.`);
  }

  console.log(`Generating Ed25519 keypair...`);
  const keyFile = await generateAndSaveKeys(keyPath);

  console.log(`  account: ${keyFile.publicKey}`);
  console.log(`  saved:   ${keyPath}`);
}
