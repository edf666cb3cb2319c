/**
 * curvebond config [--depository url] [--key-path path]
 *
 * Show or update CLI configuration.
 */

import { loadConfig, saveConfig, getConfigPath } from "../lib/config.js";

interface ConfigOptions {
  depository?: string;
  keyPath?: string;
}

export async function configCommand(opts: ConfigOptions): Promise<void> {
  const config = await loadConfig();
  let changed = false;

  if (opts.depository) {
    // New primary, others kept as fallbacks
    const existing = config.depositories.filter((d) => d !== opts.depository);
    config.depositories = [opts.depository, ...existing];
    config.depository = opts.depository;
    changed = true;
  }
  if (opts.keyPath) {
    config.keyPath = opts.keyPath;
    changed = true;
  }

  if (changed) {
    await saveConfig(config);
    console.log(`Config saved to ${getConfigPath()}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  depositories: ${config.depositories.join(", ") || "(none)"}`);
  console.log(`  keyPath:      ${config.keyPath}`);
}
