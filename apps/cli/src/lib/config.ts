/**
 * CLI configuration — loads from ~/.curvebond/config.json + env overrides.
 *
 * Priority: env vars > config file > defaults.
 *
 * Multi-endpoint support:
 *   "depositories" enables retry-with-rotation. The singular "depository"
 *   field is kept for hand-written configs and always resolves to the first
 *   entry of the list.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export interface CliConfig {
  /** Primary depository URL (first entry of depositories[]). */
  depository: string;
  /** All depository endpoints, ordered by preference. */
  depositories: string[];
  keyPath: string;
}

const FileConfig = Type.Object({
  depository: Type.Optional(Type.String()),
  depositories: Type.Optional(Type.Array(Type.String())),
  keyPath: Type.Optional(Type.String()),
});
type FileConfig = Static<typeof FileConfig>;

const CONFIG_DIR = join(homedir(), ".curvebond");
const CONFIG_FILE = join(CONFIG_DIR, "config.json");
const DEFAULT_KEY_PATH = join(CONFIG_DIR, "key.json");

export const DEFAULT_DEPOSITORY = "http://localhost:3200";

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function getConfigPath(): string {
  return CONFIG_FILE;
}

export async function ensureConfigDir(): Promise<void> {
  await mkdir(CONFIG_DIR, { recursive: true });
}

/** Comma-separated list → trimmed, non-empty entries. */
export function splitList(value: string | undefined): string[] | undefined {
  const items = value?.split(",").map((s) => s.trim()).filter(Boolean);
  return items && items.length > 0 ? items : undefined;
}

/** Merge env over file config. Pure; loadConfig feeds it. */
export function resolveConfig(
  env: Record<string, string | undefined>,
  file: FileConfig,
): CliConfig {
  // env list > env single > file list > file single > default
  const envSingle = env["CURVEBOND_DEPOSITORY"];
  const depositories =
    splitList(env["CURVEBOND_DEPOSITORIES"]) ??
    (envSingle ? [envSingle] : undefined) ??
    (file.depositories && file.depositories.length > 0 ? file.depositories : undefined) ??
    (file.depository ? [file.depository] : undefined) ??
    [DEFAULT_DEPOSITORY];

  return {
    depository: depositories[0] ?? DEFAULT_DEPOSITORY,
    depositories,
    keyPath: env["CURVEBOND_KEY_PATH"] ?? file.keyPath ?? DEFAULT_KEY_PATH,
  };
}

async function readFileConfig(): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(CONFIG_FILE, "utf-8");
  } catch {
    return {}; // no config file yet
  }
  const parsed: unknown = JSON.parse(raw);
  if (!Value.Check(FileConfig, parsed)) {
    throw new Error(`Invalid config file at ${CONFIG_FILE}`);
  }
  return parsed;
}

/** Load config, merging env overrides on top. */
export async function loadConfig(): Promise<CliConfig> {
  return resolveConfig(process.env, await readFileConfig());
}

/** Save config to disk. The singular field is derived, so only the list is kept. */
export async function saveConfig(config: CliConfig): Promise<void> {
  await ensureConfigDir();
  const toSave: FileConfig = {
    depositories: config.depositories,
    keyPath: config.keyPath,
  };
  await writeFile(CONFIG_FILE, JSON.stringify(toSave, null, 2) + "\n", "utf-8");
}
