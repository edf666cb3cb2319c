/**
 * Depository configuration.
 */

import {
  DAO_REWARD_BPS_DEFAULT,
  REF_REWARD_BPS_DEFAULT,
  SIGNATURE_MAX_AGE_SEC_DEFAULT,
} from "@curvebond/primitives";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export interface BaseTokenConfig {
  address: string;
  decimals: number;
  /** Minted to the depository vault in dev mode. */
  supply: bigint;
}

export interface QuoteTokenConfig {
  address: string;
  decimals: number;
}

/** "address:decimals:supply" */
export function parseBaseToken(value: string): BaseTokenConfig {
  const [address = "", decimals = "", supply = ""] = value.split(":");
  if (!/^[0-9a-f]{64}$/.test(address) || !/^[0-9]+$/.test(decimals) || !/^[0-9]+$/.test(supply)) {
    throw new Error(`Invalid BASE_TOKEN: expected address:decimals:supply, got "${value}"`);
  }
  return { address, decimals: parseInt(decimals, 10), supply: BigInt(supply) };
}

/** Comma-separated "address:decimals" */
export function parseQuoteTokens(value: string): QuoteTokenConfig[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((entry) => {
      const [address = "", decimals = ""] = entry.split(":");
      if (!/^[0-9a-f]{64}$/.test(address) || !/^[0-9]+$/.test(decimals)) {
        throw new Error(`Invalid QUOTE_TOKENS entry: expected address:decimals, got "${entry}"`);
      }
      return { address, decimals: parseInt(decimals, 10) };
    });
}

export interface DevBalance {
  account: string;
  amount: bigint;
}

/** Comma-separated "account:amount" */
export function parseDevBalances(value: string): DevBalance[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((entry) => {
      const [account = "", amount = ""] = entry.split(":");
      if (!/^[0-9a-f]{64}$/.test(account) || !/^[0-9]+$/.test(amount)) {
        throw new Error(`Invalid DEV_BALANCES entry: expected account:amount, got "${entry}"`);
      }
      return { account, amount: BigInt(amount) };
    });
}

export const config = {
  port: parseInt(env("DEPOSITORY_PORT", "3200"), 10),
  host: env("DEPOSITORY_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),
  /** Hex Ed25519 public key allowed to create/close markets. Empty = no administrator. */
  adminPubkey: env("ADMIN_PUBKEY", "").trim().toLowerCase(),
  /** Depository identity: quote-token spender and base-token vault. */
  depositoryAccount: env("DEPOSITORY_ACCOUNT", "de".repeat(32)),
  /** Receives quote tokens from every bond. */
  treasuryAccount: env("TREASURY_ACCOUNT", "7e".repeat(32)),
  /** Receives the DAO share of front-end rewards. */
  daoAccount: env("DAO_ACCOUNT", "da".repeat(32)),
  /** Basis points of payout, see REWARD_DENOMINATOR. */
  refRewardBps: BigInt(env("REF_REWARD_BPS", String(REF_REWARD_BPS_DEFAULT))),
  daoRewardBps: BigInt(env("DAO_REWARD_BPS", String(DAO_REWARD_BPS_DEFAULT))),
  /** Max clock skew for signed request timestamps (seconds). */
  signatureMaxAgeSec: parseInt(env("SIGNATURE_MAX_AGE_SEC", String(SIGNATURE_MAX_AGE_SEC_DEFAULT)), 10),
  /** Dev-mode base token, backed by MemoryToken. */
  baseToken: parseBaseToken(env("BASE_TOKEN", `${"ba".repeat(32)}:9:10000000000000`)),
  /** Dev-mode quote tokens, backed by MemoryToken. */
  quoteTokens: parseQuoteTokens(env("QUOTE_TOKENS", `${"9e".repeat(32)}:18`)),
  /** Minted on every dev quote token and approved to the depository account. */
  devBalances: parseDevBalances(env("DEV_BALANCES", "")),
} as const;
