/**
 * Amount and argument parsing. Token amounts are bigint base units on the
 * wire; humans type decimals.
 */

import { ACCOUNT_PATTERN, REWARD_DENOMINATOR } from "@curvebond/primitives";

/** "1.5" at 18 decimals → 1500000000000000000n. */
export function parseUnits(value: string, decimals: number): bigint {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid amount: ${value}`);
  }
  const whole = match[1] ?? "0";
  const fraction = match[2] ?? "";
  if (fraction.length > decimals) {
    throw new Error(`Invalid amount: ${value} has more than ${decimals} decimals`);
  }
  return BigInt(whole + fraction.padEnd(decimals, "0"));
}

/** 25000000000n at 9 decimals → "25". Trailing fractional zeros are dropped. */
export function formatUnits(amount: bigint, decimals: number): string {
  if (decimals === 0) return amount.toString();
  const digits = amount.toString().padStart(decimals + 1, "0");
  const whole = digits.slice(0, -decimals);
  const fraction = digits.slice(-decimals).replace(/0+$/, "");
  return fraction ? `${whole}.${fraction}` : whole;
}

/** Raw base-unit integer string → bigint. */
export function parseRaw(value: string, label: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid ${label}: must be a non-negative integer. Got: ${value}`);
  }
  return BigInt(value);
}

export function parseNonNegativeInt(value: string, label: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(n)) {
    throw new Error(`Invalid ${label}: must be a non-negative integer. Got: ${value}`);
  }
  return n;
}

/** "0, 2,3" → [0, 2, 3] */
export function parseIndexes(value: string): number[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => parseNonNegativeInt(s, "note index"));
}

export function requireAccount(value: string, label: string): string {
  const account = value.toLowerCase();
  if (!ACCOUNT_PATTERN.test(account)) {
    throw new Error(`Invalid ${label}: must be 64-char hex. Got: ${value}`);
  }
  return account;
}

/** Highest acceptable price: `price` plus `bps` basis points, rounded down. */
export function withSlippage(price: bigint, bps: number): bigint {
  return (price * (REWARD_DENOMINATOR + BigInt(bps))) / REWARD_DENOMINATOR;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
