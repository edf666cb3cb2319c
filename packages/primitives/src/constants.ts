/**
 * Frozen protocol constants.
 *
 * Changing any of these changes every price, payout and reward the engine
 * computes. Tunable values (reward rates, accounts) live in depository config.
 */

// ── Fixed point ────────────────────────────────────────────────────
export const MAX_UINT256 = 2n ** 256n - 1n;
export const MAX_DECIMALS = 36;

// ── Markets ────────────────────────────────────────────────────────
/** Debt buffer is expressed with 3 decimals of percent: 100_000 = 100%. */
export const DEBT_BUFFER_DENOMINATOR = 100_000n;
/** Largest accepted debt buffer (1000%). */
export const MAX_DEBT_BUFFER = 1_000_000n;

// ── Front-end rewards ──────────────────────────────────────────────
/** Reward rates are basis points of payout. */
export const REWARD_DENOMINATOR = 10_000n;
export const REF_REWARD_BPS_DEFAULT = 10n; // 0.1%
export const DAO_REWARD_BPS_DEFAULT = 50n; // 0.5%

// ── Accounts ───────────────────────────────────────────────────────
/** The "zero address": never a valid recipient, token or account. */
export const ZERO_ACCOUNT = "00".repeat(32);
export const ACCOUNT_PATTERN = /^[0-9a-f]{64}$/;

// ── Signed requests ────────────────────────────────────────────────
export const SIGNATURE_MAX_AGE_SEC_DEFAULT = 300;
