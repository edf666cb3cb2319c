/**
 * Shared fixtures: a depository over MemoryTokens on a ManualClock.
 *
 * Base token: 9 decimals, 10,000 units, all in the vault.
 * Quote token: 18 decimals; the buyer holds 2,000,000 and has approved the
 * depository for all of it.
 */

import { pino } from "pino";
import { isBondError, type CreateMarketParams } from "@curvebond/primitives";
import { MemoryToken, TokenRegistry } from "@curvebond/token-client";
import { SingleAdministrator } from "../src/admin.js";
import { ManualClock } from "../src/clock.js";
import { BondDepository } from "../src/depository.js";

export const E9 = 10n ** 9n;
export const E18 = 10n ** 18n;
export const T0 = 1_700_000_000;
export const HOUR = 3600;
export const DAY = 86_400;

export const ADMIN = "ad".repeat(32);
export const BUYER = "b1".repeat(32);
export const OTHER = "c2".repeat(32);
export const REFERRER = "f3".repeat(32);
export const VAULT = "de".repeat(32);
export const TREASURY = "7e".repeat(32);
export const DAO = "da".repeat(32);
export const BASE = "ba".repeat(32);
export const QUOTE = "9e".repeat(32);
export const NO_REFERRER = "00".repeat(32);

export const BASE_SUPPLY = 10_000n * E9;
export const MAX_PRICE = 10n ** 30n;

export interface Fixture {
  clock: ManualClock;
  base: MemoryToken;
  quote: MemoryToken;
  depository: BondDepository;
}

/**
 * admin and buyer default to ADMIN and BUYER; pass real public keys for
 * signed routes. `quote` replaces the default 18-decimal quote token.
 */
export async function createFixture(
  opts: { admin?: string; buyer?: string; quote?: MemoryToken } = {},
): Promise<Fixture> {
  const buyer = opts.buyer ?? BUYER;
  const clock = new ManualClock(T0);
  const base = new MemoryToken({ address: BASE, decimals: 9, initialSupply: BASE_SUPPLY, holder: VAULT });
  const quote = opts.quote ?? new MemoryToken({ address: QUOTE, decimals: 18 });
  quote.mint(buyer, 2_000_000n * E18);
  quote.approve(buyer, VAULT, 2_000_000n * E18);

  const depository = await BondDepository.create({
    baseToken: base,
    quoteTokens: new TokenRegistry([quote]),
    clock,
    admin: new SingleAdministrator(opts.admin ?? ADMIN),
    account: VAULT,
    treasury: TREASURY,
    dao: DAO,
    refReward: 10n,
    daoReward: 50n,
    logger: pino({ level: "silent" }),
  });

  return { clock, base, quote, depository };
}

/**
 * 10,000 base of capacity at 400 quote per base, one day long,
 * 4h deposit interval, 1h tune interval, 100s fixed vesting, no buffer.
 */
export function referenceParams(overrides: Partial<CreateMarketParams> = {}): CreateMarketParams {
  return {
    quoteToken: QUOTE,
    capacity: 10_000n * E9,
    initialPrice: 400n * E9,
    debtBuffer: 0n,
    capacityInQuote: false,
    fixedTerm: true,
    vesting: 100,
    conclusion: T0 + DAY,
    depositInterval: 4 * HOUR,
    tuneInterval: HOUR,
    ...overrides,
  };
}

/** Error code a promise rejects with; "resolved" if it does not. */
export async function rejectionCode(p: Promise<unknown>): Promise<string> {
  try {
    await p;
  } catch (err) {
    return isBondError(err) ? err.code : `unexpected: ${String(err)}`;
  }
  return "resolved";
}
