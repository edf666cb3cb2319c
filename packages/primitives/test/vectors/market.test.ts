/**
 * Golden test vectors — market creation math.
 *
 * Reference market: 9-decimal base token with 10,000 units of supply,
 * 18-decimal quote token, 10,000 quote of capacity at 400 quote per base
 * over one week, six-hour deposit interval, 100% debt buffer.
 */

import { describe, it, expect } from "vitest";
import {
  createMarketState,
  isMarketLive,
  quoteToBase,
  cloneMarketState,
  type CreateMarketParams,
  type MarketContext,
} from "../../src/market.js";
import { isBondError } from "../../src/errors.js";
import { ZERO_ACCOUNT } from "../../src/constants.js";

// ── Helpers ────────────────────────────────────────────────────────

const QUOTE = "ab".repeat(32);
const WEEK = 604_800;
const T0 = 1_700_000_000;

const ctx: MarketContext = {
  now: T0,
  baseSupply: 10_000n * 10n ** 9n,
  baseDecimals: 9,
  quoteDecimals: 18,
};

function params(overrides: Partial<CreateMarketParams> = {}): CreateMarketParams {
  return {
    quoteToken: QUOTE,
    capacity: 10_000n * 10n ** 18n,
    initialPrice: 400n * 10n ** 9n,
    debtBuffer: 100_000n,
    capacityInQuote: true,
    fixedTerm: true,
    vesting: 3600,
    conclusion: T0 + WEEK,
    depositInterval: 21_600,
    tuneInterval: 86_400,
    ...overrides,
  };
}

function rejection(p: CreateMarketParams): string | undefined {
  try {
    createMarketState(p, ctx);
  } catch (err) {
    return isBondError(err, "InvalidConfiguration") ? err.reason : "wrong error";
  }
  return undefined;
}

// ── Tests ──────────────────────────────────────────────────────────

describe("quoteToBase", () => {
  it("400 quote buys one base at 400", () => {
    expect(quoteToBase(400n * 10n ** 18n, 400n * 10n ** 9n, 9, 18)).toBe(10n ** 9n);
  });
});

describe("createMarketState", () => {
  const state = createMarketState(params(), ctx);

  it("converts quote capacity to target debt at the initial price", () => {
    // 10,000 quote / 400 = 25 base
    expect(state.market.totalDebt).toBe(25n * 10n ** 9n);
  });

  it("sizes max payout by deposit interval over time to conclusion", () => {
    // 25e9 * 21600 / 604800 = 892857142.85…
    expect(state.market.maxPayout).toBe(892_857_142n);
  });

  it("adds the debt buffer to the debt ceiling", () => {
    expect(state.terms.maxDebt).toBe(50n * 10n ** 9n);
  });

  it("derives the control variable from price, supply and target debt", () => {
    // 400e9 * 1e13 / 25e9
    expect(state.terms.controlVariable).toBe(160_000_000_000_000n);
  });

  it("starts clocks at creation with no adjustment", () => {
    expect(state.metadata.lastTune).toBe(T0);
    expect(state.metadata.lastDecay).toBe(T0);
    expect(state.metadata.length).toBe(WEEK);
    expect(state.metadata.quoteDecimals).toBe(18);
    expect(state.adjustment.active).toBe(false);
    expect(state.market.purchased).toBe(0n);
    expect(state.market.sold).toBe(0n);
  });

  it("keeps base-denominated capacity as target debt", () => {
    const base = createMarketState(
      params({ capacityInQuote: false, capacity: 25n * 10n ** 9n }),
      ctx,
    );
    expect(base.market.totalDebt).toBe(25n * 10n ** 9n);
    expect(base.terms.controlVariable).toBe(state.terms.controlVariable);
  });

  it("rejects a zero quote token", () => {
    expect(rejection(params({ quoteToken: ZERO_ACCOUNT }))).toMatch(/quote token/);
  });

  it("rejects a conclusion that is not in the future", () => {
    expect(rejection(params({ conclusion: T0 }))).toMatch(/conclusion/);
  });

  it("rejects zero intervals and an oversized buffer", () => {
    expect(rejection(params({ depositInterval: 0 }))).toMatch(/deposit interval/);
    expect(rejection(params({ tuneInterval: 0 }))).toMatch(/tune interval/);
    expect(rejection(params({ debtBuffer: 1_000_001n }))).toMatch(/debt buffer/);
  });

  it("rejects capacity that converts to nothing", () => {
    expect(rejection(params({ capacity: 1n }))).toMatch(/zero base units/);
  });

  it("rejects a market whose opening price rounds to zero", () => {
    // 0-decimal quote: debt ratio = 1000e9 * 1 / 10,000e9 = 0, though CV = 4e12
    const wholeUnits: MarketContext = { ...ctx, quoteDecimals: 0 };
    const p = params({ capacityInQuote: false, capacity: 1_000n * 10n ** 9n });
    let reason: string | undefined;
    try {
      createMarketState(p, wholeUnits);
    } catch (err) {
      reason = isBondError(err, "InvalidConfiguration") ? err.reason : "wrong error";
    }
    expect(reason).toBe("opening price rounds to zero at the quote token's decimals");
  });
});

describe("isMarketLive", () => {
  const state = createMarketState(params(), ctx);

  it("is live until conclusion", () => {
    expect(isMarketLive(state, T0)).toBe(true);
    expect(isMarketLive(state, T0 + WEEK - 1)).toBe(true);
    expect(isMarketLive(state, T0 + WEEK)).toBe(false);
  });

  it("is closed once capacity is exhausted", () => {
    const drained = cloneMarketState(state);
    drained.market.capacity = 0n;
    expect(isMarketLive(drained, T0)).toBe(false);
    // clone is independent
    expect(state.market.capacity).toBe(10_000n * 10n ** 18n);
  });
});
