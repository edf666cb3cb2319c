import { describe, it, expect } from "vitest";
import { createMarketState, isBondError, type Note } from "@curvebond/primitives";
import { MarketLedger } from "../src/ledger/market-ledger.js";
import { NoteLedger } from "../src/ledger/note-ledger.js";
import { RewardsLedger } from "../src/ledger/rewards.js";
import { BASE_SUPPLY, DAO, OTHER, REFERRER, T0, BUYER, referenceParams } from "./helpers.js";

// ── Helpers ────────────────────────────────────────────────────────

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isBondError(err) ? err.code : "not-a-bond-error";
  }
  return undefined;
}

function note(payout: bigint, matured = T0): Note {
  return { payout, created: T0, matured, redeemed: 0, marketId: 0 };
}

const state = () =>
  createMarketState(referenceParams(), {
    now: T0,
    baseSupply: BASE_SUPPLY,
    baseDecimals: 9,
    quoteDecimals: 18,
  });

// ── Market ledger ──────────────────────────────────────────────────

describe("MarketLedger", () => {
  it("hands out copies; only put() changes stored state", () => {
    const ledger = new MarketLedger();
    const id = ledger.add(state());

    const copy = ledger.get(id);
    copy.market.capacity = 1n;
    expect(ledger.market(id).capacity).toBe(10_000n * 10n ** 9n);

    ledger.put(id, copy);
    expect(ledger.market(id).capacity).toBe(1n);
  });

  it("restores a snapshot", () => {
    const ledger = new MarketLedger();
    const id = ledger.add(state());
    const snapshot = ledger.get(id);

    const changed = ledger.get(id);
    changed.terms.controlVariable = 7n;
    ledger.put(id, changed);
    ledger.restore(id, snapshot);

    expect(ledger.terms(id)).toEqual(snapshot.terms);
  });

  it("throws MarketNotFound for unknown ids", () => {
    const ledger = new MarketLedger();
    expect(codeOf(() => ledger.get(0))).toBe("MarketNotFound");
    expect(codeOf(() => ledger.put(0, state()))).toBe("MarketNotFound");
    expect(codeOf(() => ledger.adjustment(-1))).toBe("MarketNotFound");
  });
});

// ── Note ledger ────────────────────────────────────────────────────

describe("NoteLedger", () => {
  it("indexesFor reads current state on every pass", () => {
    const ledger = new NoteLedger();
    ledger.append(BUYER, note(5n));
    ledger.append(BUYER, note(0n));
    ledger.append(BUYER, note(7n));

    expect([...ledger.indexesFor(BUYER)]).toEqual([0, 2]);
    ledger.markRedeemed(BUYER, 0, T0);
    expect([...ledger.indexesFor(BUYER)]).toEqual([2]);
    expect([...ledger.indexesFor(OTHER)]).toEqual([]);
  });

  it("a later push replaces the earlier grant", () => {
    const ledger = new NoteLedger();
    ledger.append(BUYER, note(5n));
    ledger.push(BUYER, 0, OTHER);
    ledger.push(BUYER, 0, REFERRER);

    expect(codeOf(() => ledger.pull(OTHER, BUYER, 0))).toBe("TransferNotApproved");
    expect(ledger.pull(REFERRER, BUYER, 0)).toBe(0);
  });

  it("never reuses an index after a pull", () => {
    const ledger = new NoteLedger();
    ledger.append(BUYER, note(5n));
    ledger.push(BUYER, 0, OTHER);
    ledger.pull(OTHER, BUYER, 0);

    expect(ledger.find(BUYER, 0)).toBeUndefined();
    expect(ledger.append(BUYER, note(9n))).toBe(1);
    expect(codeOf(() => ledger.push(BUYER, 0, OTHER))).toBe("NoteNotFound");
  });

  it("restores notes and grants from a snapshot", () => {
    const ledger = new NoteLedger();
    ledger.append(BUYER, note(5n));
    ledger.push(BUYER, 0, OTHER);
    const snapshot = ledger.snapshot(BUYER);

    ledger.append(BUYER, note(6n));
    ledger.markRedeemed(BUYER, 0, T0 + 1);
    ledger.restore(snapshot);

    expect(ledger.notesFor(BUYER)).toEqual([{ index: 0, note: note(5n) }]);
    expect(ledger.grantFor(BUYER, 0)).toBe(OTHER);
  });
});

// ── Rewards ledger ─────────────────────────────────────────────────

describe("RewardsLedger", () => {
  it("floors each cut separately", () => {
    const rewards = new RewardsLedger({ refReward: 10n, daoReward: 50n, dao: DAO });
    // 999 * 50 / 10000 = 4, 999 * 10 / 10000 = 0
    expect(rewards.accrue(999n, REFERRER)).toEqual({ toRef: 0n, toDao: 4n, refRecipient: DAO });
    expect(rewards.rewardsFor(DAO)).toBe(4n);
  });

  it("take() zeroes the balance", () => {
    const rewards = new RewardsLedger({ refReward: 10n, daoReward: 50n, dao: DAO });
    rewards.accrue(10_000n, REFERRER);
    expect(rewards.take(DAO)).toBe(60n);
    expect(rewards.rewardsFor(DAO)).toBe(0n);
  });

  it("rejects rates above the denominator", () => {
    expect(codeOf(() => new RewardsLedger({ refReward: 10_001n, daoReward: 0n, dao: DAO }))).toBe(
      "InvalidConfiguration",
    );
    expect(codeOf(() => RewardsLedger.validate(5_000n, 5_000n))).toBeUndefined();
  });
});
