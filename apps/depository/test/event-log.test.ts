import { describe, it, expect } from "vitest";
import { EventLog } from "../src/event-log/event-log.js";
import { GENESIS_PREV } from "../src/event-log/schemas.js";

describe("EventLog", () => {
  it("links each entry to the previous id", () => {
    const log = new EventLog();
    const first = log.append("market.create.v1", 100, { market_id: 0 });
    const second = log.append("bond.v1", 101, { market_id: 0, payout: "25" });

    expect(first.seq).toBe(0);
    expect(first.prev).toBe(GENESIS_PREV);
    expect(second.prev).toBe(first.id);
    expect(log.head()).toBe(second.id);
    expect(log.verifyChain()).toBe(-1);
  });

  it("returns entries from a sequence number", () => {
    const log = new EventLog();
    log.append("market.create.v1", 100, { market_id: 0 });
    log.append("bond.v1", 101, { market_id: 0 });
    log.append("redeem.v1", 102, { owner: "x" });

    expect(log.since(1).map((e) => e.type)).toEqual(["bond.v1", "redeem.v1"]);
    expect(log.ofType("bond.v1")).toHaveLength(1);
    expect(log.count()).toBe(3);
  });

  it("detects a tampered payload", () => {
    const log = new EventLog();
    log.append("market.create.v1", 100, { market_id: 0 });
    log.append("bond.v1", 101, { payout: "25" });

    const entries = log.since(0);
    const tampered = entries.map((e) => (e.seq === 1 ? { ...e, payload: { payout: "26" } } : e));
    expect(EventLog.verifyChain(entries)).toBe(-1);
    expect(EventLog.verifyChain(tampered)).toBe(1);
  });

  it("an empty log has the genesis head", () => {
    expect(new EventLog().head()).toBe(GENESIS_PREV);
  });
});
