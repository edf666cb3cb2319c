/**
 * Depository HTTP surface — signed requests, status mapping, wire format.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { generateKeypair, signRequest, toHex, ZERO_ACCOUNT } from "@curvebond/primitives";
import { buildApp, statusFor } from "../src/server.js";
import { DAO, DAY, E18, E9, HOUR, QUOTE, T0, createFixture, type Fixture } from "./helpers.js";

// ── Helpers ────────────────────────────────────────────────────────

const admin = generateKeypair();
const buyer = generateKeypair();
const other = generateKeypair();
const ADMIN_HEX = toHex(admin.publicKey);
const BUYER_HEX = toHex(buyer.publicKey);
const OTHER_HEX = toHex(other.publicKey);

let app: FastifyInstance;
let f: Fixture;

function createMarketBody(overrides: Record<string, unknown> = {}) {
  return signRequest(admin.privateKey, {
    action: "market.create",
    timestamp: T0,
    quote_token: QUOTE,
    capacity: (10_000n * E9).toString(),
    initial_price: (400n * E9).toString(),
    debt_buffer: 100_000,
    capacity_in_quote: false,
    fixed_term: true,
    vesting: 100,
    conclusion: T0 + DAY,
    deposit_interval: 4 * HOUR,
    tune_interval: HOUR,
    ...overrides,
  });
}

function depositBody(overrides: Record<string, unknown> = {}) {
  return signRequest(buyer.privateKey, {
    action: "deposit",
    timestamp: T0,
    market_id: 0,
    amount: (10_000n * E18).toString(),
    max_price: (1_000n * E9).toString(),
    recipient: BUYER_HEX,
    referrer: ZERO_ACCOUNT,
    ...overrides,
  });
}

async function post(url: string, payload: object) {
  return app.inject({ method: "POST", url, payload });
}

async function createMarketAndDeposit(): Promise<void> {
  expect((await post("/markets", createMarketBody())).statusCode).toBe(200);
  expect((await post("/markets/0/deposit", depositBody())).statusCode).toBe(200);
}

beforeEach(async () => {
  f = await createFixture({ admin: ADMIN_HEX, buyer: BUYER_HEX });
  app = await buildApp({ depository: f.depository, clock: f.clock, logLevel: "silent" });
});

afterEach(async () => {
  await app.close();
});

// ── Tests ──────────────────────────────────────────────────────────

describe("status mapping", () => {
  it("maps codes to statuses", () => {
    expect(statusFor("MarketNotFound")).toBe(404);
    expect(statusFor("NoteNotFound")).toBe(404);
    expect(statusFor("Unauthorized")).toBe(403);
    expect(statusFor("TransferFailed")).toBe(502);
    expect(statusFor("SlippageExceeded")).toBe(422);
  });
});

describe("GET /health", () => {
  it("reports liveness and market count", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok", timestamp: T0, markets: 0 });
  });
});

describe("POST /markets", () => {
  it("creates a market for the administrator", async () => {
    const res = await post("/markets", createMarketBody());
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ market_id: 0 });
  });

  it("returns 403 for anyone else", async () => {
    const body = signRequest(buyer.privateKey, createMarketBody().payload);
    const res = await post("/markets", body);
    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({ error: "Unauthorized", detail: "administrator only" });
  });

  it("returns 401 when the signature is not the signer's", async () => {
    const forged = { ...createMarketBody(), signer: BUYER_HEX };
    const res = await post("/markets", forged);
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "invalid_signature", detail: "signature does not verify" });
  });

  it("returns 401 for a stale timestamp", async () => {
    const res = await post("/markets", createMarketBody({ timestamp: T0 - 301 }));
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "invalid_signature", detail: "timestamp outside allowed window" });
  });

  it("returns 400 for a malformed payload", async () => {
    const res = await post("/markets", createMarketBody({ capacity: "ten" }));
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
  });

  it("returns 409 when the same signed request is replayed", async () => {
    const body = createMarketBody();
    expect((await post("/markets", body)).statusCode).toBe(200);

    const replay = await post("/markets", body);
    expect(replay.statusCode).toBe(409);
    expect(replay.json()).toEqual({ error: "duplicate_request", detail: "request already accepted" });
    expect(await f.depository.marketCount()).toBe(1);
  });

  it("returns 422 for invalid configuration", async () => {
    const res = await post("/markets", createMarketBody({ conclusion: T0 }));
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ error: "InvalidConfiguration", detail: "conclusion must be in the future" });
  });
});

describe("market reads", () => {
  beforeEach(async () => {
    await post("/markets", createMarketBody());
  });

  it("GET /markets/:id returns records and pricing views", async () => {
    const res = await app.inject({ method: "GET", url: "/markets/0" });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.id).toBe(0);
    expect(body.is_live).toBe(true);
    expect(body.price).toBe("400000000000");
    expect(body.control_variable).toBe("400000000000");
    expect(body.market.capacity).toBe("10000000000000");
    expect(body.market.max_payout).toBe("1666666666666");
    expect(body.terms.max_debt).toBe("20000000000000");
    expect(body.debt_decay).toBe("0");
  });

  it("GET /markets/:id/quote prices an amount", async () => {
    const res = await app.inject({ method: "GET", url: `/markets/0/quote?amount=${10_000n * E18}` });
    expect(res.json()).toEqual({
      market_id: 0,
      amount: "10000000000000000000000",
      price: "400000000000",
      payout: "25000000000",
    });
  });

  it("GET /markets lists live markets, filtered by quote token", async () => {
    expect((await app.inject({ method: "GET", url: "/markets" })).json()).toEqual({ markets: [0] });
    const other = await app.inject({ method: "GET", url: `/markets?quote_token=${"12".repeat(32)}` });
    expect(other.json()).toEqual({ markets: [] });
  });

  it("returns 404 for an unknown market", async () => {
    const res = await app.inject({ method: "GET", url: "/markets/5" });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe("MarketNotFound");
  });

  it("POST /markets/:id/close concludes the market", async () => {
    const body = signRequest(admin.privateKey, { action: "market.close", timestamp: T0, market_id: 0 });
    const res = await post("/markets/0/close", body);
    expect(res.json()).toEqual({ market_id: 0, closed: true });
    expect((await app.inject({ method: "GET", url: "/markets" })).json()).toEqual({ markets: [] });
  });
});

describe("POST /markets/:id/deposit", () => {
  beforeEach(async () => {
    await post("/markets", createMarketBody());
  });

  it("issues a note to the recipient", async () => {
    const res = await post("/markets/0/deposit", depositBody());
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ market_id: 0, payout: "25000000000", matured: T0 + 100, index: 0 });

    const notes = await app.inject({ method: "GET", url: `/notes/${BUYER_HEX}` });
    expect(notes.json()).toEqual({
      owner: BUYER_HEX,
      notes: [
        {
          index: 0,
          payout: "25000000000",
          created: T0,
          matured: T0 + 100,
          redeemed: 0,
          market_id: 0,
        },
      ],
      pending: [0],
    });
  });

  it("returns 422 SlippageExceeded above max price", async () => {
    const res = await post("/markets/0/deposit", depositBody({ max_price: "1" }));
    expect(res.statusCode).toBe(422);
    expect(res.json().error).toBe("SlippageExceeded");
  });

  it("returns 502 when the quote transfer fails", async () => {
    f.quote.failTransfers = "reject";
    const res = await post("/markets/0/deposit", depositBody());
    expect(res.statusCode).toBe(502);
    expect(res.json().error).toBe("TransferFailed");
  });

  it("returns 400 when the payload names another market", async () => {
    const res = await post("/markets/0/deposit", depositBody({ market_id: 1 }));
    expect(res.statusCode).toBe(400);
  });

  it("issues one note for a replayed deposit", async () => {
    const body = depositBody();
    expect((await post("/markets/0/deposit", body)).statusCode).toBe(200);

    const replay = await post("/markets/0/deposit", body);
    expect(replay.statusCode).toBe(409);
    expect(replay.json().error).toBe("duplicate_request");

    const notes = await app.inject({ method: "GET", url: `/notes/${BUYER_HEX}` });
    expect(notes.json().pending).toEqual([0]);
    const market = await app.inject({ method: "GET", url: "/markets/0" });
    expect(market.json().market.purchased).toBe((10_000n * E18).toString());
  });

  it("accepts the same deposit re-signed at a new timestamp", async () => {
    expect((await post("/markets/0/deposit", depositBody())).statusCode).toBe(200);
    const res = await post("/markets/0/deposit", depositBody({ timestamp: T0 + 1 }));
    expect(res.statusCode).toBe(200);
    expect(res.json().index).toBe(1);
  });
});

describe("notes", () => {
  beforeEach(createMarketAndDeposit);

  it("GET /notes/:owner/:index reports pending status", async () => {
    const res = await app.inject({ method: "GET", url: `/notes/${BUYER_HEX}/0` });
    expect(res.json().pending).toEqual({ payout: "25000000000", matured: false });

    const missing = await app.inject({ method: "GET", url: `/notes/${BUYER_HEX}/3` });
    expect(missing.statusCode).toBe(404);
  });

  it("POST /notes/:owner/redeem pays matured notes", async () => {
    f.clock.advance(100);
    const res = await post(`/notes/${BUYER_HEX}/redeem`, {});
    expect(res.json()).toEqual({ owner: BUYER_HEX, payout: "25000000000" });
    expect(await f.base.balanceOf(BUYER_HEX)).toBe(25n * E9);

    const again = await post(`/notes/${BUYER_HEX}/redeem`, { indexes: [0] });
    expect(again.json()).toEqual({ owner: BUYER_HEX, payout: "0" });
  });

  it("push then pull moves the note", async () => {
    const push = signRequest(buyer.privateKey, { action: "note.push", timestamp: T0, index: 0, to: OTHER_HEX });
    expect((await post(`/notes/${BUYER_HEX}/0/push`, push)).statusCode).toBe(200);

    const pull = signRequest(other.privateKey, { action: "note.pull", timestamp: T0, from: BUYER_HEX, index: 0 });
    const res = await post(`/notes/${BUYER_HEX}/0/pull`, pull);
    expect(res.json()).toEqual({ owner: OTHER_HEX, index: 0, from: BUYER_HEX });
  });

  it("only the owner may push", async () => {
    const push = signRequest(other.privateKey, { action: "note.push", timestamp: T0, index: 0, to: OTHER_HEX });
    const res = await post(`/notes/${BUYER_HEX}/0/push`, push);
    expect(res.statusCode).toBe(403);
  });

  it("pull without a grant returns 422 TransferNotApproved", async () => {
    const pull = signRequest(other.privateKey, { action: "note.pull", timestamp: T0, from: BUYER_HEX, index: 0 });
    const res = await post(`/notes/${BUYER_HEX}/0/pull`, pull);
    expect(res.statusCode).toBe(422);
    expect(res.json().error).toBe("TransferNotApproved");
  });
});

describe("rewards and admin", () => {
  beforeEach(createMarketAndDeposit);

  it("GET /rewards/:account shows accrued rewards", async () => {
    const res = await app.inject({ method: "GET", url: `/rewards/${DAO}` });
    expect(res.json()).toEqual({ account: DAO, rewards: "150000000" });
  });

  it("POST /rewards/claim pays the signer", async () => {
    await f.depository.whitelist(ADMIN_HEX, OTHER_HEX);
    await post("/markets/0/deposit", depositBody({ referrer: OTHER_HEX, amount: (400n * E18).toString() }));

    const claim = signRequest(other.privateKey, { action: "rewards.claim", timestamp: T0 });
    const res = await post("/rewards/claim", claim);
    expect(res.statusCode).toBe(200);
    expect(res.json().account).toBe(OTHER_HEX);
    expect(await f.base.balanceOf(OTHER_HEX)).toBe(BigInt(res.json().amount));
  });

  it("POST /admin/whitelist requires the administrator", async () => {
    const byBuyer = signRequest(buyer.privateKey, { action: "admin.whitelist", timestamp: T0, referrer: OTHER_HEX });
    expect((await post("/admin/whitelist", byBuyer)).statusCode).toBe(403);

    const byAdmin = signRequest(admin.privateKey, { action: "admin.whitelist", timestamp: T0, referrer: OTHER_HEX });
    expect((await post("/admin/whitelist", byAdmin)).json()).toEqual({ referrer: OTHER_HEX, whitelisted: true });
    expect(await f.depository.isWhitelisted(OTHER_HEX)).toBe(true);
  });

  it("POST /admin/treasury rejects a payload signed for another setting", async () => {
    const body = signRequest(admin.privateKey, { action: "admin.dao", timestamp: T0, account: OTHER_HEX });
    expect((await post("/admin/treasury", body)).statusCode).toBe(400);
    expect((await post("/admin/dao", body)).json()).toEqual({ dao: OTHER_HEX });
  });

  it("POST /admin/rewards sets basis points", async () => {
    const body = signRequest(admin.privateKey, {
      action: "admin.rewards",
      timestamp: T0,
      ref_reward: 20,
      dao_reward: 80,
    });
    expect((await post("/admin/rewards", body)).statusCode).toBe(200);
    expect(await f.depository.settings()).toMatchObject({ refReward: 20n, daoReward: 80n });
  });
});

describe("GET /events", () => {
  it("returns the committed log from a sequence number", async () => {
    await createMarketAndDeposit();
    const res = await app.inject({ method: "GET", url: "/events?since=1" });
    const body = res.json();
    expect(body.count).toBe(2);
    expect(body.events).toHaveLength(1);
    expect(body.events[0].type).toBe("bond.v1");
    expect(body.head).toBe(body.events[0].id);
  });
});
