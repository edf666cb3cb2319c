/**
 * Event log schemas — hash-chained append-only events.
 *
 * Every committed mutation appends one event. Each entry commits to its
 * predecessor through `prev`, so a replayed log can be checked end to end
 * with verifyChain().
 */

import { Type, type Static } from "@sinclair/typebox";

const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

export const EventEntry = Type.Object({
  /** Monotonic sequence number within the log, from 0. */
  seq: Type.Integer({ minimum: 0 }),
  /** Event type discriminator. */
  type: Type.String(),
  /** Clock seconds at commit. */
  timestamp: Type.Integer({ minimum: 0 }),
  /** Event-specific payload; amounts as decimal strings. */
  payload: Type.Record(Type.String(), Type.Unknown()),
  /** id of the previous entry; GENESIS_PREV for the first. */
  prev: Hex32,
  /** sha256(canonical({ seq, type, timestamp, payload, prev })) */
  id: Hex32,
});

export type EventEntry = Static<typeof EventEntry>;

export const GENESIS_PREV = "0".repeat(64);

// ── Event types ────────────────────────────────────────────────────

export const MARKET_CREATE_EVENT = "market.create.v1" as const;
export const MARKET_CLOSE_EVENT = "market.close.v1" as const;
export const BOND_EVENT = "bond.v1" as const;
export const TUNE_EVENT = "tune.v1" as const;
export const REDEEM_EVENT = "redeem.v1" as const;
export const NOTE_PUSH_EVENT = "note.push.v1" as const;
export const NOTE_PULL_EVENT = "note.pull.v1" as const;
export const REWARD_CLAIM_EVENT = "reward.claim.v1" as const;
export const ADMIN_EVENT = "admin.v1" as const;

export type EventType =
  | typeof MARKET_CREATE_EVENT
  | typeof MARKET_CLOSE_EVENT
  | typeof BOND_EVENT
  | typeof TUNE_EVENT
  | typeof REDEEM_EVENT
  | typeof NOTE_PUSH_EVENT
  | typeof NOTE_PULL_EVENT
  | typeof REWARD_CLAIM_EVENT
  | typeof ADMIN_EVENT;
