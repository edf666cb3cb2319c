/**
 * Request payloads for the depository's mutating routes.
 *
 * Each payload is signed as a whole (see request-signature.ts). The `action`
 * literal ties a signature to exactly one route.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { MAX_DEBT_BUFFER, REWARD_DENOMINATOR } from "../constants.js";

const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });
const Amount = Type.String({ pattern: "^[0-9]+$" });
const Timestamp = Type.Integer({ minimum: 0 });

/** Envelope: { signer, sig, payload }. */
export function Signed<T extends TSchema>(payload: T) {
  return Type.Object(
    {
      signer: Hex32,
      sig: Type.String({ minLength: 1 }),
      payload,
    },
    { additionalProperties: false },
  );
}

// ── Markets ────────────────────────────────────────────────────────

export const CreateMarketPayload = Type.Object(
  {
    action: Type.Literal("market.create"),
    timestamp: Timestamp,
    quote_token: Hex32,
    capacity: Amount,
    initial_price: Amount,
    /** 3-decimal percent: 100000 = 100%. */
    debt_buffer: Type.Integer({ minimum: 0, maximum: Number(MAX_DEBT_BUFFER) }),
    capacity_in_quote: Type.Boolean(),
    fixed_term: Type.Boolean(),
    vesting: Type.Integer({ minimum: 0 }),
    conclusion: Timestamp,
    deposit_interval: Type.Integer({ minimum: 1 }),
    tune_interval: Type.Integer({ minimum: 1 }),
  },
  { additionalProperties: false },
);

export type CreateMarketPayload = Static<typeof CreateMarketPayload>;

export const CloseMarketPayload = Type.Object(
  {
    action: Type.Literal("market.close"),
    timestamp: Timestamp,
    market_id: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type CloseMarketPayload = Static<typeof CloseMarketPayload>;

export const DepositPayload = Type.Object(
  {
    action: Type.Literal("deposit"),
    timestamp: Timestamp,
    market_id: Type.Integer({ minimum: 0 }),
    amount: Amount,
    max_price: Amount,
    recipient: Hex32,
    referrer: Hex32,
  },
  { additionalProperties: false },
);

export type DepositPayload = Static<typeof DepositPayload>;

// ── Notes ──────────────────────────────────────────────────────────

export const PushNotePayload = Type.Object(
  {
    action: Type.Literal("note.push"),
    timestamp: Timestamp,
    index: Type.Integer({ minimum: 0 }),
    to: Hex32,
  },
  { additionalProperties: false },
);

export type PushNotePayload = Static<typeof PushNotePayload>;

export const PullNotePayload = Type.Object(
  {
    action: Type.Literal("note.pull"),
    timestamp: Timestamp,
    from: Hex32,
    index: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type PullNotePayload = Static<typeof PullNotePayload>;

export const RedeemBody = Type.Object(
  {
    /** Omit to redeem every pending note. */
    indexes: Type.Optional(Type.Array(Type.Integer({ minimum: 0 }), { maxItems: 1000 })),
  },
  { additionalProperties: false },
);

export type RedeemBody = Static<typeof RedeemBody>;

// ── Rewards + admin ────────────────────────────────────────────────

export const ClaimRewardsPayload = Type.Object(
  {
    action: Type.Literal("rewards.claim"),
    timestamp: Timestamp,
  },
  { additionalProperties: false },
);

export type ClaimRewardsPayload = Static<typeof ClaimRewardsPayload>;

export const SetRewardsPayload = Type.Object(
  {
    action: Type.Literal("admin.rewards"),
    timestamp: Timestamp,
    ref_reward: Type.Integer({ minimum: 0, maximum: Number(REWARD_DENOMINATOR) }),
    dao_reward: Type.Integer({ minimum: 0, maximum: Number(REWARD_DENOMINATOR) }),
  },
  { additionalProperties: false },
);

export type SetRewardsPayload = Static<typeof SetRewardsPayload>;

export const WhitelistPayload = Type.Object(
  {
    action: Type.Literal("admin.whitelist"),
    timestamp: Timestamp,
    referrer: Hex32,
  },
  { additionalProperties: false },
);

export type WhitelistPayload = Static<typeof WhitelistPayload>;

export const SetAccountPayload = Type.Object(
  {
    action: Type.Union([Type.Literal("admin.treasury"), Type.Literal("admin.dao")]),
    timestamp: Timestamp,
    account: Hex32,
  },
  { additionalProperties: false },
);

export type SetAccountPayload = Static<typeof SetAccountPayload>;

export const SignedCreateMarket = Signed(CreateMarketPayload);
export type SignedCreateMarket = Static<typeof SignedCreateMarket>;
export const SignedCloseMarket = Signed(CloseMarketPayload);
export type SignedCloseMarket = Static<typeof SignedCloseMarket>;
export const SignedDeposit = Signed(DepositPayload);
export type SignedDeposit = Static<typeof SignedDeposit>;
export const SignedPushNote = Signed(PushNotePayload);
export type SignedPushNote = Static<typeof SignedPushNote>;
export const SignedPullNote = Signed(PullNotePayload);
export type SignedPullNote = Static<typeof SignedPullNote>;
export const SignedClaimRewards = Signed(ClaimRewardsPayload);
export type SignedClaimRewards = Static<typeof SignedClaimRewards>;
export const SignedSetRewards = Signed(SetRewardsPayload);
export type SignedSetRewards = Static<typeof SignedSetRewards>;
export const SignedWhitelist = Signed(WhitelistPayload);
export type SignedWhitelist = Static<typeof SignedWhitelist>;
export const SignedSetAccount = Signed(SetAccountPayload);
export type SignedSetAccount = Static<typeof SignedSetAccount>;
