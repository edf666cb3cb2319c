/**
 * NoteV1 — a vesting claim on base tokens.
 */

import { Type, type Static } from "@sinclair/typebox";

const Amount = Type.String({ pattern: "^[0-9]+$" });

export const NoteV1 = Type.Object(
  {
    index: Type.Integer({ minimum: 0 }),
    payout: Amount,
    created: Type.Integer({ minimum: 0 }),
    matured: Type.Integer({ minimum: 0 }),
    /** 0 = unredeemed. */
    redeemed: Type.Integer({ minimum: 0 }),
    market_id: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type NoteV1 = Static<typeof NoteV1>;

export const PendingV1 = Type.Object(
  {
    payout: Amount,
    matured: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type PendingV1 = Static<typeof PendingV1>;
