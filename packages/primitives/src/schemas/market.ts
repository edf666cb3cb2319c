/**
 * MarketV1 and friends — wire form of one market's arena slot.
 *
 * Token amounts travel as decimal strings (bigint-safe JSON).
 * Times are integer seconds.
 */

import { Type, type Static } from "@sinclair/typebox";

const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });
const Amount = Type.String({ pattern: "^[0-9]+$" });
const Seconds = Type.Integer({ minimum: 0 });

export const MarketV1 = Type.Object(
  {
    capacity: Amount,
    quote_token: Hex32,
    capacity_in_quote: Type.Boolean(),
    total_debt: Amount,
    max_payout: Amount,
    purchased: Amount,
    sold: Amount,
  },
  { additionalProperties: false },
);

export type MarketV1 = Static<typeof MarketV1>;

export const TermsV1 = Type.Object(
  {
    fixed_term: Type.Boolean(),
    control_variable: Amount,
    vesting: Seconds,
    conclusion: Seconds,
    max_debt: Amount,
  },
  { additionalProperties: false },
);

export type TermsV1 = Static<typeof TermsV1>;

export const MetadataV1 = Type.Object(
  {
    last_tune: Seconds,
    last_decay: Seconds,
    length: Seconds,
    deposit_interval: Seconds,
    tune_interval: Seconds,
    quote_decimals: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type MetadataV1 = Static<typeof MetadataV1>;

export const AdjustmentV1 = Type.Object(
  {
    change: Amount,
    last_adjustment: Seconds,
    time_to_adjusted: Seconds,
    active: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type AdjustmentV1 = Static<typeof AdjustmentV1>;

/** GET /markets/:id — records plus the read-only pricing views. */
export const MarketSummaryV1 = Type.Object(
  {
    id: Type.Integer({ minimum: 0 }),
    market: MarketV1,
    terms: TermsV1,
    metadata: MetadataV1,
    adjustment: AdjustmentV1,
    is_live: Type.Boolean(),
    price: Amount,
    current_debt: Amount,
    debt_ratio: Amount,
    debt_decay: Amount,
    control_variable: Amount,
  },
  { additionalProperties: false },
);

export type MarketSummaryV1 = Static<typeof MarketSummaryV1>;
