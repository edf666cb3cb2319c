/**
 * Depository response bodies, checked by lib/http.ts before use.
 */

import { Type } from "@sinclair/typebox";
import { NoteV1, PendingV1 } from "@curvebond/primitives";

const Amount = Type.String({ pattern: "^[0-9]+$" });
const Account = Type.String({ pattern: "^[0-9a-f]{64}$" });
const Index = Type.Integer({ minimum: 0 });

export const MarketList = Type.Object({ markets: Type.Array(Index) });

export const QuoteResponse = Type.Object({
  market_id: Index,
  amount: Amount,
  price: Amount,
  payout: Amount,
});

export const CreatedMarket = Type.Object({ market_id: Index });

export const ClosedMarket = Type.Object({ market_id: Index, closed: Type.Boolean() });

export const DepositResponse = Type.Object({
  market_id: Index,
  payout: Amount,
  matured: Index,
  index: Index,
});

export const NotesResponse = Type.Object({
  owner: Account,
  notes: Type.Array(NoteV1),
  pending: Type.Array(Index),
});

export const NoteDetail = Type.Object({
  ...NoteV1.properties,
  pending: PendingV1,
});

export const RedeemResponse = Type.Object({ owner: Account, payout: Amount });

export const PushResponse = Type.Object({ owner: Account, index: Index, to: Account });

export const PullResponse = Type.Object({ owner: Account, index: Index, from: Account });

export const RewardsResponse = Type.Object({ account: Account, rewards: Amount });

export const ClaimResponse = Type.Object({ account: Account, amount: Amount });
