/**
 * Record ⇄ wire conversion. bigint fields become decimal strings.
 */

import { BondError } from "./errors.js";
import type { MarketState } from "./market.js";
import type { Note } from "./note.js";
import type { AdjustmentV1, MarketV1, MetadataV1, TermsV1 } from "./schemas/market.js";
import type { NoteV1 } from "./schemas/note.js";

export function marketStateToWire(state: MarketState): {
  market: MarketV1;
  terms: TermsV1;
  metadata: MetadataV1;
  adjustment: AdjustmentV1;
} {
  const { market, terms, metadata, adjustment } = state;
  return {
    market: {
      capacity: market.capacity.toString(),
      quote_token: market.quoteToken,
      capacity_in_quote: market.capacityInQuote,
      total_debt: market.totalDebt.toString(),
      max_payout: market.maxPayout.toString(),
      purchased: market.purchased.toString(),
      sold: market.sold.toString(),
    },
    terms: {
      fixed_term: terms.fixedTerm,
      control_variable: terms.controlVariable.toString(),
      vesting: terms.vesting,
      conclusion: terms.conclusion,
      max_debt: terms.maxDebt.toString(),
    },
    metadata: {
      last_tune: metadata.lastTune,
      last_decay: metadata.lastDecay,
      length: metadata.length,
      deposit_interval: metadata.depositInterval,
      tune_interval: metadata.tuneInterval,
      quote_decimals: metadata.quoteDecimals,
    },
    adjustment: {
      change: adjustment.change.toString(),
      last_adjustment: adjustment.lastAdjustment,
      time_to_adjusted: adjustment.timeToAdjusted,
      active: adjustment.active,
    },
  };
}

export function noteToWire(index: number, note: Note): NoteV1 {
  return {
    index,
    payout: note.payout.toString(),
    created: note.created,
    matured: note.matured,
    redeemed: note.redeemed,
    market_id: note.marketId,
  };
}

/** Parse a decimal amount string from the wire. */
export function parseAmount(value: string, field: string): bigint {
  if (!/^[0-9]+$/.test(value)) {
    throw new BondError("InvalidConfiguration", "parseAmount", `${field} must be a non-negative integer string`, {
      [field]: value,
    });
  }
  return BigInt(value);
}
