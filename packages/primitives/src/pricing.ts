/**
 * Pricing engine — price, debt and control-variable decay.
 *
 * debtDecay              = totalDebt * secondsSinceLastDecay / length
 * currentDebt            = totalDebt - debtDecay
 * debtRatio              = debt * 10^quoteDecimals / baseSupply
 * price                  = controlVariable * debtRatio / 10^quoteDecimals
 * currentControlVariable = controlVariable - controlDecay
 *
 * Everything here is read-only except decayMarket(), which returns the
 * decayed state for the deposit path to persist.
 */

import { BondError } from "./errors.js";
import { checkedSub, mulDiv, minBigInt, pow10 } from "./fixed-point.js";
import {
  quoteToBase,
  type Adjustment,
  type Market,
  type MarketState,
  type Metadata,
  type Terms,
} from "./market.js";

/** Linear debt decay since lastDecay, capped at totalDebt. */
export function debtDecay(market: Market, metadata: Metadata, now: number): bigint {
  const secondsSince = Math.max(0, now - metadata.lastDecay);
  const decay = mulDiv(market.totalDebt, BigInt(secondsSince), BigInt(metadata.length));
  return minBigInt(decay, market.totalDebt);
}

export function currentDebt(market: Market, metadata: Metadata, now: number): bigint {
  return market.totalDebt - debtDecay(market, metadata, now);
}

export interface ControlDecay {
  /** Amount to subtract from the control variable. */
  decay: bigint;
  secondsSince: number;
  /** false once the full change has been applied. */
  active: boolean;
}

/**
 * Portion of a pending adjustment due by `now`.
 * Linear over timeToAdjusted; the whole remaining change once it elapses.
 */
export function controlDecay(adjustment: Adjustment, now: number): ControlDecay {
  if (!adjustment.active) return { decay: 0n, secondsSince: 0, active: false };

  const secondsSince = Math.max(0, now - adjustment.lastAdjustment);
  const active = secondsSince < adjustment.timeToAdjusted;
  const decay = active
    ? mulDiv(adjustment.change, BigInt(secondsSince), BigInt(adjustment.timeToAdjusted))
    : adjustment.change;
  return { decay, secondsSince, active };
}

/** Fails with Overflow if a pending adjustment exceeds the control variable. */
export function currentControlVariable(terms: Terms, adjustment: Adjustment, now: number): bigint {
  return checkedSub(terms.controlVariable, controlDecay(adjustment, now).decay, "currentControlVariable");
}

export function debtRatio(debt: bigint, baseSupply: bigint, quoteDecimals: number): bigint {
  return mulDiv(debt, pow10(quoteDecimals), baseSupply);
}

export function priceFor(controlVariable: bigint, ratio: bigint, quoteDecimals: number): bigint {
  return mulDiv(controlVariable, ratio, pow10(quoteDecimals));
}

/** Quote price at `now` without touching stored state. */
export function marketPrice(state: MarketState, now: number, baseSupply: bigint): bigint {
  const { quoteDecimals } = state.metadata;
  const ratio = debtRatio(currentDebt(state.market, state.metadata, now), baseSupply, quoteDecimals);
  return priceFor(currentControlVariable(state.terms, state.adjustment, now), ratio, quoteDecimals);
}

/** Price from the stored control variable and stored debt (post-decay on the deposit path). */
export function storedPrice(state: MarketState, baseSupply: bigint): bigint {
  const { quoteDecimals } = state.metadata;
  const ratio = debtRatio(state.market.totalDebt, baseSupply, quoteDecimals);
  return priceFor(state.terms.controlVariable, ratio, quoteDecimals);
}

/** Base units paid for `amount` quote units at `price`. */
export function payoutFor(
  amount: bigint,
  price: bigint,
  baseDecimals: number,
  quoteDecimals: number,
): bigint {
  if (price === 0n) {
    throw new BondError("InvalidConfiguration", "payoutFor", "market price is zero");
  }
  return quoteToBase(amount, price, baseDecimals, quoteDecimals);
}

/**
 * Decay-and-commit: debt and control variable brought up to `now`.
 * Returns a new state; the input is not modified.
 */
export function decayMarket(state: MarketState, now: number): MarketState {
  const decay = debtDecay(state.market, state.metadata, now);
  const next: MarketState = {
    market: { ...state.market, totalDebt: state.market.totalDebt - decay },
    terms: { ...state.terms },
    metadata: { ...state.metadata, lastDecay: now },
    adjustment: { ...state.adjustment },
  };

  if (state.adjustment.active) {
    const { decay: adjustBy, secondsSince, active } = controlDecay(state.adjustment, now);
    next.terms.controlVariable = checkedSub(next.terms.controlVariable, adjustBy, "decayMarket");
    if (active) {
      next.adjustment = {
        change: state.adjustment.change - adjustBy,
        lastAdjustment: now,
        timeToAdjusted: state.adjustment.timeToAdjusted - secondsSince,
        active: true,
      };
    } else {
      next.adjustment.active = false;
    }
  }

  return next;
}
