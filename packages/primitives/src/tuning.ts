/**
 * Tuning controller — steers the control variable toward selling the
 * remaining capacity by conclusion.
 *
 * Runs at most once per tuneInterval:
 *   capacity    = remaining capacity in base units (converted at the current price)
 *   maxPayout   = capacity * depositInterval / timeRemaining
 *   targetDebt  = capacity * length / timeRemaining
 *   newCV       = price * baseSupply / targetDebt
 *
 * Increases apply at once. Decreases are stored as an Adjustment and
 * smoothed over the next tuneInterval, so the price never drops in a step.
 */

import { mulDiv } from "./fixed-point.js";
import { quoteToBase, type MarketState } from "./market.js";
import { storedPrice } from "./pricing.js";

export interface TuneContext {
  now: number;
  baseSupply: bigint;
  baseDecimals: number;
}

export interface TuneResult {
  state: MarketState;
  tuned: boolean;
  previousControlVariable: bigint;
  /** The control variable the market is steering toward. */
  targetControlVariable: bigint;
  maxPayout: bigint;
  adjustmentStarted: boolean;
}

export function isTuneDue(state: MarketState, now: number): boolean {
  return (
    now >= state.metadata.lastTune + state.metadata.tuneInterval &&
    now < state.terms.conclusion
  );
}

export function tuneMarket(state: MarketState, ctx: TuneContext): TuneResult {
  const previous = state.terms.controlVariable;
  if (!isTuneDue(state, ctx.now)) {
    return {
      state,
      tuned: false,
      previousControlVariable: previous,
      targetControlVariable: previous,
      maxPayout: state.market.maxPayout,
      adjustmentStarted: false,
    };
  }

  const { market, metadata } = state;
  const timeRemaining = BigInt(state.terms.conclusion - ctx.now);
  const price = storedPrice(state, ctx.baseSupply);
  if (price === 0n) {
    // Debt too small to price against supply: hold everything but the clock.
    return {
      state: { ...state, metadata: { ...metadata, lastTune: ctx.now } },
      tuned: true,
      previousControlVariable: previous,
      targetControlVariable: previous,
      maxPayout: market.maxPayout,
      adjustmentStarted: false,
    };
  }

  // Quote capacity converts at the current price here, at the initial price
  // on creation.
  const capacity = market.capacityInQuote
    ? quoteToBase(market.capacity, price, ctx.baseDecimals, metadata.quoteDecimals)
    : market.capacity;

  const maxPayout = mulDiv(capacity, BigInt(metadata.depositInterval), timeRemaining);
  const next: MarketState = {
    market: { ...market, maxPayout },
    terms: { ...state.terms },
    metadata: { ...metadata, lastTune: ctx.now },
    adjustment: { ...state.adjustment },
  };

  const targetDebt = mulDiv(capacity, BigInt(metadata.length), timeRemaining);
  if (targetDebt === 0n) {
    // Nothing left to sell: no target to steer toward.
    return {
      state: next,
      tuned: true,
      previousControlVariable: previous,
      targetControlVariable: previous,
      maxPayout,
      adjustmentStarted: false,
    };
  }

  const target = mulDiv(price, ctx.baseSupply, targetDebt);
  let adjustmentStarted = false;

  if (target >= previous) {
    next.terms.controlVariable = target;
    next.adjustment.active = false;
  } else {
    next.adjustment = {
      change: previous - target,
      lastAdjustment: ctx.now,
      timeToAdjusted: metadata.tuneInterval,
      active: true,
    };
    adjustmentStarted = true;
  }

  return {
    state: next,
    tuned: true,
    previousControlVariable: previous,
    targetControlVariable: target,
    maxPayout,
    adjustmentStarted,
  };
}
