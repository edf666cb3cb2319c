/**
 * Market records and the creation math.
 *
 * A market is four records sharing one arena slot:
 *   Market     — capacity, debt and sale counters
 *   Terms      — control variable, vesting, conclusion, debt ceiling
 *   Metadata   — decay/tune clocks, intervals, quote decimals
 *   Adjustment — a pending, smoothed control-variable reduction
 *
 * Amounts are bigint token units. Times are integer seconds.
 */

import {
  ACCOUNT_PATTERN,
  DEBT_BUFFER_DENOMINATOR,
  MAX_DEBT_BUFFER,
  ZERO_ACCOUNT,
} from "./constants.js";
import { BondError } from "./errors.js";
import { mulDiv, pow10 } from "./fixed-point.js";

export interface Market {
  /** Remaining sale volume, in quote units if capacityInQuote else base units. */
  capacity: bigint;
  quoteToken: string;
  capacityInQuote: boolean;
  totalDebt: bigint;
  maxPayout: bigint;
  /** Cumulative quote units taken in. */
  purchased: bigint;
  /** Cumulative base units sold. */
  sold: bigint;
}

export interface Terms {
  /** true: vesting is a duration from purchase. false: an absolute timestamp. */
  fixedTerm: boolean;
  controlVariable: bigint;
  vesting: number;
  conclusion: number;
  maxDebt: bigint;
}

export interface Metadata {
  lastTune: number;
  lastDecay: number;
  /** Planned duration from creation to conclusion; the debt decay timescale. */
  length: number;
  depositInterval: number;
  tuneInterval: number;
  quoteDecimals: number;
}

export interface Adjustment {
  change: bigint;
  lastAdjustment: number;
  timeToAdjusted: number;
  active: boolean;
}

export interface MarketState {
  market: Market;
  terms: Terms;
  metadata: Metadata;
  adjustment: Adjustment;
}

export interface CreateMarketParams {
  quoteToken: string;
  capacity: bigint;
  initialPrice: bigint;
  /** Extra debt allowed above target before the circuit breaker, 100_000 = 100%. */
  debtBuffer: bigint;
  capacityInQuote: boolean;
  fixedTerm: boolean;
  vesting: number;
  conclusion: number;
  depositInterval: number;
  tuneInterval: number;
}

/** Chain-side facts a market is priced against. */
export interface MarketContext {
  now: number;
  baseSupply: bigint;
  baseDecimals: number;
  quoteDecimals: number;
}

export const INACTIVE_ADJUSTMENT: Readonly<Adjustment> = {
  change: 0n,
  lastAdjustment: 0,
  timeToAdjusted: 0,
  active: false,
};

/**
 * Convert quote units to base units at `price`.
 * amount * 10^(2*baseDecimals) / price / 10^quoteDecimals
 */
export function quoteToBase(
  amount: bigint,
  price: bigint,
  baseDecimals: number,
  quoteDecimals: number,
): bigint {
  return mulDiv(amount, pow10(2 * baseDecimals), price) / pow10(quoteDecimals);
}

function invalid(reason: string, details?: Record<string, unknown>): never {
  throw new BondError("InvalidConfiguration", "createMarket", reason, details);
}

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

export function validateMarketParams(params: CreateMarketParams, now: number): void {
  if (!ACCOUNT_PATTERN.test(params.quoteToken) || params.quoteToken === ZERO_ACCOUNT) {
    invalid("quote token must be a non-zero 64-char hex address");
  }
  if (params.capacity <= 0n) invalid("capacity must be positive");
  if (params.initialPrice <= 0n) invalid("initial price must be positive");
  if (params.debtBuffer < 0n || params.debtBuffer > MAX_DEBT_BUFFER) {
    invalid(`debt buffer must be 0-${MAX_DEBT_BUFFER}`, { debtBuffer: params.debtBuffer.toString() });
  }
  if (!Number.isInteger(params.conclusion) || params.conclusion <= now) {
    invalid("conclusion must be in the future", { conclusion: params.conclusion, now });
  }
  if (!isPositiveInteger(params.depositInterval)) invalid("deposit interval must be a positive integer");
  if (!isPositiveInteger(params.tuneInterval)) invalid("tune interval must be a positive integer");
  if (!Number.isInteger(params.vesting) || params.vesting < 0) {
    invalid("vesting must be a non-negative integer");
  }
}

/**
 * Build the initial state of a market.
 *
 * targetDebt      = capacity in base units (converted at initialPrice if capacityInQuote)
 * maxPayout       = targetDebt * depositInterval / secondsToConclusion
 * maxDebt         = targetDebt * (1 + debtBuffer / 100_000)
 * controlVariable = initialPrice * baseSupply / targetDebt
 *
 * totalDebt starts at targetDebt, so the first quote equals initialPrice.
 */
export function createMarketState(params: CreateMarketParams, ctx: MarketContext): MarketState {
  validateMarketParams(params, ctx.now);
  if (ctx.baseSupply <= 0n) invalid("base supply must be positive");

  const secondsToConclusion = params.conclusion - ctx.now;

  const targetDebt = params.capacityInQuote
    ? quoteToBase(params.capacity, params.initialPrice, ctx.baseDecimals, ctx.quoteDecimals)
    : params.capacity;
  if (targetDebt === 0n) invalid("capacity converts to zero base units");

  const maxPayout = mulDiv(targetDebt, BigInt(params.depositInterval), BigInt(secondsToConclusion));
  const maxDebt = targetDebt + mulDiv(targetDebt, params.debtBuffer, DEBT_BUFFER_DENOMINATOR);
  const controlVariable = mulDiv(params.initialPrice, ctx.baseSupply, targetDebt);
  if (controlVariable === 0n) invalid("initial price too small for base supply");

  // Same arithmetic as storedPrice() on the fresh state.
  const scale = pow10(ctx.quoteDecimals);
  const openingPrice = mulDiv(controlVariable, mulDiv(targetDebt, scale, ctx.baseSupply), scale);
  if (openingPrice === 0n) {
    invalid("opening price rounds to zero at the quote token's decimals", {
      quoteDecimals: ctx.quoteDecimals,
      baseSupply: ctx.baseSupply.toString(),
    });
  }

  return {
    market: {
      capacity: params.capacity,
      quoteToken: params.quoteToken,
      capacityInQuote: params.capacityInQuote,
      totalDebt: targetDebt,
      maxPayout,
      purchased: 0n,
      sold: 0n,
    },
    terms: {
      fixedTerm: params.fixedTerm,
      controlVariable,
      vesting: params.vesting,
      conclusion: params.conclusion,
      maxDebt,
    },
    metadata: {
      lastTune: ctx.now,
      lastDecay: ctx.now,
      length: secondsToConclusion,
      depositInterval: params.depositInterval,
      tuneInterval: params.tuneInterval,
      quoteDecimals: ctx.quoteDecimals,
    },
    adjustment: { ...INACTIVE_ADJUSTMENT },
  };
}

/** Deep copy of one arena slot. */
export function cloneMarketState(state: MarketState): MarketState {
  return {
    market: { ...state.market },
    terms: { ...state.terms },
    metadata: { ...state.metadata },
    adjustment: { ...state.adjustment },
  };
}

/** Open iff capacity remains and the conclusion has not passed. */
export function isMarketLive(state: MarketState, now: number): boolean {
  return state.market.capacity !== 0n && state.terms.conclusion > now;
}
