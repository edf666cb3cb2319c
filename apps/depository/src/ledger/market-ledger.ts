/**
 * Market ledger — arena of market slots indexed by a dense id.
 *
 * Ids start at zero and are never reused; a closed market keeps its slot.
 * Every accessor hands out a copy, so only put() changes stored state.
 */

import {
  BondError,
  cloneMarketState,
  type Adjustment,
  type Market,
  type MarketState,
  type Metadata,
  type Terms,
} from "@curvebond/primitives";

export class MarketLedger {
  private readonly slots: MarketState[] = [];
  /** quote token → market ids, in creation order */
  private readonly byQuoteToken = new Map<string, number[]>();

  add(state: MarketState): number {
    const id = this.slots.length;
    this.slots.push(cloneMarketState(state));
    const ids = this.byQuoteToken.get(state.market.quoteToken);
    if (ids) ids.push(id);
    else this.byQuoteToken.set(state.market.quoteToken, [id]);
    return id;
  }

  count(): number {
    return this.slots.length;
  }

  has(id: number): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.slots.length;
  }

  get(id: number): MarketState {
    return cloneMarketState(this.slot(id));
  }

  market(id: number): Market {
    return { ...this.slot(id).market };
  }

  terms(id: number): Terms {
    return { ...this.slot(id).terms };
  }

  metadata(id: number): Metadata {
    return { ...this.slot(id).metadata };
  }

  adjustment(id: number): Adjustment {
    return { ...this.slot(id).adjustment };
  }

  ids(): number[] {
    return this.slots.map((_, id) => id);
  }

  marketsFor(quoteToken: string): number[] {
    return [...(this.byQuoteToken.get(quoteToken) ?? [])];
  }

  /** Commit a new state for an existing slot. */
  put(id: number, state: MarketState): void {
    this.slot(id);
    this.slots[id] = cloneMarketState(state);
  }

  /** Restore a slot from a get() taken before a failed operation. */
  restore(id: number, snapshot: MarketState): void {
    this.put(id, snapshot);
  }

  private slot(id: number): MarketState {
    const state = this.has(id) ? this.slots[id] : undefined;
    if (!state) {
      throw new BondError("MarketNotFound", "market", `no market with id ${id}`, { id });
    }
    return state;
  }
}
