/**
 * Bond depository — markets, deposits, notes and rewards over one base token.
 *
 * Mutations run one at a time on the processing queue. Each one writes the
 * ledgers fully, then issues its single external transfer; if the transfer
 * returns false or throws, everything it wrote is restored and the caller
 * gets TransferFailed. Events are appended only after the transfer commits.
 *
 * Queries run between mutations and never see a half-finished deposit.
 */

import {
  ACCOUNT_PATTERN,
  BondError,
  ZERO_ACCOUNT,
  createMarketState,
  currentControlVariable,
  currentDebt,
  debtDecay,
  debtRatio,
  decayMarket,
  isMarketLive,
  isNoteRedeemable,
  marketPrice,
  marketStateToWire,
  payoutFor,
  storedPrice,
  tuneMarket,
  type Adjustment,
  type CreateMarketParams,
  type Market,
  type MarketState,
  type MarketSummaryV1,
  type Metadata,
  type Note,
  type Terms,
  type TuneResult,
} from "@curvebond/primitives";
import type { TokenAsset, TokenRegistry } from "@curvebond/token-client";
import type { BaseLogger } from "pino";
import type { AdministratorCheck } from "./admin.js";
import type { Clock } from "./clock.js";
import { EventLog } from "./event-log/event-log.js";
import {
  ADMIN_EVENT,
  BOND_EVENT,
  MARKET_CLOSE_EVENT,
  MARKET_CREATE_EVENT,
  NOTE_PULL_EVENT,
  NOTE_PUSH_EVENT,
  REDEEM_EVENT,
  REWARD_CLAIM_EVENT,
  TUNE_EVENT,
} from "./event-log/schemas.js";
import { MarketLedger } from "./ledger/market-ledger.js";
import { NoteLedger, type IndexedNote } from "./ledger/note-ledger.js";
import { RewardsLedger } from "./ledger/rewards.js";
import { ProcessingQueue } from "./processing-queue.js";

export type DepositoryLogger = Pick<BaseLogger, "info" | "warn" | "debug">;

export interface DepositoryOptions {
  baseToken: TokenAsset;
  /** Quote tokens markets may be created for. */
  quoteTokens: TokenRegistry;
  clock: Clock;
  admin: AdministratorCheck;
  /** Depository identity: spender of quote allowances, holder of the base vault. */
  account: string;
  treasury: string;
  dao: string;
  refReward: bigint;
  daoReward: bigint;
  logger: DepositoryLogger;
  queue?: ProcessingQueue;
  events?: EventLog;
}

export interface DepositParams {
  marketId: number;
  /** Quote units offered. */
  amount: bigint;
  /** Highest acceptable price, in base-decimal quote per base. */
  maxPrice: bigint;
  /** Owner of the new note. */
  recipient: string;
  /** Front end credited with the referral reward; ZERO_ACCOUNT for none. */
  referrer: string;
}

export interface DepositResult {
  payout: bigint;
  matured: number;
  /** Index of the new note in the recipient's list. */
  index: number;
}

export interface PendingNote {
  payout: bigint;
  /** true when redeemable now. */
  matured: boolean;
}

export interface DepositorySettings {
  account: string;
  treasury: string;
  dao: string;
  refReward: bigint;
  daoReward: bigint;
}

function requireAccount(value: string, op: string, field: string): void {
  if (!ACCOUNT_PATTERN.test(value) || value === ZERO_ACCOUNT) {
    throw new BondError("InvalidConfiguration", op, `${field} must be a non-zero account`, {
      [field]: value,
    });
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class BondDepository {
  readonly events: EventLog;
  readonly baseDecimals: number;

  private readonly markets = new MarketLedger();
  private readonly notes = new NoteLedger();
  private readonly rewards: RewardsLedger;
  private readonly queue: ProcessingQueue;
  private readonly baseToken: TokenAsset;
  private readonly quoteTokens: TokenRegistry;
  private readonly clock: Clock;
  private readonly admin: AdministratorCheck;
  private readonly account: string;
  private treasury: string;
  private readonly log: DepositoryLogger;

  private constructor(opts: DepositoryOptions, baseDecimals: number) {
    this.baseToken = opts.baseToken;
    this.quoteTokens = opts.quoteTokens;
    this.clock = opts.clock;
    this.admin = opts.admin;
    this.account = opts.account;
    this.treasury = opts.treasury;
    this.log = opts.logger;
    this.queue = opts.queue ?? new ProcessingQueue();
    this.events = opts.events ?? new EventLog();
    this.rewards = new RewardsLedger({
      refReward: opts.refReward,
      daoReward: opts.daoReward,
      dao: opts.dao,
    });
    this.baseDecimals = baseDecimals;
  }

  /** Reads the base token's decimals once; they never change. */
  static async create(opts: DepositoryOptions): Promise<BondDepository> {
    requireAccount(opts.account, "create", "account");
    requireAccount(opts.treasury, "create", "treasury");
    requireAccount(opts.dao, "create", "dao");
    const decimals = await opts.baseToken.decimals();
    return new BondDepository(opts, decimals);
  }

  // ── Markets ──────────────────────────────────────────────────────

  createMarket(principal: string, params: CreateMarketParams): Promise<number> {
    return this.queue.exclusive(async () => {
      this.requireAdministrator(principal, "createMarket");
      const quote = this.quoteTokens.get(params.quoteToken);
      if (!quote) {
        throw new BondError("InvalidConfiguration", "createMarket", "unknown quote token", {
          quoteToken: params.quoteToken,
        });
      }

      const now = this.clock.now();
      const state = createMarketState(params, {
        now,
        baseSupply: await this.baseToken.totalSupply(),
        baseDecimals: this.baseDecimals,
        quoteDecimals: await quote.decimals(),
      });
      const id = this.markets.add(state);

      this.events.append(MARKET_CREATE_EVENT, now, {
        market_id: id,
        quote_token: params.quoteToken,
        capacity: params.capacity.toString(),
        capacity_in_quote: params.capacityInQuote,
        initial_price: params.initialPrice.toString(),
        control_variable: state.terms.controlVariable.toString(),
        max_payout: state.market.maxPayout.toString(),
        max_debt: state.terms.maxDebt.toString(),
        conclusion: params.conclusion,
      });
      this.log.info(
        { marketId: id, quoteToken: params.quoteToken, capacity: params.capacity.toString() },
        "market created",
      );
      return id;
    });
  }

  /** Conclude a market now. Idempotent. */
  closeMarket(principal: string, id: number): Promise<void> {
    return this.queue.exclusive(() => {
      this.requireAdministrator(principal, "closeMarket");
      const now = this.clock.now();
      const state = this.markets.get(id);
      state.terms.conclusion = Math.min(state.terms.conclusion, now);
      state.market.capacity = 0n;
      this.markets.put(id, state);

      this.events.append(MARKET_CLOSE_EVENT, now, { market_id: id, reason: "admin" });
      this.log.info({ marketId: id }, "market closed");
    });
  }

  // ── Deposit ──────────────────────────────────────────────────────

  deposit(buyer: string, params: DepositParams): Promise<DepositResult> {
    return this.queue.exclusive(async () => {
      const { marketId, amount, maxPrice, recipient, referrer } = params;
      const now = this.clock.now();
      const before = this.markets.get(marketId);

      if (now >= before.terms.conclusion || before.market.capacity === 0n) {
        throw new BondError("MarketConcluded", "deposit", "market is concluded", { marketId });
      }
      requireAccount(recipient, "deposit", "recipient");
      if (amount < 0n || maxPrice < 0n) {
        throw new BondError("InvalidConfiguration", "deposit", "amount and max price must be non-negative");
      }

      const quote = this.requireQuoteToken(before.market.quoteToken);
      const baseSupply = await this.baseToken.totalSupply();
      const { quoteDecimals } = before.metadata;

      const next = decayMarket(before, now);
      const price = storedPrice(next, baseSupply);
      if (price === 0n) {
        throw new BondError("InvalidConfiguration", "deposit", "market price is zero", { marketId });
      }
      if (price > maxPrice) {
        throw new BondError("SlippageExceeded", "deposit", "price above max price", {
          price: price.toString(),
          maxPrice: maxPrice.toString(),
        });
      }

      const payout = payoutFor(amount, price, this.baseDecimals, quoteDecimals);
      if (payout > next.market.maxPayout) {
        throw new BondError("MaxSizeExceeded", "deposit", "payout above max payout", {
          payout: payout.toString(),
          maxPayout: next.market.maxPayout.toString(),
        });
      }

      const used = next.market.capacityInQuote ? amount : payout;
      if (used > next.market.capacity) {
        throw new BondError("InsufficientCapacity", "deposit", "not enough capacity left", {
          requested: used.toString(),
          capacity: next.market.capacity.toString(),
        });
      }

      // ── Ledger writes ──
      const notesBefore = this.notes.snapshot(recipient);
      const rewardsBefore = this.rewards.snapshot();

      const matured = next.terms.fixedTerm ? now + next.terms.vesting : next.terms.vesting;
      next.market.capacity -= used;
      next.market.purchased += amount;
      next.market.sold += payout;
      next.market.totalDebt += payout;

      const index = this.notes.append(recipient, {
        payout,
        created: now,
        matured,
        redeemed: 0,
        marketId,
      });
      const accrual = this.rewards.accrue(payout, referrer);

      let tune: TuneResult | undefined;
      const circuitBroken = next.market.totalDebt > next.terms.maxDebt;
      let committed: MarketState = next;
      if (circuitBroken) {
        next.market.capacity = 0n;
      } else {
        tune = tuneMarket(next, { now, baseSupply, baseDecimals: this.baseDecimals });
        committed = tune.state;
      }
      this.markets.put(marketId, committed);

      // ── External transfer ──
      const rollback = (reason: string): BondError => {
        this.markets.restore(marketId, before);
        this.notes.restore(notesBefore);
        this.rewards.restore(rewardsBefore);
        this.log.warn({ marketId, buyer, amount: amount.toString(), reason }, "quote transfer failed, deposit rolled back");
        return new BondError("TransferFailed", "deposit", `quote transfer failed: ${reason}`, { marketId });
      };
      let transferred: boolean;
      try {
        transferred = await quote.transferFrom(this.account, buyer, this.treasury, amount);
      } catch (err) {
        throw rollback(errorMessage(err));
      }
      if (!transferred) throw rollback("rejected by token");

      // ── Commit ──
      this.events.append(BOND_EVENT, now, {
        market_id: marketId,
        buyer,
        recipient,
        referrer,
        amount: amount.toString(),
        price: price.toString(),
        payout: payout.toString(),
        index,
        matured,
        ref_reward: accrual.toRef.toString(),
        dao_reward: accrual.toDao.toString(),
        circuit_broken: circuitBroken,
      });
      if (circuitBroken) {
        this.events.append(MARKET_CLOSE_EVENT, now, { market_id: marketId, reason: "max_debt" });
        this.log.warn(
          { marketId, totalDebt: committed.market.totalDebt.toString(), maxDebt: committed.terms.maxDebt.toString() },
          "debt above max debt, market concluded",
        );
      }
      if (tune?.tuned) {
        this.events.append(TUNE_EVENT, now, {
          market_id: marketId,
          previous_control_variable: tune.previousControlVariable.toString(),
          target_control_variable: tune.targetControlVariable.toString(),
          max_payout: tune.maxPayout.toString(),
          adjustment_started: tune.adjustmentStarted,
        });
        this.log.debug(
          { marketId, target: tune.targetControlVariable.toString(), adjustment: tune.adjustmentStarted },
          "market tuned",
        );
      }
      this.log.info(
        { marketId, buyer, amount: amount.toString(), payout: payout.toString(), index },
        "bond",
      );

      return { payout, matured, index };
    });
  }

  // ── Redeem ───────────────────────────────────────────────────────

  /** Redeem matured notes among `indexes`; others are skipped. Returns the base paid. */
  redeem(user: string, indexes: Iterable<number>): Promise<bigint> {
    const list = [...indexes];
    return this.queue.exclusive(() => this.redeemNow(user, list));
  }

  redeemAll(user: string): Promise<bigint> {
    return this.queue.exclusive(() => this.redeemNow(user, [...this.notes.indexesFor(user)]));
  }

  private async redeemNow(user: string, indexes: number[]): Promise<bigint> {
    const now = this.clock.now();
    const notesBefore = this.notes.snapshot(user);

    let total = 0n;
    const redeemed: number[] = [];
    for (const index of indexes) {
      const note = this.notes.find(user, index);
      if (!note || !isNoteRedeemable(note, now)) continue;
      this.notes.markRedeemed(user, index, now);
      total += note.payout;
      redeemed.push(index);
    }
    if (total === 0n) return 0n;

    let transferred: boolean;
    try {
      transferred = await this.baseToken.transfer(this.account, user, total);
    } catch (err) {
      this.notes.restore(notesBefore);
      this.log.warn({ user, total: total.toString(), err: errorMessage(err) }, "base transfer failed, redeem rolled back");
      throw new BondError("TransferFailed", "redeem", `base transfer failed: ${errorMessage(err)}`);
    }
    if (!transferred) {
      this.notes.restore(notesBefore);
      this.log.warn({ user, total: total.toString() }, "base transfer rejected, redeem rolled back");
      throw new BondError("TransferFailed", "redeem", "base transfer rejected by token");
    }

    this.events.append(REDEEM_EVENT, now, {
      owner: user,
      indexes: redeemed.join(","),
      payout: total.toString(),
    });
    this.log.info({ user, notes: redeemed.length, payout: total.toString() }, "notes redeemed");
    return total;
  }

  // ── Note transfers ───────────────────────────────────────────────

  pushNote(owner: string, index: number, to: string): Promise<void> {
    return this.queue.exclusive(() => {
      this.notes.push(owner, index, to);
      this.events.append(NOTE_PUSH_EVENT, this.clock.now(), { owner, index, to });
      this.log.info({ owner, index, to }, "note transfer granted");
    });
  }

  pullNote(caller: string, from: string, index: number): Promise<number> {
    return this.queue.exclusive(() => {
      const newIndex = this.notes.pull(caller, from, index);
      this.events.append(NOTE_PULL_EVENT, this.clock.now(), {
        from,
        index,
        to: caller,
        new_index: newIndex,
      });
      this.log.info({ from, index, to: caller, newIndex }, "note transferred");
      return newIndex;
    });
  }

  // ── Rewards + admin ──────────────────────────────────────────────

  /** Pay out an account's accrued front-end rewards. Returns the amount. */
  claimRewards(account: string): Promise<bigint> {
    return this.queue.exclusive(async () => {
      const amount = this.rewards.take(account);
      if (amount === 0n) return 0n;

      let transferred: boolean;
      try {
        transferred = await this.baseToken.transfer(this.account, account, amount);
      } catch (err) {
        this.rewards.credit(account, amount);
        throw new BondError("TransferFailed", "claimRewards", `base transfer failed: ${errorMessage(err)}`);
      }
      if (!transferred) {
        this.rewards.credit(account, amount);
        throw new BondError("TransferFailed", "claimRewards", "base transfer rejected by token");
      }

      this.events.append(REWARD_CLAIM_EVENT, this.clock.now(), {
        account,
        amount: amount.toString(),
      });
      this.log.info({ account, amount: amount.toString() }, "rewards claimed");
      return amount;
    });
  }

  setRewards(principal: string, refReward: bigint, daoReward: bigint): Promise<void> {
    return this.queue.exclusive(() => {
      this.requireAdministrator(principal, "setRewards");
      this.rewards.setRewards(refReward, daoReward);
      this.adminEvent("rewards", `${refReward}/${daoReward}`);
    });
  }

  whitelist(principal: string, referrer: string): Promise<void> {
    return this.queue.exclusive(() => {
      this.requireAdministrator(principal, "whitelist");
      requireAccount(referrer, "whitelist", "referrer");
      this.rewards.whitelist(referrer);
      this.adminEvent("whitelist", referrer);
    });
  }

  setTreasury(principal: string, account: string): Promise<void> {
    return this.queue.exclusive(() => {
      this.requireAdministrator(principal, "setTreasury");
      requireAccount(account, "setTreasury", "treasury");
      this.treasury = account;
      this.adminEvent("treasury", account);
    });
  }

  setDao(principal: string, account: string): Promise<void> {
    return this.queue.exclusive(() => {
      this.requireAdministrator(principal, "setDao");
      requireAccount(account, "setDao", "dao");
      this.rewards.setDao(account);
      this.adminEvent("dao", account);
    });
  }

  // ── Queries ──────────────────────────────────────────────────────

  isLive(id: number): Promise<boolean> {
    return this.queue.shared(() => isMarketLive(this.markets.get(id), this.clock.now()));
  }

  liveMarkets(): Promise<number[]> {
    return this.queue.shared(() => {
      const now = this.clock.now();
      return this.markets.ids().filter((id) => isMarketLive(this.markets.get(id), now));
    });
  }

  liveMarketsFor(quoteToken: string): Promise<number[]> {
    return this.queue.shared(() => {
      const now = this.clock.now();
      return this.markets.marketsFor(quoteToken).filter((id) => isMarketLive(this.markets.get(id), now));
    });
  }

  marketsFor(quoteToken: string): Promise<number[]> {
    return this.queue.shared(() => this.markets.marketsFor(quoteToken));
  }

  marketCount(): Promise<number> {
    return this.queue.shared(() => this.markets.count());
  }

  market(id: number): Promise<Market> {
    return this.queue.shared(() => this.markets.market(id));
  }

  terms(id: number): Promise<Terms> {
    return this.queue.shared(() => this.markets.terms(id));
  }

  metadata(id: number): Promise<Metadata> {
    return this.queue.shared(() => this.markets.metadata(id));
  }

  adjustment(id: number): Promise<Adjustment> {
    return this.queue.shared(() => this.markets.adjustment(id));
  }

  marketPrice(id: number): Promise<bigint> {
    return this.queue.shared(async () =>
      marketPrice(this.markets.get(id), this.clock.now(), await this.baseToken.totalSupply()),
    );
  }

  /** Base units `amount` quote units would buy now. */
  payoutFor(amount: bigint, id: number): Promise<bigint> {
    return this.queue.shared(async () => {
      const state = this.markets.get(id);
      const price = marketPrice(state, this.clock.now(), await this.baseToken.totalSupply());
      return payoutFor(amount, price, this.baseDecimals, state.metadata.quoteDecimals);
    });
  }

  currentDebt(id: number): Promise<bigint> {
    return this.queue.shared(() => {
      const { market, metadata } = this.markets.get(id);
      return currentDebt(market, metadata, this.clock.now());
    });
  }

  debtRatio(id: number): Promise<bigint> {
    return this.queue.shared(async () => {
      const { market, metadata } = this.markets.get(id);
      return debtRatio(
        currentDebt(market, metadata, this.clock.now()),
        await this.baseToken.totalSupply(),
        metadata.quoteDecimals,
      );
    });
  }

  debtDecay(id: number): Promise<bigint> {
    return this.queue.shared(() => {
      const { market, metadata } = this.markets.get(id);
      return debtDecay(market, metadata, this.clock.now());
    });
  }

  currentControlVariable(id: number): Promise<bigint> {
    return this.queue.shared(() => {
      const { terms, adjustment } = this.markets.get(id);
      return currentControlVariable(terms, adjustment, this.clock.now());
    });
  }

  /** Records plus every pricing view, in wire form. */
  marketSummary(id: number): Promise<MarketSummaryV1> {
    return this.queue.shared(async () => {
      const state = this.markets.get(id);
      const now = this.clock.now();
      const supply = await this.baseToken.totalSupply();
      const debt = currentDebt(state.market, state.metadata, now);
      return {
        id,
        ...marketStateToWire(state),
        is_live: isMarketLive(state, now),
        price: marketPrice(state, now, supply).toString(),
        current_debt: debt.toString(),
        debt_ratio: debtRatio(debt, supply, state.metadata.quoteDecimals).toString(),
        debt_decay: debtDecay(state.market, state.metadata, now).toString(),
        control_variable: currentControlVariable(state.terms, state.adjustment, now).toString(),
      };
    });
  }

  indexesFor(user: string): Promise<number[]> {
    return this.queue.shared(() => [...this.notes.indexesFor(user)]);
  }

  notesFor(user: string): Promise<IndexedNote[]> {
    return this.queue.shared(() => this.notes.notesFor(user));
  }

  note(user: string, index: number): Promise<Note> {
    return this.queue.shared(() => this.notes.get(user, index));
  }

  pendingFor(user: string, index: number): Promise<PendingNote> {
    return this.queue.shared(() => {
      const note = this.notes.get(user, index, "pendingFor");
      return { payout: note.payout, matured: isNoteRedeemable(note, this.clock.now()) };
    });
  }

  /** Recipient of a pending note transfer, if any. */
  transferGrant(owner: string, index: number): Promise<string | undefined> {
    return this.queue.shared(() => this.notes.grantFor(owner, index));
  }

  rewardsFor(account: string): Promise<bigint> {
    return this.queue.shared(() => this.rewards.rewardsFor(account));
  }

  isWhitelisted(referrer: string): Promise<boolean> {
    return this.queue.shared(() => this.rewards.isWhitelisted(referrer));
  }

  settings(): Promise<DepositorySettings> {
    return this.queue.shared(() => ({
      account: this.account,
      treasury: this.treasury,
      dao: this.rewards.dao,
      refReward: this.rewards.refReward,
      daoReward: this.rewards.daoReward,
    }));
  }

  // ── Internals ────────────────────────────────────────────────────

  private requireAdministrator(principal: string, op: string): void {
    if (!this.admin.isAdministrator(principal)) {
      throw new BondError("Unauthorized", op, "administrator only", { principal });
    }
  }

  private requireQuoteToken(address: string): TokenAsset {
    const token = this.quoteTokens.get(address);
    if (!token) {
      throw new BondError("InvalidConfiguration", "deposit", "quote token no longer registered", {
        quoteToken: address,
      });
    }
    return token;
  }

  private adminEvent(setting: string, value: string): void {
    this.events.append(ADMIN_EVENT, this.clock.now(), { setting, value });
    this.log.info({ setting, value }, "admin setting changed");
  }
}
