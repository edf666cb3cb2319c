/**
 * Front-end rewards — a cut of every bond's payout, owed in base tokens.
 *
 * toDao = payout * daoReward / 10_000
 * toRef = payout * refReward / 10_000
 * A whitelisted referrer earns toRef and the DAO toDao; otherwise the DAO
 * earns both. Rewards are owed on top of the payout, paid from the vault
 * on claim.
 */

import { BondError, REWARD_DENOMINATOR, mulDiv } from "@curvebond/primitives";

export interface RewardAccrual {
  toRef: bigint;
  toDao: bigint;
  /** Account credited with toRef; the DAO when the referrer is not whitelisted. */
  refRecipient: string;
}

export interface RewardsSnapshot {
  balances: Array<[string, bigint]>;
}

export class RewardsLedger {
  private readonly balances = new Map<string, bigint>();
  private readonly whitelisted = new Set<string>();
  private ref: bigint;
  private daoCut: bigint;
  private daoAccount: string;

  constructor(opts: { refReward: bigint; daoReward: bigint; dao: string }) {
    RewardsLedger.validate(opts.refReward, opts.daoReward);
    this.ref = opts.refReward;
    this.daoCut = opts.daoReward;
    this.daoAccount = opts.dao;
  }

  static validate(refReward: bigint, daoReward: bigint): void {
    const inRange = (bps: bigint) => bps >= 0n && bps <= REWARD_DENOMINATOR;
    if (!inRange(refReward) || !inRange(daoReward) || refReward + daoReward > REWARD_DENOMINATOR) {
      throw new BondError("InvalidConfiguration", "setRewards", "reward rates must sum to at most 10000 bps", {
        refReward: refReward.toString(),
        daoReward: daoReward.toString(),
      });
    }
  }

  get refReward(): bigint {
    return this.ref;
  }

  get daoReward(): bigint {
    return this.daoCut;
  }

  get dao(): string {
    return this.daoAccount;
  }

  setRewards(refReward: bigint, daoReward: bigint): void {
    RewardsLedger.validate(refReward, daoReward);
    this.ref = refReward;
    this.daoCut = daoReward;
  }

  setDao(account: string): void {
    this.daoAccount = account;
  }

  whitelist(referrer: string): void {
    this.whitelisted.add(referrer);
  }

  isWhitelisted(referrer: string): boolean {
    return this.whitelisted.has(referrer);
  }

  /** Credit the rewards for one bond. */
  accrue(payout: bigint, referrer: string): RewardAccrual {
    const toDao = mulDiv(payout, this.daoCut, REWARD_DENOMINATOR);
    const toRef = mulDiv(payout, this.ref, REWARD_DENOMINATOR);
    const refRecipient = this.whitelisted.has(referrer) ? referrer : this.daoAccount;
    this.credit(this.daoAccount, toDao);
    this.credit(refRecipient, toRef);
    return { toRef, toDao, refRecipient };
  }

  rewardsFor(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /** Zero an account's balance and return what it held. */
  take(account: string): bigint {
    const amount = this.rewardsFor(account);
    this.balances.delete(account);
    return amount;
  }

  credit(account: string, amount: bigint): void {
    if (amount === 0n) return;
    this.balances.set(account, this.rewardsFor(account) + amount);
  }

  snapshot(): RewardsSnapshot {
    return { balances: [...this.balances] };
  }

  restore(snapshot: RewardsSnapshot): void {
    this.balances.clear();
    for (const [account, amount] of snapshot.balances) this.balances.set(account, amount);
  }
}
