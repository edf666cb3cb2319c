/**
 * In-memory token ledger.
 *
 * Balances and allowances in Maps. Use failTransfers to simulate a token
 * that rejects or throws, for rollback tests. Share one instance between
 * the depository and the test so both see the same balances.
 */

import type { MemoryTokenOptions, TokenAsset, TransferFailureMode } from "./types.js";

export class MemoryToken implements TokenAsset {
  readonly address: string;
  private readonly tokenDecimals: number;
  private supply = 0n;
  private readonly balances = new Map<string, bigint>();
  /** owner → spender → remaining allowance */
  private readonly allowances = new Map<string, Map<string, bigint>>();

  /** Test switch: make every transfer reject or throw. */
  failTransfers: TransferFailureMode = false;

  constructor(opts: MemoryTokenOptions) {
    this.address = opts.address;
    this.tokenDecimals = opts.decimals;
    if (opts.initialSupply !== undefined && opts.holder !== undefined) {
      this.mint(opts.holder, opts.initialSupply);
    }
  }

  async decimals(): Promise<number> {
    return this.tokenDecimals;
  }

  async totalSupply(): Promise<bigint> {
    return this.supply;
  }

  async balanceOf(account: string): Promise<bigint> {
    return this.balances.get(account) ?? 0n;
  }

  async transfer(from: string, to: string, amount: bigint): Promise<boolean> {
    if (!this.transferAllowed(amount)) return false;
    return this.move(from, to, amount);
  }

  async transferFrom(
    spender: string,
    owner: string,
    to: string,
    amount: bigint,
  ): Promise<boolean> {
    if (!this.transferAllowed(amount)) return false;
    const allowed = this.allowance(owner, spender);
    if (allowed < amount) return false;
    if (!this.move(owner, to, amount)) return false;
    this.setAllowance(owner, spender, allowed - amount);
    return true;
  }

  // ── Test helpers ──────────────────────────────────────────────────

  /** Create `amount` new tokens in `to`. */
  mint(to: string, amount: bigint): void {
    if (amount < 0n) throw new Error(`MemoryToken: cannot mint negative amount ${amount}`);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);
    this.supply += amount;
  }

  approve(owner: string, spender: string, amount: bigint): void {
    if (amount < 0n) throw new Error(`MemoryToken: cannot approve negative amount ${amount}`);
    this.setAllowance(owner, spender, amount);
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  // ── Internals ─────────────────────────────────────────────────────

  private transferAllowed(amount: bigint): boolean {
    if (this.failTransfers === "throw") {
      throw new Error(`MemoryToken ${this.address.slice(0, 8)}: transfer failed`);
    }
    return this.failTransfers === false && amount >= 0n;
  }

  private move(from: string, to: string, amount: bigint): boolean {
    const fromBalance = this.balances.get(from) ?? 0n;
    if (fromBalance < amount) return false;
    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);
    return true;
  }

  private setAllowance(owner: string, spender: string, amount: bigint): void {
    let bySpender = this.allowances.get(owner);
    if (!bySpender) {
      bySpender = new Map();
      this.allowances.set(owner, bySpender);
    }
    bySpender.set(spender, amount);
  }
}
