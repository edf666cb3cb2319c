/**
 * Token capability interface — abstraction over the asset ledger for testability.
 *
 * The depository never holds balances itself: quote tokens move from buyer to
 * treasury through transferFrom(), base tokens leave the vault through
 * transfer(). Wire behind this interface so the backing ledger can swap.
 */

export interface TokenAsset {
  /** 64-char hex address identifying the token. */
  readonly address: string;
  decimals(): Promise<number>;
  totalSupply(): Promise<bigint>;
  balanceOf(account: string): Promise<bigint>;
  /** Move `amount` from `from` to `to`. false = rejected, nothing moved. */
  transfer(from: string, to: string, amount: bigint): Promise<boolean>;
  /**
   * Move `amount` from `owner` to `to` on `spender`'s allowance.
   * false = rejected, nothing moved.
   */
  transferFrom(spender: string, owner: string, to: string, amount: bigint): Promise<boolean>;
}

export interface MemoryTokenOptions {
  address: string;
  decimals: number;
  /** Minted to `holder` at construction. */
  initialSupply?: bigint;
  holder?: string;
}

/** false: transfers work. "reject": they return false. "throw": they throw. */
export type TransferFailureMode = false | "reject" | "throw";
