/**
 * Error taxonomy for the bond engine.
 *
 * Every rejected operation surfaces synchronously as a BondError. Nothing is
 * retried: the caller resubmits with corrected parameters. The circuit
 * breaker is a market state transition and never appears here.
 */

export type BondErrorCode =
  | "MarketConcluded"
  | "SlippageExceeded"
  | "MaxSizeExceeded"
  | "InsufficientCapacity"
  | "TransferNotApproved"
  | "NoteAlreadyRedeemed"
  | "NoteNotFound"
  | "InvalidConfiguration"
  | "MarketNotFound"
  | "Unauthorized"
  | "TransferFailed"
  | "Overflow"
  | "DivisionByZero";

export class BondError extends Error {
  readonly code: BondErrorCode;
  /** Operation that failed, e.g. "deposit" or "mulDiv". */
  readonly op: string;
  readonly reason: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: BondErrorCode,
    op: string,
    reason: string,
    details?: Record<string, unknown>,
  ) {
    super(`${op}: ${reason}`);
    this.name = "BondError";
    this.code = code;
    this.op = op;
    this.reason = reason;
    if (details && typeof details === "object" && !Array.isArray(details)) {
      this.details = details;
    }
  }
}

export function isBondError(err: unknown, code?: BondErrorCode): err is BondError {
  if (!(err instanceof BondError)) return false;
  return code === undefined || err.code === code;
}
