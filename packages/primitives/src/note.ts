/**
 * Note — a buyer's vesting claim, appended at purchase time.
 */

export interface Note {
  /** Base units owed. */
  payout: bigint;
  created: number;
  /** Timestamp from which the note may be redeemed. */
  matured: number;
  /** Redemption timestamp; 0 = unredeemed. */
  redeemed: number;
  marketId: number;
}

/** Redeemable now: unredeemed, vested and worth something. */
export function isNoteRedeemable(note: Note, now: number): boolean {
  return note.redeemed === 0 && note.matured <= now && note.payout !== 0n;
}

/** Still owed: unredeemed and worth something, vested or not. */
export function isNotePending(note: Note): boolean {
  return note.redeemed === 0 && note.payout !== 0n;
}
