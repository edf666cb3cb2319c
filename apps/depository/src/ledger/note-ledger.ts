/**
 * Note ledger — per-owner note arrays plus the pending-transfer table.
 *
 * A note moved out by pullNote() leaves a hole (null) in the sender's array,
 * so an index, once issued, always means the same note or nothing.
 *
 * Transfers are two-phase: pushNote() records a grant keyed (owner, index),
 * pullNote() by the named recipient consumes it exactly once.
 */

import {
  ACCOUNT_PATTERN,
  BondError,
  ZERO_ACCOUNT,
  isNotePending,
  type Note,
} from "@curvebond/primitives";

export interface IndexedNote {
  index: number;
  note: Note;
}

/** Saved copy of one owner's notes and grants, for rollback. */
export interface NoteSnapshot {
  owner: string;
  notes: Array<Note | null>;
  grants: Array<[number, string]>;
}

function grantKey(owner: string, index: number): string {
  return `${owner}:${index}`;
}

export class NoteLedger {
  private readonly notes = new Map<string, Array<Note | null>>();
  /** "owner:index" → approved recipient */
  private readonly grants = new Map<string, string>();

  /** Append a note and return its index. */
  append(owner: string, note: Note): number {
    let list = this.notes.get(owner);
    if (!list) {
      list = [];
      this.notes.set(owner, list);
    }
    list.push({ ...note });
    return list.length - 1;
  }

  /** The note at `index`, or undefined for holes and out-of-range indexes. */
  find(owner: string, index: number): Note | undefined {
    const note = this.notes.get(owner)?.[index];
    return note ? { ...note } : undefined;
  }

  /** The note at `index`; NoteNotFound for holes and out-of-range indexes. */
  get(owner: string, index: number, op = "note"): Note {
    const note = this.find(owner, index);
    if (!note) {
      throw new BondError("NoteNotFound", op, `no note ${index} for owner`, {
        owner,
        index,
      });
    }
    return note;
  }

  /** Every live (non-hole) note, with its index. */
  notesFor(owner: string): IndexedNote[] {
    const out: IndexedNote[] = [];
    const list = this.notes.get(owner) ?? [];
    list.forEach((note, index) => {
      if (note) out.push({ index, note: { ...note } });
    });
    return out;
  }

  /**
   * Indexes of unredeemed, non-zero notes. Reads current state lazily;
   * call again for a fresh pass.
   */
  *indexesFor(owner: string): Generator<number> {
    const list = this.notes.get(owner);
    if (!list) return;
    for (let i = 0; i < list.length; i++) {
      const note = list[i];
      if (note && isNotePending(note)) yield i;
    }
  }

  markRedeemed(owner: string, index: number, now: number): void {
    const note = this.notes.get(owner)?.[index];
    if (!note) {
      throw new BondError("NoteNotFound", "redeem", `no note ${index} for owner`, { owner, index });
    }
    note.redeemed = now;
  }

  /** Approve `to` to pull note `index` from `owner`. Replaces any earlier grant. */
  push(owner: string, index: number, to: string): void {
    const note = this.get(owner, index, "pushNote");
    if (!ACCOUNT_PATTERN.test(to) || to === ZERO_ACCOUNT) {
      throw new BondError("InvalidConfiguration", "pushNote", "recipient must be a non-zero account", {
        to,
      });
    }
    if (note.redeemed !== 0) {
      throw new BondError("NoteAlreadyRedeemed", "pushNote", `note ${index} already redeemed`, {
        owner,
        index,
      });
    }
    this.grants.set(grantKey(owner, index), to);
  }

  /** Move note `index` from `from` to `caller`, consuming the grant. Returns the new index. */
  pull(caller: string, from: string, index: number): number {
    const key = grantKey(from, index);
    if (this.grants.get(key) !== caller) {
      throw new BondError("TransferNotApproved", "pullNote", "no transfer granted to caller", {
        from,
        index,
      });
    }
    const note = this.get(from, index, "pullNote");
    if (note.redeemed !== 0) {
      throw new BondError("NoteAlreadyRedeemed", "pullNote", `note ${index} already redeemed`, {
        from,
        index,
      });
    }

    const newIndex = this.append(caller, note);
    const list = this.notes.get(from);
    if (list) list[index] = null;
    this.grants.delete(key);
    return newIndex;
  }

  /** Recipient of a pending grant, if any. */
  grantFor(owner: string, index: number): string | undefined {
    return this.grants.get(grantKey(owner, index));
  }

  snapshot(owner: string): NoteSnapshot {
    const prefix = `${owner}:`;
    const grants: Array<[number, string]> = [];
    for (const [key, to] of this.grants) {
      if (key.startsWith(prefix)) grants.push([parseInt(key.slice(prefix.length), 10), to]);
    }
    return {
      owner,
      notes: (this.notes.get(owner) ?? []).map((n) => (n ? { ...n } : null)),
      grants,
    };
  }

  restore(snapshot: NoteSnapshot): void {
    const { owner } = snapshot;
    if (snapshot.notes.length === 0) this.notes.delete(owner);
    else this.notes.set(owner, snapshot.notes.map((n) => (n ? { ...n } : null)));

    const prefix = `${owner}:`;
    for (const key of [...this.grants.keys()]) {
      if (key.startsWith(prefix)) this.grants.delete(key);
    }
    for (const [index, to] of snapshot.grants) this.grants.set(grantKey(owner, index), to);
  }
}
