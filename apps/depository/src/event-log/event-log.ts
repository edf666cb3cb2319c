/**
 * Event log — in-memory, append-only, hash-chained.
 *
 * Only committed operations are appended: a deposit whose transfer rolls
 * back leaves no trace here.
 */

import { digestObject } from "@curvebond/primitives";
import { GENESIS_PREV, type EventEntry, type EventType } from "./schemas.js";

export type EventPayload = Record<string, string | number | boolean | null>;

function entryId(entry: Omit<EventEntry, "id">): string {
  return digestObject({
    seq: entry.seq,
    type: entry.type,
    timestamp: entry.timestamp,
    payload: entry.payload,
    prev: entry.prev,
  });
}

export class EventLog {
  private readonly entries: EventEntry[] = [];

  append(type: EventType, timestamp: number, payload: EventPayload): EventEntry {
    const unsigned = {
      seq: this.entries.length,
      type,
      timestamp,
      payload: { ...payload },
      prev: this.head(),
    };
    const entry: EventEntry = { ...unsigned, id: entryId(unsigned) };
    this.entries.push(entry);
    return { ...entry, payload: { ...entry.payload } };
  }

  /** Entries with seq >= since, oldest first. */
  since(since = 0): EventEntry[] {
    return this.entries
      .slice(Math.max(0, since))
      .map((e) => ({ ...e, payload: { ...e.payload } }));
  }

  ofType(type: EventType): EventEntry[] {
    return this.since(0).filter((e) => e.type === type);
  }

  count(): number {
    return this.entries.length;
  }

  /** id of the newest entry; GENESIS_PREV when empty. */
  head(): string {
    return this.entries[this.entries.length - 1]?.id ?? GENESIS_PREV;
  }

  /** Recompute every id and link. Returns the first bad seq, or -1 if intact. */
  static verifyChain(entries: readonly EventEntry[]): number {
    let prev = GENESIS_PREV;
    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];
      if (!entry || entry.seq !== i || entry.prev !== prev || entryId(entry) !== entry.id) {
        return i;
      }
      prev = entry.id;
    }
    return -1;
  }

  verifyChain(): number {
    return EventLog.verifyChain(this.entries);
  }
}
