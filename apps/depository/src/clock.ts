/**
 * Clock capability — integer seconds since epoch.
 */

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** Test clock: time moves only when told to. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }
}
