// src/clock.ts

/**
 * Source of "now" in epoch milliseconds. The registry and the heartbeat
 * monitor read time only through this, so tests can drive it by hand.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    if (ms < 0) {
      throw new RangeError(`Cannot move a clock backwards (${ms}ms)`);
    }
    this.current += ms;
  }

  set(epochMs: number): void {
    this.current = epochMs;
  }
}
