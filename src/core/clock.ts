/**
 * Time source shared by every windowed counter.
 * All guard timestamps are whole seconds since the epoch.
 */

export interface Clock {
  /** Current time in whole seconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 1_700_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }

  set(seconds: number): void {
    this.current = seconds;
  }
}
