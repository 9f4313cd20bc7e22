/**
 * Ledger clocks
 *
 * "Early" versus "on-time" is decided purely by comparing the clock
 * against a position deadline, so the clock is injected.
 */

export interface Clock {
  /** Current time in unix seconds */
  now(): bigint;
}

export class SystemClock implements Clock {
  now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

/**
 * Clock moved by hand, for tests and simulations
 */
export class ManualClock implements Clock {
  private current: bigint;

  constructor(start: bigint = 0n) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  set(timestamp: bigint): void {
    this.current = timestamp;
  }

  advance(seconds: bigint): bigint {
    this.current += seconds;
    return this.current;
  }
}
