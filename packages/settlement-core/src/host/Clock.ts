/**
 * Source of the ledger timestamp, in whole seconds
 */
export interface Clock {
  now(): bigint;
}

export class SystemClock implements Clock {
  now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

/**
 * Clock that only moves when told to. Used by tests and local demos.
 */
export class ManualClock implements Clock {
  constructor(private current: bigint = 0n) {}

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
