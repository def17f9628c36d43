/**
 * Time source for settlement. Values are unix seconds.
 */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/**
 * Hand-driven clock for tests and simulations
 */
export class ManualClock implements Clock {
  private current: bigint;

  constructor(start = 0n) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  set(time: bigint): void {
    if (time < this.current) {
      throw new Error(`ManualClock cannot move backwards: ${time} < ${this.current}`);
    }
    this.current = time;
  }

  advance(seconds: bigint): bigint {
    this.set(this.current + seconds);
    return this.current;
  }
}
