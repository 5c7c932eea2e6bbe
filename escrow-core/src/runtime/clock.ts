/**
 * Trusted time source. Every transition reads it exactly once and compares
 * all of its locks against that single value.
 */
export interface TrustedClock {
  now(): number;
}

export class SystemClock implements TrustedClock {
  now(): number {
    return Date.now();
  }
}

/** Hand-driven, monotonic clock for tests and simulations. */
export class ManualClock implements TrustedClock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    if (timestamp < this.current) {
      throw new Error(`Clock cannot move backwards: ${timestamp} < ${this.current}`);
    }
    this.current = timestamp;
  }

  advance(ms: number): void {
    this.set(this.current + ms);
  }
}
