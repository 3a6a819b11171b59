export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Enforces a minimum wall-clock gap between the starts of consecutive network
 * calls. The interval is a floor: `wait()` blocks until it has elapsed.
 */
export class Pacer {
  private readonly clock: Clock;
  readonly minIntervalMs: number;
  private lastCallAt: number | undefined;

  constructor(clock: Clock, minIntervalMs: number) {
    this.clock = clock;
    this.minIntervalMs = minIntervalMs;
  }

  async wait(): Promise<void> {
    if (this.lastCallAt !== undefined) {
      const remaining = this.lastCallAt + this.minIntervalMs - this.clock.now();
      if (remaining > 0) {
        await this.clock.sleep(remaining);
      }
    }
    this.lastCallAt = this.clock.now();
  }

  sleep(ms: number): Promise<void> {
    return this.clock.sleep(ms);
  }
}

export function backoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** Math.max(attempt - 1, 0), maxDelayMs);
}
