export interface Clock {
  /** Monotonic milliseconds */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface IntervalRateLimiterOptions {
  /** Minimum spacing between two gated calls, in milliseconds */
  minIntervalMs: number;
  clock?: Clock;
}

/**
 * Enforces a minimum spacing between consecutive calls.
 *
 * Each wait is computed from the time the previous call actually passed the
 * gate, not from a fixed schedule. Calls to `gate()` are chained so that
 * overlapping callers pass one at a time.
 */
export class IntervalRateLimiter {
  readonly minIntervalMs: number;
  private readonly clock: Clock;
  private lastCallAt: number | undefined;
  private tail: Promise<unknown> = Promise.resolve();

  constructor({
    minIntervalMs,
    clock = systemClock,
  }: IntervalRateLimiterOptions) {
    this.minIntervalMs = minIntervalMs;
    this.clock = clock;
  }

  /**
   * Time of the last call that passed the gate, or undefined if none has.
   */
  get lastCall(): number | undefined {
    return this.lastCallAt;
  }

  /**
   * Wait until the interval since the previous call has elapsed, then mark
   * now as the last call time.
   *
   * @returns The number of milliseconds spent waiting
   */
  gate(): Promise<number> {
    const turn = this.tail.then(() => this.pass());
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private async pass(): Promise<number> {
    let waitedMs = 0;
    const previous = this.lastCallAt;

    if (previous !== undefined && this.minIntervalMs > 0) {
      // Timers can fire early against the monotonic clock.
      let remainingMs = this.minIntervalMs - (this.clock.now() - previous);
      while (remainingMs > 0) {
        await this.clock.sleep(remainingMs);
        waitedMs += remainingMs;
        remainingMs = this.minIntervalMs - (this.clock.now() - previous);
      }
    }

    this.lastCallAt = this.clock.now();
    return waitedMs;
  }
}
