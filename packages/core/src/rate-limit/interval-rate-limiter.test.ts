import { describe, it, expect } from 'vitest';
import { IntervalRateLimiter, type Clock } from './interval-rate-limiter.js';

function createFakeClock(start = 1_000) {
  let now = start;
  const sleeps: Array<number> = [];
  const clock: Clock = {
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
  };

  return {
    clock,
    sleeps,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe('IntervalRateLimiter', () => {
  it('lets the first call through without waiting', async () => {
    const fake = createFakeClock();
    const limiter = new IntervalRateLimiter({
      minIntervalMs: 3000,
      clock: fake.clock,
    });

    expect(limiter.lastCall).toBeUndefined();
    await expect(limiter.gate()).resolves.toBe(0);
    expect(fake.sleeps).toEqual([]);
    expect(limiter.lastCall).toBe(1_000);
  });

  it('waits out the remainder of the interval', async () => {
    const fake = createFakeClock();
    const limiter = new IntervalRateLimiter({
      minIntervalMs: 3000,
      clock: fake.clock,
    });

    await limiter.gate();
    fake.advance(1000);

    await expect(limiter.gate()).resolves.toBe(2000);
    expect(fake.sleeps).toEqual([2000]);
    expect(limiter.lastCall).toBe(4_000);
  });

  it('does not wait once the interval has already elapsed', async () => {
    const fake = createFakeClock();
    const limiter = new IntervalRateLimiter({
      minIntervalMs: 3000,
      clock: fake.clock,
    });

    await limiter.gate();
    fake.advance(5000);

    await expect(limiter.gate()).resolves.toBe(0);
    expect(fake.sleeps).toEqual([]);
    expect(limiter.lastCall).toBe(6_000);
  });

  it('measures each wait from the previous call rather than a schedule', async () => {
    const fake = createFakeClock();
    const limiter = new IntervalRateLimiter({
      minIntervalMs: 3000,
      clock: fake.clock,
    });

    await limiter.gate();
    fake.advance(10_000);
    await limiter.gate();
    fake.advance(500);

    await expect(limiter.gate()).resolves.toBe(2500);
  });

  it('never waits with a zero interval', async () => {
    const fake = createFakeClock();
    const limiter = new IntervalRateLimiter({
      minIntervalMs: 0,
      clock: fake.clock,
    });

    await limiter.gate();
    await limiter.gate();

    expect(fake.sleeps).toEqual([]);
  });

  it('serializes overlapping callers', async () => {
    const fake = createFakeClock();
    const limiter = new IntervalRateLimiter({
      minIntervalMs: 3000,
      clock: fake.clock,
    });

    const waits = await Promise.all([
      limiter.gate(),
      limiter.gate(),
      limiter.gate(),
    ]);

    expect(waits).toEqual([0, 3000, 3000]);
    expect(limiter.lastCall).toBe(7_000);
  });

  it('keeps gating after a sleep fails', async () => {
    let fail = true;
    let now = 0;
    const limiter = new IntervalRateLimiter({
      minIntervalMs: 100,
      clock: {
        now: () => now,
        sleep: async (ms) => {
          if (fail) {
            fail = false;
            throw new Error('sleep interrupted');
          }
          now += ms;
        },
      },
    });

    await limiter.gate();
    await expect(limiter.gate()).rejects.toThrow('sleep interrupted');
    await expect(limiter.gate()).resolves.toBe(100);
  });

  it('sleeps again when a timer returns before the interval is up', async () => {
    let now = 0;
    const sleeps: Array<number> = [];
    const limiter = new IntervalRateLimiter({
      minIntervalMs: 100,
      clock: {
        now: () => now,
        sleep: async (ms) => {
          sleeps.push(ms);
          // The first timer fires half a millisecond early.
          now += sleeps.length === 1 ? ms - 0.5 : ms;
        },
      },
    });

    await limiter.gate();
    now += 40;

    await expect(limiter.gate()).resolves.toBe(60.5);
    expect(sleeps).toEqual([60, 0.5]);
    expect(limiter.lastCall).toBe(100);
  });

  it('spaces calls by the full interval on the system clock', async () => {
    const limiter = new IntervalRateLimiter({ minIntervalMs: 100 });

    await limiter.gate();
    const first = limiter.lastCall ?? 0;
    const busyUntil = performance.now() + 40;
    while (performance.now() < busyUntil) {
      // Block the event loop like a large synchronous decode would.
    }
    await limiter.gate();

    expect((limiter.lastCall ?? 0) - first).toBeGreaterThanOrEqual(100);
  });
});
