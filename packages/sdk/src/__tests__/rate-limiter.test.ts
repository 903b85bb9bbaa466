import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RateLimiter } from '../rate-limiter.js';

const START = Date.UTC(2024, 0, 1);

function track<T>(promise: Promise<T>) {
  const state = { settled: false };
  promise.then(
    () => { state.settled = true; },
    () => { state.settled = true; },
  );
  return state;
}

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('grants up to maxRequests immediately', async () => {
    const limiter = new RateLimiter(2, 1000);
    await expect(limiter.acquire()).resolves.toEqual({ grantedAt: START });
    await expect(limiter.acquire()).resolves.toEqual({ grantedAt: START });
    expect(limiter.available).toBe(0);
    limiter.destroy();
  });

  it('holds the third caller until the first grant leaves the window', async () => {
    const limiter = new RateLimiter(2, 1000);
    await limiter.acquire();
    await limiter.acquire();

    const third = limiter.acquire();
    const state = track(third);
    expect(limiter.pending).toBe(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(state.settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await expect(third).resolves.toEqual({ grantedAt: START + 1000 });
    expect(limiter.pending).toBe(0);
    limiter.destroy();
  });

  it('serves waiters in arrival order', async () => {
    const limiter = new RateLimiter(1, 100);
    const order: number[] = [];
    const all = [1, 2, 3].map((n) => limiter.acquire().then(() => order.push(n)));
    await vi.advanceTimersByTimeAsync(200);
    await Promise.all(all);
    expect(order).toEqual([1, 2, 3]);
    limiter.destroy();
  });

  it('never grants more than maxRequests within any window', async () => {
    const limiter = new RateLimiter(2, 1000);
    const grants: number[] = [];
    const all = Array.from({ length: 6 }, () =>
      limiter.acquire().then((permit) => grants.push(permit.grantedAt)),
    );
    await vi.advanceTimersByTimeAsync(3000);
    await Promise.all(all);
    expect(grants).toEqual([START, START, START + 1000, START + 1000, START + 2000, START + 2000]);
    limiter.destroy();
  });

  it('rejects an aborted waiter without consuming a permit', async () => {
    const limiter = new RateLimiter(1, 1000);
    await limiter.acquire();

    const controller = new AbortController();
    const waiting = limiter.acquire(controller.signal);
    controller.abort(new Error('stop'));
    await expect(waiting).rejects.toThrow('stop');
    expect(limiter.pending).toBe(0);

    await vi.advanceTimersByTimeAsync(1000);
    expect(limiter.available).toBe(1);
    limiter.destroy();
  });

  it('rejects immediately for an already aborted signal', async () => {
    const limiter = new RateLimiter(1, 1000);
    const controller = new AbortController();
    controller.abort(new Error('already'));
    await expect(limiter.acquire(controller.signal)).rejects.toThrow('already');
    expect(limiter.available).toBe(1);
  });

  it('destroy rejects waiters with the given reason and refuses new callers', async () => {
    const limiter = new RateLimiter(1, 1000);
    await limiter.acquire();
    const waiting = limiter.acquire();
    limiter.destroy(new Error('closing'));
    await expect(waiting).rejects.toThrow('closing');
    await expect(limiter.acquire()).rejects.toThrow('RateLimiter has been destroyed');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('validates its configuration', () => {
    expect(() => new RateLimiter(0, 1000)).toThrow(RangeError);
    expect(() => new RateLimiter(1.5, 1000)).toThrow(RangeError);
    expect(() => new RateLimiter(2, 0)).toThrow(RangeError);
  });
});
