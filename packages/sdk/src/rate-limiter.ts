/**
 * @pkv2/sdk — Client-side rate limiter
 *
 * Sliding-window log: at most `maxRequests` permits are granted within any
 * rolling `windowMs`. Callers that find the window full wait in a queue and
 * are woken when the oldest grant leaves the window.
 */
import { DEFAULT_RATE_LIMIT_MAX, DEFAULT_RATE_LIMIT_WINDOW_MS } from '@pkv2/core';

export interface RateLimitPermit {
  /** Epoch ms at which the permit was granted */
  readonly grantedAt: number;
}

interface Waiter {
  resolve: (permit: RateLimitPermit) => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

function detach(waiter: Waiter): void {
  if (waiter.signal && waiter.onAbort) {
    waiter.signal.removeEventListener('abort', waiter.onAbort);
  }
}

export class RateLimiter {
  private grants: number[] = [];
  private waiters: Waiter[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private destroyed = false;

  constructor(
    private readonly maxRequests: number = DEFAULT_RATE_LIMIT_MAX,
    private readonly windowMs: number = DEFAULT_RATE_LIMIT_WINDOW_MS,
  ) {
    if (!Number.isInteger(maxRequests) || maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${maxRequests}`);
    }
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new RangeError(`windowMs must be a positive number, got ${windowMs}`);
    }
  }

  /** Callers currently waiting for a permit */
  get pending(): number {
    return this.waiters.length;
  }

  /** Permits that could be granted right now */
  get available(): number {
    this.prune(Date.now());
    return Math.max(0, this.maxRequests - this.grants.length);
  }

  /**
   * Wait for a permit. If `signal` aborts while waiting, the call rejects
   * with the signal's reason and no permit is consumed.
   */
  acquire(signal?: AbortSignal): Promise<RateLimitPermit> {
    if (this.destroyed) return Promise.reject(new Error('RateLimiter has been destroyed'));
    if (signal?.aborted) return Promise.reject(signal.reason);

    const now = Date.now();
    this.prune(now);
    if (this.waiters.length === 0 && this.grants.length < this.maxRequests) {
      return Promise.resolve(this.grant(now));
    }

    return new Promise<RateLimitPermit>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.removeWaiter(waiter);
          reject(signal.reason);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
      this.schedule();
    });
  }

  /** Stop the limiter and reject every waiting caller with `reason`. */
  destroy(reason: unknown = new Error('RateLimiter has been destroyed')): void {
    this.destroyed = true;
    this.clearTimer();
    const waiters = this.waiters;
    this.waiters = [];
    this.grants = [];
    for (const waiter of waiters) {
      detach(waiter);
      waiter.reject(reason);
    }
  }

  private grant(now: number): RateLimitPermit {
    this.grants.push(now);
    return { grantedAt: now };
  }

  /** Drop grants that have left the window */
  private prune(now: number): void {
    for (;;) {
      const oldest = this.grants[0];
      if (oldest === undefined || now - oldest < this.windowMs) return;
      this.grants.shift();
    }
  }

  private drain(): void {
    this.timer = null;
    const now = Date.now();
    this.prune(now);
    while (this.grants.length < this.maxRequests) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      detach(waiter);
      waiter.resolve(this.grant(now));
    }
    this.schedule();
  }

  private schedule(): void {
    if (this.timer !== null || this.waiters.length === 0) return;
    const oldest = this.grants[0];
    const delay = oldest === undefined ? 0 : Math.max(0, oldest + this.windowMs - Date.now());
    this.timer = setTimeout(() => this.drain(), delay);
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) this.waiters.splice(index, 1);
    if (this.waiters.length === 0) this.clearTimer();
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
