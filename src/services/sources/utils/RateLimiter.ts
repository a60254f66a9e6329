/**
 * Rate Limiter Utility
 *
 * Sliding-window call budget for one upstream source. Permits are handed out
 * strictly in request order; a caller that waits longer than
 * `acquireTimeoutMs` is rejected with RateLimitTimeoutError.
 */

import { RateLimitTimeoutError } from '../../../errors/index.js';

export interface RateLimiterConfig {
  sourceName: string;
  /** Calls allowed per window */
  maxRequests: number;
  /** Defaults to one minute */
  windowMs?: number;
  /** 0 disables the timeout */
  acquireTimeoutMs?: number;
}

export interface RateLimiterStats {
  sourceName: string;
  requestsInWindow: number;
  remainingRequests: number;
  maxRequests: number;
  windowMs: number;
  waiting: number;
  timedOut: number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  enqueuedAt: number;
  timer: NodeJS.Timeout | null;
}

export class RateLimiter {
  private requests: number[] = []; // Timestamps of granted permits in the current window
  private waiters: Waiter[] = [];
  private drainTimer: NodeJS.Timeout | null = null;
  private timedOut = 0;
  readonly sourceName: string;
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly acquireTimeoutMs: number;

  constructor(config: RateLimiterConfig) {
    this.sourceName = config.sourceName;
    this.maxRequests = config.maxRequests;
    this.windowMs = config.windowMs ?? 60000;
    this.acquireTimeoutMs = config.acquireTimeoutMs ?? 0;
  }

  /**
   * Wait for a permit. Resolves once the call may proceed.
   */
  acquire(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, enqueuedAt: Date.now(), timer: null };

      if (this.acquireTimeoutMs > 0) {
        waiter.timer = setTimeout(() => this.expire(waiter), this.acquireTimeoutMs);
      }

      this.waiters.push(waiter);
      this.drain();
    });
  }

  /**
   * Execute a function once a permit is granted
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    return fn();
  }

  private expire(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index === -1) {
      return;
    }
    this.waiters.splice(index, 1);
    this.timedOut++;
    waiter.reject(
      new RateLimitTimeoutError(this.sourceName, Date.now() - waiter.enqueuedAt, undefined, {
        service: 'RateLimiter',
        operation: 'acquire',
      })
    );
    if (this.waiters.length === 0) {
      this.clearDrainTimer();
    }
  }

  /**
   * Grant permits to the head of the queue while budget remains, then
   * schedule the next pass for when the oldest permit leaves the window.
   */
  private drain(): void {
    this.cleanOldRequests();

    while (this.waiters.length > 0 && this.requests.length < this.maxRequests) {
      const waiter = this.waiters.shift();
      if (!waiter) {
        break;
      }
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      this.requests.push(Date.now());
      waiter.resolve();
    }

    if (this.waiters.length > 0 && !this.drainTimer) {
      const oldestRequest = this.requests[0] ?? Date.now();
      const timeToWait = Math.max(0, this.windowMs - (Date.now() - oldestRequest)) + 1;
      this.drainTimer = setTimeout(() => {
        this.drainTimer = null;
        this.drain();
      }, timeToWait);
    }
  }

  private clearDrainTimer(): void {
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
  }

  /**
   * Remove requests outside the current window
   */
  private cleanOldRequests(): void {
    const cutoff = Date.now() - this.windowMs;
    this.requests = this.requests.filter((timestamp) => timestamp > cutoff);
  }

  getRequestCount(): number {
    this.cleanOldRequests();
    return this.requests.length;
  }

  getRemainingRequests(): number {
    this.cleanOldRequests();
    return Math.max(0, this.maxRequests - this.requests.length);
  }

  getStats(): RateLimiterStats {
    return {
      sourceName: this.sourceName,
      requestsInWindow: this.getRequestCount(),
      remainingRequests: this.getRemainingRequests(),
      maxRequests: this.maxRequests,
      windowMs: this.windowMs,
      waiting: this.waiters.length,
      timedOut: this.timedOut,
    };
  }

  /**
   * Reset the rate limiter. Pending waiters are rejected.
   */
  reset(): void {
    this.clearDrainTimer();
    const pending = this.waiters;
    this.waiters = [];
    this.requests = [];
    for (const waiter of pending) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      waiter.reject(
        new RateLimitTimeoutError(this.sourceName, Date.now() - waiter.enqueuedAt, 'Rate limiter reset', {
          service: 'RateLimiter',
          operation: 'reset',
        })
      );
    }
  }
}
