import { RateLimitConfig, SourceName, SOURCE_NAMES } from '../../../config/types.js';
import { RateLimiter, RateLimiterStats } from './RateLimiter.js';

/**
 * One independent limiter per source, so a throttled source never stalls
 * another.
 */
export class RateLimiterRegistry {
  private readonly limiters = new Map<SourceName, RateLimiter>();

  constructor(config: RateLimitConfig, windowMs = 60000) {
    for (const sourceName of SOURCE_NAMES) {
      this.limiters.set(
        sourceName,
        new RateLimiter({
          sourceName,
          maxRequests: config.perMinute[sourceName],
          windowMs,
          acquireTimeoutMs: config.acquireTimeoutMs,
        })
      );
    }
  }

  forSource(sourceName: SourceName): RateLimiter {
    const limiter = this.limiters.get(sourceName);
    if (!limiter) {
      // Every SourceName is registered in the constructor
      throw new RangeError(`No rate limiter for source: ${sourceName}`);
    }
    return limiter;
  }

  acquire(sourceName: SourceName): Promise<void> {
    return this.forSource(sourceName).acquire();
  }

  execute<T>(sourceName: SourceName, fn: () => Promise<T>): Promise<T> {
    return this.forSource(sourceName).execute(fn);
  }

  getStats(): RateLimiterStats[] {
    return SOURCE_NAMES.map((sourceName) => this.forSource(sourceName).getStats());
  }

  reset(): void {
    for (const limiter of this.limiters.values()) {
      limiter.reset();
    }
  }
}
