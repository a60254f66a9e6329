/**
 * RateLimiter Tests
 */

import { RateLimiter } from '../../src/services/sources/utils/RateLimiter.js';
import { RateLimiterRegistry } from '../../src/services/sources/utils/RateLimiterRegistry.js';
import { RateLimitTimeoutError } from '../../src/errors/index.js';

describe('RateLimiter', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should grant permits immediately within the budget', async () => {
    const limiter = new RateLimiter({ sourceName: 'plex', maxRequests: 3, windowMs: 1000 });

    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.getRequestCount()).toBe(2);
    expect(limiter.getRemainingRequests()).toBe(1);
  });

  it('should hold callers over budget until the window moves', async () => {
    const limiter = new RateLimiter({ sourceName: 'plex', maxRequests: 2, windowMs: 1000 });
    let granted = 0;

    for (let i = 0; i < 3; i++) {
      void limiter.acquire().then(() => {
        granted++;
      });
    }
    await jest.advanceTimersByTimeAsync(0);
    expect(granted).toBe(2);
    expect(limiter.getStats().waiting).toBe(1);

    await jest.advanceTimersByTimeAsync(1001);
    expect(granted).toBe(3);
    expect(limiter.getStats().waiting).toBe(0);
  });

  it('should serve waiters in arrival order', async () => {
    const limiter = new RateLimiter({ sourceName: 'sonarr', maxRequests: 1, windowMs: 100 });
    const order: number[] = [];

    const all = [1, 2, 3, 4].map((n) => limiter.execute(async () => order.push(n)));
    await jest.advanceTimersByTimeAsync(500);
    await Promise.all(all);

    expect(order).toEqual([1, 2, 3, 4]);
  });

  it('should reject a waiter that exceeds the acquire timeout', async () => {
    const limiter = new RateLimiter({ sourceName: 'tautulli', maxRequests: 1, windowMs: 60000, acquireTimeoutMs: 500 });
    await limiter.acquire();

    const waiting = limiter.acquire();
    const assertion = expect(waiting).rejects.toBeInstanceOf(RateLimitTimeoutError);
    await jest.advanceTimersByTimeAsync(500);
    await assertion;

    expect(limiter.getStats()).toMatchObject({ waiting: 0, timedOut: 1 });
  });

  it('should mark timeouts as retryable', async () => {
    const limiter = new RateLimiter({ sourceName: 'tautulli', maxRequests: 1, windowMs: 60000, acquireTimeoutMs: 10 });
    await limiter.acquire();

    const waiting = limiter.acquire().catch((error: unknown) => error);
    await jest.advanceTimersByTimeAsync(10);
    const error = await waiting;

    expect(error).toBeInstanceOf(RateLimitTimeoutError);
    expect(error).toMatchObject({ retryable: true, sourceName: 'tautulli' });
  });

  it('should reject pending waiters on reset', async () => {
    const limiter = new RateLimiter({ sourceName: 'plex', maxRequests: 1, windowMs: 60000 });
    await limiter.acquire();

    const waiting = limiter.acquire();
    limiter.reset();

    await expect(waiting).rejects.toThrow('Rate limiter reset');
    expect(limiter.getRequestCount()).toBe(0);
  });
});

describe('RateLimiterRegistry', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should keep budgets independent per source', async () => {
    const registry = new RateLimiterRegistry(
      { perMinute: { plex: 1, overseerr: 1, tautulli: 1, sonarr: 1 }, acquireTimeoutMs: 0 },
      1000
    );

    await registry.acquire('plex');
    let plexGranted = false;
    void registry.acquire('plex').then(() => {
      plexGranted = true;
    });

    // plex is exhausted, sonarr is not
    await registry.acquire('sonarr');
    await jest.advanceTimersByTimeAsync(0);
    expect(plexGranted).toBe(false);

    await jest.advanceTimersByTimeAsync(1001);
    expect(plexGranted).toBe(true);

    const stats = registry.getStats();
    expect(stats.map((s) => s.sourceName)).toEqual(['plex', 'overseerr', 'tautulli', 'sonarr']);
  });

  it('should run work through the named source and count it there', async () => {
    const registry = new RateLimiterRegistry(
      { perMinute: { plex: 5, overseerr: 5, tautulli: 5, sonarr: 5 }, acquireTimeoutMs: 0 },
      1000
    );

    await expect(registry.execute('tautulli', async () => 'stats')).resolves.toBe('stats');

    const stats = registry.getStats();
    expect(stats.find((s) => s.sourceName === 'tautulli')?.remainingRequests).toBe(4);
    expect(stats.find((s) => s.sourceName === 'plex')?.remainingRequests).toBe(5);
  });

  it('should clear every window on reset', async () => {
    const registry = new RateLimiterRegistry(
      { perMinute: { plex: 1, overseerr: 1, tautulli: 1, sonarr: 1 }, acquireTimeoutMs: 0 },
      1000
    );

    await registry.acquire('overseerr');
    registry.reset();

    expect(registry.forSource('overseerr').getStats().requestsInWindow).toBe(0);
  });
});
