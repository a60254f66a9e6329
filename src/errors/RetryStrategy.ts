/**
 * Retry Strategy System
 *
 * Configurable retry policies for transient failures. Decisions are made
 * from the ApplicationError hierarchy: only errors flagged retryable, and
 * listed in the policy when it names codes, are attempted again.
 */

import { ApplicationError, ErrorCode } from './ApplicationError.js';
import { logger } from '../utils/logger.js';

// ============================================
// RETRY POLICY CONFIGURATION
// ============================================

export interface RetryPolicy {
  /**
   * Maximum number of attempts, the first one included
   */
  maxAttempts: number;

  initialDelayMs: number;

  maxDelayMs: number;

  /**
   * Backoff multiplier (e.g., 2 for exponential backoff)
   */
  backoffMultiplier: number;

  /**
   * Jitter factor (0-1) to randomize retry delays
   */
  jitterFactor: number;

  /**
   * Error codes that should be retried
   */
  retryableErrorCodes?: ErrorCode[];
}

export type RetryResult<T> =
  | { success: true; value: T; attemptCount: number; totalDelayMs: number }
  | { success: false; error: Error; attemptCount: number; totalDelayMs: number };

// ============================================
// PREDEFINED RETRY POLICIES
// ============================================

/**
 * Policy for calls to the upstream services. Rate limit timeouts count as
 * outages and are retried the same way.
 */
export const SOURCE_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.2,
  retryableErrorCodes: [
    ErrorCode.NETWORK_CONNECTION_FAILED,
    ErrorCode.NETWORK_TIMEOUT,
    ErrorCode.SOURCE_RATE_LIMIT,
    ErrorCode.SOURCE_RATE_LIMIT_TIMEOUT,
    ErrorCode.SOURCE_SERVER_ERROR,
  ],
};

// ============================================
// RETRY STRATEGY CLASS
// ============================================

export class RetryStrategy {
  constructor(private readonly policy: RetryPolicy) {}

  /**
   * Execute an operation and return detailed result
   */
  async executeWithResult<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation'
  ): Promise<RetryResult<T>> {
    let attemptCount = 0;
    let totalDelayMs = 0;

    for (;;) {
      attemptCount++;

      try {
        const value = await operation();
        return { success: true, value, attemptCount, totalDelayMs };
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.shouldRetryError(lastError) || attemptCount >= this.policy.maxAttempts) {
          logger.warn(`${operationName} failed after ${attemptCount} attempt(s)`, {
            error: lastError.message,
            attemptCount,
            totalDelayMs,
          });
          return { success: false, error: lastError, attemptCount, totalDelayMs };
        }

        const delayMs = Math.max(this.calculateDelay(attemptCount), extractRetryAfter(lastError) ?? 0);
        totalDelayMs += delayMs;

        logger.info(`Retrying ${operationName} after error`, {
          error: lastError.message,
          attemptNumber: attemptCount,
          nextAttemptIn: delayMs,
          totalAttempts: this.policy.maxAttempts,
        });

        await this.sleep(delayMs);
      }
    }
  }

  private shouldRetryError(error: Error): boolean {
    if (error instanceof ApplicationError) {
      if (!error.retryable) {
        return false;
      }

      if (this.policy.retryableErrorCodes) {
        return this.policy.retryableErrorCodes.includes(error.code);
      }

      return true;
    }

    // Non-ApplicationErrors are programmer errors until proven otherwise
    return false;
  }

  /**
   * Exponential backoff with jitter
   */
  private calculateDelay(attemptNumber: number): number {
    const exponentialDelay =
      this.policy.initialDelayMs * Math.pow(this.policy.backoffMultiplier, attemptNumber - 1);

    const cappedDelay = Math.min(exponentialDelay, this.policy.maxDelayMs);

    const jitter = cappedDelay * this.policy.jitterFactor * (Math.random() - 0.5);

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

// ============================================
// HELPER FUNCTIONS
// ============================================

/**
 * Create a retry strategy with custom policy
 */
export function createRetryStrategy(
  policy: Partial<RetryPolicy>,
  base: RetryPolicy = SOURCE_RETRY_POLICY
): RetryStrategy {
  return new RetryStrategy({ ...base, ...policy });
}

/**
 * Extract retry-after delay (ms) from a RateLimitError
 */
function extractRetryAfter(error: Error): number | undefined {
  if (error instanceof ApplicationError) {
    const retryAfter = error.context.metadata?.retryAfter;
    if (typeof retryAfter === 'number') {
      return retryAfter * 1000;
    }
  }
  return undefined;
}
