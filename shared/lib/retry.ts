import { formatError } from './errors.js';
import { createLogger, type Logger } from './logger.js';

export interface RetryPolicy {
  maxAttempts?: number;
  /** Wait before the second attempt; multiplied by `backoffMultiplier` after each further failure. */
  delayMs?: number;
  backoffMultiplier?: number;
  /** Errors for which this returns false are rethrown at once. */
  retryable?: (error: unknown) => boolean;
  /** Names the operation in retry log lines. */
  label?: string;
  logger?: Logger;
}

const defaultLog = createLogger('Retry');

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Wait before attempt `attempt + 1` (attempts count from 1). */
export function backoffDelay(attempt: number, delayMs: number, backoffMultiplier: number): number {
  return delayMs * Math.pow(backoffMultiplier, attempt - 1);
}

/**
 * Run `fn` until it resolves or the policy runs out of attempts.
 * The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy = {}): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts ?? 2);
  const delayMs = policy.delayMs ?? 2000;
  const backoffMultiplier = policy.backoffMultiplier ?? 2;
  const log = policy.logger ?? defaultLog;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxAttempts || (policy.retryable && !policy.retryable(err))) throw err;
      const waitMs = backoffDelay(attempt, delayMs, backoffMultiplier);
      log.warn(`${policy.label ?? 'Operation'} failed (attempt ${attempt}/${maxAttempts}), retrying`, {
        waitMs,
        error: formatError(err),
      });
      await sleep(waitMs);
    }
  }
}
