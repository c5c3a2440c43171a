import { setTimeout as delay } from 'node:timers/promises';
import { RetryExhaustedError, TransientStorageError } from './errors';
import type { Logger } from './logger';
import type { ExpenseStore, StoreTransaction } from './store';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 1000;

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wait after failed attempt `attempt` (1-based): base, 2x base, 4x base...
 */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

async function rollback(tx: StoreTransaction, logger: Logger): Promise<void> {
  try {
    await tx.rollback();
  } catch (error) {
    logger.warn('Rollback failed', { error });
  }
}

/**
 * Runs `work` in its own transaction, retrying transient storage failures
 * with exponential backoff. Every failed attempt is rolled back before the
 * next one starts. Constraint conflicts and other errors are not retried.
 */
export async function executeWithRetry<T>(
  store: ExpenseStore,
  work: (tx: StoreTransaction) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxAttempts, baseDelayMs, logger } = options;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));

  for (let attempt = 1; ; attempt++) {
    let tx: StoreTransaction | null = null;
    try {
      tx = await store.begin();
      const result = await work(tx);
      await tx.commit();
      return result;
    } catch (error) {
      if (tx) await rollback(tx, logger);

      if (!(error instanceof TransientStorageError)) throw error;
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }

      const delayMs = backoffDelay(attempt, baseDelayMs);
      logger.warn('Transient storage failure, retrying', {
        attempt,
        maxAttempts,
        delayMs,
        error: error.message,
      });
      await sleep(delayMs);
    }
  }
}
