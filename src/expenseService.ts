import { v4 as uuidv4 } from 'uuid';
import {
  ConstraintConflictError,
  RetryExhaustedError,
  TransientStorageError,
  toError,
} from './errors';
import type { Logger } from './logger';
import { sumAmounts } from './money';
import { executeWithRetry, type RetryOptions } from './retry';
import type { ExpenseStore } from './store';
import type {
  CreateExpenseInput,
  CreateExpenseResult,
  CreateFailureReason,
  Expense,
  ExpenseListResult,
  ListExpensesQuery,
  NewExpense,
} from './types';

// Reads outside the retry loop surface a transient error unwrapped
function failureReason(error: Error): CreateFailureReason {
  if (error instanceof RetryExhaustedError) return 'transient_exhausted';
  if (error instanceof TransientStorageError) return 'transient';
  return 'storage_error';
}

export type ExpenseServiceOptions = Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'sleep'>;

/**
 * Creates and lists expenses. At most one record is ever stored per
 * idempotency key, however many times or however concurrently it is submitted.
 */
export class ExpenseService {
  private readonly retryOptions: RetryOptions;

  constructor(
    private readonly store: ExpenseStore,
    private readonly logger: Logger,
    options: ExpenseServiceOptions
  ) {
    this.retryOptions = { ...options, logger };
  }

  /**
   * Read, check, write, recheck:
   * 1. an existing record for the key is returned as a replay;
   * 2. otherwise a new record is inserted, retrying transient failures;
   * 3. a uniqueness conflict means a concurrent submission won, so its
   *    record is read back and returned as a replay.
   */
  async createExpense(input: CreateExpenseInput): Promise<CreateExpenseResult> {
    const key = input.idempotency_key;

    let existing: Expense | null;
    try {
      existing = await this.store.findByIdempotencyKey(key);
    } catch (error) {
      return this.failed(key, toError(error));
    }
    if (existing) {
      this.logger.info('Idempotent replay', { idempotency_key: key, id: existing.id });
      return { status: 'already_exists', expense: existing };
    }

    const record: NewExpense = {
      id: uuidv4(),
      idempotency_key: key,
      amount: input.amount,
      category: input.category,
      description: input.description,
      date: input.date,
    };

    try {
      const expense = await executeWithRetry(this.store, (tx) => tx.insert(record), this.retryOptions);
      this.logger.info('Created expense', { idempotency_key: key, id: expense.id });
      return { status: 'created', expense };
    } catch (error) {
      if (error instanceof ConstraintConflictError) {
        return this.resolveConflict(key, error);
      }
      return this.failed(key, toError(error));
    }
  }

  private async resolveConflict(
    key: string,
    conflict: ConstraintConflictError
  ): Promise<CreateExpenseResult> {
    let winner: Expense | null;
    try {
      winner = await this.store.findByIdempotencyKey(key);
    } catch (error) {
      return this.failed(key, toError(error));
    }

    if (!winner) {
      this.logger.error('Conflicting record not found', { idempotency_key: key });
      return { status: 'failed', reason: 'conflict_unresolved', error: conflict };
    }

    this.logger.info('Concurrent submission already stored this key', {
      idempotency_key: key,
      id: winner.id,
    });
    return { status: 'already_exists', expense: winner };
  }

  private failed(key: string, error: Error): CreateExpenseResult {
    const reason = failureReason(error);
    this.logger.error('Failed to create expense', { idempotency_key: key, reason, error });
    return { status: 'failed', reason, error };
  }

  async listExpenses(query: ListExpensesQuery): Promise<ExpenseListResult> {
    const expenses = await this.store.list(query);
    return {
      expenses,
      count: expenses.length,
      total: sumAmounts(expenses.map((expense) => expense.amount)),
    };
  }

  async listCategories(): Promise<string[]> {
    return this.store.categories();
  }
}
