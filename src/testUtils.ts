import { createLogger, type Logger } from './logger';
import { InMemoryExpenseStore } from './memoryStore';
import type { StoreTransaction } from './store';
import type { Expense, NewExpense } from './types';

export function silentLogger(): Logger {
  return createLogger({ NODE_ENV: 'test', LOG_LEVEL: 'error' });
}

/**
 * In-memory store whose inserts can be made to fail on demand, with
 * counters for what the write path did.
 */
export class FlakyStore extends InMemoryExpenseStore {
  readonly calls = { begin: 0, insert: 0, commit: 0, rollback: 0, findByIdempotencyKey: 0 };
  private readonly insertFailures: Error[] = [];

  failNextInserts(...errors: Error[]): void {
    this.insertFailures.push(...errors);
  }

  override async findByIdempotencyKey(key: string): Promise<Expense | null> {
    this.calls.findByIdempotencyKey += 1;
    return super.findByIdempotencyKey(key);
  }

  override async begin(): Promise<StoreTransaction> {
    this.calls.begin += 1;
    const tx = await super.begin();
    return {
      insert: async (expense: NewExpense) => {
        this.calls.insert += 1;
        const failure = this.insertFailures.shift();
        if (failure) throw failure;
        return tx.insert(expense);
      },
      commit: async () => {
        this.calls.commit += 1;
        await tx.commit();
      },
      rollback: async () => {
        this.calls.rollback += 1;
        await tx.rollback();
      },
    };
  }
}
