import type { Expense, ListExpensesQuery, NewExpense } from './types';

/**
 * One unit of work against the store. Writes become visible on commit;
 * rollback discards them. Exactly one of commit/rollback is called.
 */
export interface StoreTransaction {
  /**
   * Inserts a record, assigning created_at. Rejects with
   * ConstraintConflictError when the idempotency key is taken and with
   * TransientStorageError for failures worth retrying.
   */
  insert(expense: NewExpense): Promise<Expense>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/**
 * Storage boundary for expenses. Implementations are constructed explicitly
 * and handed to the services that use them.
 */
export interface ExpenseStore {
  init(): Promise<void>;
  close(): Promise<void>;
  ping(): Promise<void>;
  begin(): Promise<StoreTransaction>;
  findByIdempotencyKey(key: string): Promise<Expense | null>;
  list(query: ListExpensesQuery): Promise<Expense[]>;
  categories(): Promise<string[]>;
}

const categoryCollator = new Intl.Collator('en', { sensitivity: 'base' });

/**
 * Alphabetical, ignoring case and accents; variants that differ only in
 * case keep a stable code-unit order ("Food" before "food").
 */
export function compareCategories(a: string, b: string): number {
  const byLetters = categoryCollator.compare(a, b);
  if (byLetters !== 0) return byLetters;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
