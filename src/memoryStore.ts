import { ConstraintConflictError, StorageError } from './errors';
import { compareCategories, type ExpenseStore, type StoreTransaction } from './store';
import type { Expense, ListExpensesQuery, NewExpense } from './types';

interface StoredExpense {
  expense: Expense;
  seq: number;
}

interface KeyLock {
  released: Promise<void>;
  release: () => void;
}

function createKeyLock(): KeyLock {
  let release: () => void = () => undefined;
  const released = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { released, release };
}

function compareRows(a: StoredExpense, b: StoredExpense): number {
  if (a.expense.date !== b.expense.date) return a.expense.date < b.expense.date ? -1 : 1;
  if (a.expense.created_at !== b.expense.created_at) {
    return a.expense.created_at < b.expense.created_at ? -1 : 1;
  }
  return a.seq - b.seq;
}

class InMemoryTransaction implements StoreTransaction {
  private readonly staged: Expense[] = [];
  private readonly locks: KeyLock[] = [];
  private finished = false;

  constructor(private readonly store: InMemoryExpenseStore) {}

  async insert(expense: NewExpense): Promise<Expense> {
    if (this.finished) throw new StorageError('Transaction already finished');
    const lock = await this.store.lockKey(expense.idempotency_key);
    this.locks.push(lock);
    const row: Expense = { ...expense, created_at: this.store.now().toISOString() };
    this.staged.push(row);
    return { ...row };
  }

  async commit(): Promise<void> {
    if (this.finished) throw new StorageError('Transaction already finished');
    this.finished = true;
    for (const expense of this.staged) {
      this.store.append(expense);
    }
    this.releaseLocks();
  }

  async rollback(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    this.staged.length = 0;
    this.releaseLocks();
  }

  private releaseLocks(): void {
    for (const lock of this.locks) lock.release();
    this.locks.length = 0;
  }
}

export interface InMemoryStoreOptions {
  now?: () => Date;
}

/**
 * Process-local expense store. A second writer of an idempotency key that
 * is held by an open transaction waits for that transaction to finish, then
 * either takes the key or fails with a constraint conflict.
 */
export class InMemoryExpenseStore implements ExpenseStore {
  private readonly rows: StoredExpense[] = [];
  private readonly byKey = new Map<string, Expense>();
  private readonly pending = new Map<string, KeyLock>();
  private seq = 0;
  private closed = false;
  readonly now: () => Date;

  constructor(options: InMemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async init(): Promise<void> {
    this.closed = false;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  async ping(): Promise<void> {
    this.assertOpen();
  }

  async begin(): Promise<StoreTransaction> {
    this.assertOpen();
    return new InMemoryTransaction(this);
  }

  async findByIdempotencyKey(key: string): Promise<Expense | null> {
    this.assertOpen();
    const expense = this.byKey.get(key);
    return expense ? { ...expense } : null;
  }

  async list(query: ListExpensesQuery): Promise<Expense[]> {
    this.assertOpen();
    const needle = query.category?.trim().toLowerCase();
    const matching = needle
      ? this.rows.filter((row) => row.expense.category.toLowerCase().includes(needle))
      : [...this.rows];

    matching.sort(compareRows);
    if (query.sort !== 'date_asc') matching.reverse();
    return matching.map((row) => ({ ...row.expense }));
  }

  async categories(): Promise<string[]> {
    this.assertOpen();
    return [...new Set(this.rows.map((row) => row.expense.category))].sort(compareCategories);
  }

  /** Number of committed records, for diagnostics. */
  size(): number {
    return this.rows.length;
  }

  /** @internal Waits out any open transaction holding the key, then holds it. */
  async lockKey(key: string): Promise<KeyLock> {
    let held = this.pending.get(key);
    while (held) {
      await held.released;
      held = this.pending.get(key);
    }
    if (this.byKey.has(key)) {
      throw new ConstraintConflictError('Insert expense: duplicate key', { idempotency_key: key });
    }

    const lock = createKeyLock();
    const entry: KeyLock = {
      released: lock.released,
      release: () => {
        this.pending.delete(key);
        lock.release();
      },
    };
    this.pending.set(key, entry);
    return entry;
  }

  /** @internal */
  append(expense: Expense): void {
    this.seq += 1;
    this.rows.push({ expense, seq: this.seq });
    this.byKey.set(expense.idempotency_key, expense);
  }

  private assertOpen(): void {
    if (this.closed) throw new StorageError('Store is closed');
  }
}
