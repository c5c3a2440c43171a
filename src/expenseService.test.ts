import {
  ConstraintConflictError,
  RetryExhaustedError,
  StorageError,
  TransientStorageError,
} from './errors';
import { ExpenseService } from './expenseService';
import { formatAmount } from './money';
import { FlakyStore, silentLogger } from './testUtils';
import type { CreateExpenseInput, CreateExpenseResult, Expense } from './types';

function input(overrides: Partial<CreateExpenseInput> = {}): CreateExpenseInput {
  return {
    idempotency_key: 'key-1',
    amount: 1250,
    category: 'Food',
    description: null,
    date: '2024-03-01',
    ...overrides,
  };
}

function expenseOf(result: CreateExpenseResult): Expense {
  if (result.status === 'failed') throw result.error;
  return result.expense;
}

// Each call is one second after the previous one
function steppingClock(start = Date.UTC(2024, 0, 1)): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}

describe('ExpenseService.createExpense', () => {
  let store: FlakyStore;
  let delays: number[];
  let service: ExpenseService;

  beforeEach(() => {
    store = new FlakyStore({ now: steppingClock() });
    delays = [];
    service = new ExpenseService(store, silentLogger(), {
      maxAttempts: 3,
      baseDelayMs: 1000,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
  });

  it('should create a new expense', async () => {
    const result = await service.createExpense(input({ description: 'Lunch' }));

    expect(result.status).toBe('created');
    const expense = expenseOf(result);
    expect(expense).toMatchObject({
      idempotency_key: 'key-1',
      amount: 1250,
      category: 'Food',
      description: 'Lunch',
      date: '2024-03-01',
      created_at: '2024-01-01T00:00:00.000Z',
    });
    expect(expense.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should return the stored record when the same key is submitted again', async () => {
    const first = await service.createExpense(input());
    const second = await service.createExpense(input());

    expect(first.status).toBe('created');
    expect(second.status).toBe('already_exists');
    expect(expenseOf(second)).toEqual(expenseOf(first));
    expect(store.size()).toBe(1);
    expect(store.calls.insert).toBe(1);
  });

  it('should keep the original fields when a replay carries different ones', async () => {
    await service.createExpense(input({ amount: 1250 }));
    const replay = await service.createExpense(input({ amount: 9999, category: 'Travel' }));

    expect(replay.status).toBe('already_exists');
    expect(expenseOf(replay)).toMatchObject({ amount: 1250, category: 'Food' });
  });

  it('should converge concurrent submissions of one key on a single record', async () => {
    const results = await Promise.all(
      [100, 200, 300, 400, 500].map((amount) => service.createExpense(input({ amount })))
    );

    const created = results.filter((result) => result.status === 'created');
    const replays = results.filter((result) => result.status === 'already_exists');
    expect(created).toHaveLength(1);
    expect(replays).toHaveLength(4);

    const winner = expenseOf(created[0]);
    for (const result of results) {
      expect(expenseOf(result)).toEqual(winner);
    }
    expect(store.size()).toBe(1);
  });

  it('should return the winner when a concurrent submission commits after the pre-check', async () => {
    const winner = {
      id: 'winner-id',
      idempotency_key: 'key-1',
      amount: 777,
      category: 'Rent',
      description: null,
      date: '2024-02-01',
    };
    const findByKey = store.findByIdempotencyKey.bind(store);
    jest.spyOn(store, 'findByIdempotencyKey').mockImplementationOnce(async (key) => {
      const missing = await findByKey(key);
      const tx = await store.begin();
      await tx.insert(winner);
      await tx.commit();
      return missing;
    });

    const result = await service.createExpense(input());

    expect(result.status).toBe('already_exists');
    expect(expenseOf(result)).toMatchObject({ id: 'winner-id', amount: 777, category: 'Rent' });
    expect(store.size()).toBe(1);
    expect(delays).toEqual([]);
  });

  it('should create distinct records for distinct keys with identical fields', async () => {
    const a = expenseOf(await service.createExpense(input({ idempotency_key: 'key-a' })));
    const b = expenseOf(await service.createExpense(input({ idempotency_key: 'key-b' })));

    expect(a.id).not.toBe(b.id);
    expect(store.size()).toBe(2);
  });

  it('should retry transient failures and store exactly one record', async () => {
    store.failNextInserts(
      new TransientStorageError('connection reset'),
      new TransientStorageError('connection reset')
    );

    const result = await service.createExpense(input());

    expect(result.status).toBe('created');
    expect(delays).toEqual([1000, 2000]);
    expect(store.calls.rollback).toBe(2);
    expect(store.size()).toBe(1);
  });

  it('should fail once retries are exhausted and store nothing', async () => {
    store.failNextInserts(
      new TransientStorageError('down'),
      new TransientStorageError('down'),
      new TransientStorageError('down')
    );

    const result = await service.createExpense(input());

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.reason).toBe('transient_exhausted');
    expect(result.error).toBeInstanceOf(RetryExhaustedError);
    expect(store.size()).toBe(0);
    expect(await store.findByIdempotencyKey('key-1')).toBeNull();
  });

  it('should allow resubmitting with the same key after exhausted retries', async () => {
    store.failNextInserts(
      new TransientStorageError('down'),
      new TransientStorageError('down'),
      new TransientStorageError('down')
    );
    await service.createExpense(input());

    const retried = await service.createExpense(input());

    expect(retried.status).toBe('created');
    expect(store.size()).toBe(1);
  });

  it('should report a conflict whose record cannot be found', async () => {
    store.failNextInserts(new ConstraintConflictError('duplicate key'));

    const result = await service.createExpense(input());

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.reason).toBe('conflict_unresolved');
    expect(result.error).toBeInstanceOf(ConstraintConflictError);
  });

  it('should fail without writing when the pre-check cannot reach storage', async () => {
    jest
      .spyOn(store, 'findByIdempotencyKey')
      .mockRejectedValueOnce(new TransientStorageError('no primary'));

    const result = await service.createExpense(input());

    expect(result).toMatchObject({ status: 'failed', reason: 'transient' });
    expect(store.calls.begin).toBe(0);
  });

  it('should report a permanent pre-check failure as a storage error', async () => {
    jest
      .spyOn(store, 'findByIdempotencyKey')
      .mockRejectedValueOnce(new StorageError('not authorized'));

    const result = await service.createExpense(input());

    expect(result).toMatchObject({ status: 'failed', reason: 'storage_error' });
    expect(store.calls.begin).toBe(0);
  });
});

describe('ExpenseService.listExpenses', () => {
  let store: FlakyStore;
  let service: ExpenseService;

  async function add(key: string, category: string, amount: number, date: string): Promise<string> {
    const result = await service.createExpense(input({ idempotency_key: key, category, amount, date }));
    return expenseOf(result).idempotency_key;
  }

  beforeEach(async () => {
    store = new FlakyStore({ now: steppingClock() });
    service = new ExpenseService(store, silentLogger(), { maxAttempts: 3, baseDelayMs: 0 });

    await add('a', 'Food', 1010, '2024-01-02');
    await add('b', 'Seafood', 2020, '2024-01-03');
    await add('c', 'food', 1, '2024-01-02');
    await add('d', 'Transport', 500, '2024-01-01');
  });

  it('should list newest first by default', async () => {
    const result = await service.listExpenses({ sort: 'date_desc' });

    expect(result.expenses.map((e) => e.idempotency_key)).toEqual(['b', 'c', 'a', 'd']);
    expect(result.count).toBe(4);
    expect(formatAmount(result.total)).toBe('35.31');
  });

  it('should list oldest first', async () => {
    const result = await service.listExpenses({ sort: 'date_asc' });

    expect(result.expenses.map((e) => e.idempotency_key)).toEqual(['d', 'a', 'c', 'b']);
  });

  it('should filter by case-insensitive category substring and sum exactly', async () => {
    const result = await service.listExpenses({ category: 'FOOD', sort: 'date_desc' });

    expect(result.expenses.map((e) => e.idempotency_key)).toEqual(['b', 'c', 'a']);
    expect(result.count).toBe(3);
    expect(formatAmount(result.total)).toBe('30.31');
  });

  it('should return nothing for an unmatched filter', async () => {
    const result = await service.listExpenses({ category: 'rent', sort: 'date_desc' });

    expect(result).toEqual({ expenses: [], count: 0, total: 0 });
  });

  it('should list distinct categories alphabetically', async () => {
    await add('e', 'Food', 100, '2024-01-05');

    expect(await service.listCategories()).toEqual(['Food', 'food', 'Seafood', 'Transport']);
  });
});

describe('ExpenseService.listExpenses ordering ties', () => {
  it('should break date and timestamp ties by creation order', async () => {
    const frozen = new Date('2024-05-01T12:00:00.000Z');
    const store = new FlakyStore({ now: () => frozen });
    const service = new ExpenseService(store, silentLogger(), { maxAttempts: 1, baseDelayMs: 0 });

    for (const key of ['first', 'second', 'third']) {
      await service.createExpense(input({ idempotency_key: key }));
    }

    const newest = await service.listExpenses({ sort: 'date_desc' });
    const oldest = await service.listExpenses({ sort: 'date_asc' });
    expect(newest.expenses.map((e) => e.idempotency_key)).toEqual(['third', 'second', 'first']);
    expect(oldest.expenses.map((e) => e.idempotency_key)).toEqual(['first', 'second', 'third']);
  });
});
