import {
  ClientSession,
  Collection,
  Db,
  Filter,
  MongoClient,
  MongoError,
  MongoNetworkError,
  MongoServerError,
  MongoServerSelectionError,
  ObjectId,
} from 'mongodb';
import {
  AppError,
  ConstraintConflictError,
  StorageError,
  TransientStorageError,
  toError,
} from './errors';
import type { Logger } from './logger';
import {
  compareCategories,
  escapeRegExp,
  type ExpenseStore,
  type StoreTransaction,
} from './store';
import type { Expense, ListExpensesQuery, NewExpense } from './types';

interface ExpenseDocument {
  _id?: ObjectId;
  id: string;
  idempotency_key: string;
  amount: number;
  category: string;
  description: string | null;
  date: string;
  created_at: Date;
}

const DUPLICATE_KEY_CODE = 11000;

// Server codes seen during elections, shutdowns and network trouble
const TRANSIENT_SERVER_CODES = new Set<number>([
  6, // HostUnreachable
  7, // HostNotFound
  89, // NetworkTimeout
  91, // ShutdownInProgress
  189, // PrimarySteppedDown
  262, // ExceededTimeLimit
  9001, // SocketException
  10107, // NotWritablePrimary
  11600, // InterruptedAtShutdown
  11602, // InterruptedDueToReplStateChange
  13435, // NotPrimaryNoSecondaryOk
  13436, // NotPrimaryOrSecondary
]);

const TRANSIENT_LABELS = ['TransientTransactionError', 'RetryableWriteError'];

/**
 * Sorts driver errors into the categories the write path cares about:
 * uniqueness conflicts, transient failures, and everything else.
 */
export function translateMongoError(error: unknown, operation: string): AppError {
  if (error instanceof AppError) return error;

  if (error instanceof MongoServerError && error.code === DUPLICATE_KEY_CODE) {
    return new ConstraintConflictError(`${operation}: duplicate key`, { code: error.code });
  }

  if (error instanceof MongoNetworkError || error instanceof MongoServerSelectionError) {
    return new TransientStorageError(`${operation}: ${error.message}`, { name: error.name });
  }

  if (error instanceof MongoError) {
    const mongoError = error;
    const { code } = mongoError;
    const transientCode = typeof code === 'number' && TRANSIENT_SERVER_CODES.has(code);
    const transientLabel = TRANSIENT_LABELS.some((label) => mongoError.hasErrorLabel(label));
    if (transientCode || transientLabel) {
      return new TransientStorageError(`${operation}: ${mongoError.message}`, { code });
    }
    return new StorageError(`${operation}: ${mongoError.message}`, { code });
  }

  return new StorageError(`${operation}: ${toError(error).message}`);
}

export interface CategoryFilter {
  category?: { $regex: string; $options: 'i' };
}

/**
 * Case-insensitive substring match on category; the user's text is matched
 * literally, never as a pattern.
 */
export function buildListFilter(query: ListExpensesQuery): CategoryFilter {
  const category = query.category?.trim();
  return category ? { category: { $regex: escapeRegExp(category), $options: 'i' } } : {};
}

function toExpense(doc: ExpenseDocument): Expense {
  return {
    id: doc.id,
    idempotency_key: doc.idempotency_key,
    amount: doc.amount,
    category: doc.category,
    description: doc.description,
    date: doc.date,
    created_at: doc.created_at.toISOString(),
  };
}

class MongoTransaction implements StoreTransaction {
  constructor(
    private readonly collection: Collection<ExpenseDocument>,
    private readonly session: ClientSession,
    private readonly transactional: boolean
  ) {}

  async insert(expense: NewExpense): Promise<Expense> {
    const doc: ExpenseDocument = { ...expense, created_at: new Date() };
    try {
      await this.collection.insertOne(doc, { session: this.session });
    } catch (error) {
      throw translateMongoError(error, 'Insert expense');
    }
    return toExpense(doc);
  }

  async commit(): Promise<void> {
    try {
      if (this.transactional) {
        await this.session.commitTransaction();
      }
    } catch (error) {
      throw translateMongoError(error, 'Commit transaction');
    }
    await this.session.endSession();
  }

  async rollback(): Promise<void> {
    try {
      if (this.session.inTransaction()) {
        await this.session.abortTransaction();
      }
    } finally {
      await this.session.endSession();
    }
  }
}

export interface MongoStoreOptions {
  uri: string;
  dbName: string;
  useTransactions: boolean;
  logger: Logger;
}

/**
 * MongoDB-backed expense store. The unique index on idempotency_key is
 * checked atomically with each insert.
 */
export class MongoExpenseStore implements ExpenseStore {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private connecting: Promise<Collection<ExpenseDocument>> | null = null;

  constructor(private readonly options: MongoStoreOptions) {}

  private connect(): Promise<Collection<ExpenseDocument>> {
    if (!this.connecting) {
      this.connecting = this.open().catch((error: unknown) => {
        // Let the next call try again
        this.connecting = null;
        throw translateMongoError(error, 'Connect to MongoDB');
      });
    }
    return this.connecting;
  }

  private async open(): Promise<Collection<ExpenseDocument>> {
    const client = new MongoClient(this.options.uri);
    await client.connect();
    const db = client.db(this.options.dbName);
    const expenses = db.collection<ExpenseDocument>('expenses');

    await expenses.createIndex({ idempotency_key: 1 }, { unique: true });
    await expenses.createIndex({ id: 1 }, { unique: true });
    await expenses.createIndex({ category: 1 });
    await expenses.createIndex({ date: -1, created_at: -1 });

    this.client = client;
    this.db = db;
    this.options.logger.info('Connected to MongoDB', {
      uri: this.options.uri,
      dbName: this.options.dbName,
      transactions: this.options.useTransactions,
    });
    return expenses;
  }

  async init(): Promise<void> {
    await this.connect();
  }

  async ping(): Promise<void> {
    await this.connect();
    try {
      await this.db?.command({ ping: 1 });
    } catch (error) {
      throw translateMongoError(error, 'Ping');
    }
  }

  async begin(): Promise<StoreTransaction> {
    const collection = await this.connect();
    if (!this.client) {
      throw new StorageError('MongoDB client is closed');
    }
    const session = this.client.startSession();
    if (this.options.useTransactions) {
      session.startTransaction();
    }
    return new MongoTransaction(collection, session, this.options.useTransactions);
  }

  async findByIdempotencyKey(key: string): Promise<Expense | null> {
    const collection = await this.connect();
    try {
      const doc = await collection.findOne({ idempotency_key: key });
      return doc ? toExpense(doc) : null;
    } catch (error) {
      throw translateMongoError(error, 'Find expense by idempotency key');
    }
  }

  async list(query: ListExpensesQuery): Promise<Expense[]> {
    const collection = await this.connect();

    const filter: Filter<ExpenseDocument> = buildListFilter(query);
    const direction = query.sort === 'date_asc' ? 1 : -1;

    try {
      const docs = await collection
        .find(filter)
        .sort({ date: direction, created_at: direction, _id: direction })
        .toArray();
      return docs.map(toExpense);
    } catch (error) {
      throw translateMongoError(error, 'List expenses');
    }
  }

  async categories(): Promise<string[]> {
    const collection = await this.connect();
    try {
      return (await collection.distinct('category')).sort(compareCategories);
    } catch (error) {
      throw translateMongoError(error, 'List categories');
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.db = null;
    this.connecting = null;
    if (client) await client.close();
  }
}
