// Expense types
export interface Expense {
  id: string;
  idempotency_key: string;
  amount: number; // Stored as integer minor units (cents) to avoid floating point issues
  category: string;
  description: string | null;
  date: string; // ISO date string (YYYY-MM-DD)
  created_at: string; // ISO timestamp, assigned by the store
}

// Everything except created_at, which the store assigns on insert
export type NewExpense = Omit<Expense, 'created_at'>;

export interface CreateExpenseInput {
  idempotency_key: string;
  amount: number; // Minor units, already validated
  category: string;
  description: string | null;
  date: string;
}

export type SortOrder = 'date_desc' | 'date_asc';

export interface ListExpensesQuery {
  category?: string;
  sort: SortOrder;
}

export interface ExpenseResponse {
  id: string;
  idempotency_key: string;
  amount: string; // Decimal string with two fractional digits
  category: string;
  description: string | null;
  date: string;
  created_at: string;
}

export interface ExpenseListResult {
  expenses: Expense[];
  count: number;
  total: number; // Minor units
}

export interface ExpenseListResponse {
  expenses: ExpenseResponse[];
  count: number;
  total: string;
}

export type CreateFailureReason =
  | 'transient'
  | 'transient_exhausted'
  | 'storage_error'
  | 'conflict_unresolved';

/**
 * Outcome of an idempotent create. A replay is a success, not an error.
 */
export type CreateExpenseResult =
  | { status: 'created'; expense: Expense }
  | { status: 'already_exists'; expense: Expense }
  | { status: 'failed'; reason: CreateFailureReason; error: Error };

export interface ApiError {
  error: string;
  message: string;
  details?: unknown;
}

export type ValidationResult<T> =
  | { valid: true; errors: []; data: T }
  | { valid: false; errors: string[] };
