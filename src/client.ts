import { setTimeout as delay } from 'node:timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { backoffDelay } from './retry';
import type { ExpenseListResponse, ExpenseResponse, SortOrder } from './types';

const expenseResponseSchema = z.object({
  id: z.string(),
  idempotency_key: z.string(),
  amount: z.string(),
  category: z.string(),
  description: z.string().nullable(),
  date: z.string(),
  created_at: z.string(),
});

const expenseListResponseSchema = z.object({
  expenses: z.array(expenseResponseSchema),
  count: z.number().int(),
  total: z.string(),
});

const apiErrorSchema = z.object({
  error: z.string(),
  message: z.string(),
  details: z.unknown().optional(),
});

export interface SubmitExpenseInput {
  idempotency_key?: string;
  amount: string | number;
  category: string;
  description?: string | null;
  date: string;
}

export type PendingSubmission = SubmitExpenseInput & { idempotency_key: string };

export interface SubmitResult {
  expense: ExpenseResponse;
  /** false when the server already had this submission */
  created: boolean;
}

export class ApiClientError extends Error {
  constructor(
    message: string,
    /** HTTP status, or 0 when no response arrived */
    public readonly status: number,
    public readonly code?: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ApiClientError';
  }
}

export interface ExpenseApiClientOptions {
  fetch?: typeof fetch;
  maxAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * HTTP client for the expense API. One logical submission keeps one
 * idempotency key through every retry, so a retried create never stores
 * a second record.
 */
export class ExpenseApiClient {
  private readonly fetchImpl: typeof fetch;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly inFlight = new Map<string, PendingSubmission>();

  constructor(
    private readonly baseUrl: string,
    options: ExpenseApiClientOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? fetch;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  /** Submissions sent but not yet settled, for optimistic display. */
  pending(): PendingSubmission[] {
    return [...this.inFlight.values()];
  }

  async createExpense(input: SubmitExpenseInput): Promise<SubmitResult> {
    const submission: PendingSubmission = {
      ...input,
      idempotency_key: input.idempotency_key ?? uuidv4(),
    };
    this.inFlight.set(submission.idempotency_key, submission);

    try {
      const response = await this.sendWithRetry(`${this.baseUrl}/expenses`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(submission),
      });
      const body = await this.readBody(response);
      return {
        expense: expenseResponseSchema.parse(body),
        created: response.status === 201,
      };
    } finally {
      this.inFlight.delete(submission.idempotency_key);
    }
  }

  async listExpenses(query: { category?: string; sort?: SortOrder } = {}): Promise<ExpenseListResponse> {
    const params = new URLSearchParams();
    if (query.category) params.set('category', query.category);
    if (query.sort) params.set('sort', query.sort);
    const qs = params.toString();

    const response = await this.sendWithRetry(`${this.baseUrl}/expenses${qs ? `?${qs}` : ''}`, {
      method: 'GET',
    });
    return expenseListResponseSchema.parse(await this.readBody(response));
  }

  async listCategories(): Promise<string[]> {
    const response = await this.sendWithRetry(`${this.baseUrl}/categories`, { method: 'GET' });
    return z.array(z.string()).parse(await this.readBody(response));
  }

  // Retries network errors and 5xx responses; returns the last response otherwise
  private async sendWithRetry(url: string, init: RequestInit): Promise<Response> {
    for (let attempt = 1; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchImpl(url, init);
      } catch (error) {
        if (attempt >= this.maxAttempts) {
          const message = error instanceof Error ? error.message : String(error);
          throw new ApiClientError(`Request failed: ${message}`, 0);
        }
        await this.sleep(backoffDelay(attempt, this.retryDelayMs));
        continue;
      }

      if (response.status >= 500 && attempt < this.maxAttempts) {
        await this.sleep(backoffDelay(attempt, this.retryDelayMs));
        continue;
      }
      return response;
    }
  }

  private async readBody(response: Response): Promise<unknown> {
    const body: unknown = await response.json();
    if (!response.ok) {
      const parsed = apiErrorSchema.safeParse(body);
      if (parsed.success) {
        throw new ApiClientError(
          parsed.data.message,
          response.status,
          parsed.data.error,
          parsed.data.details
        );
      }
      throw new ApiClientError(`Request failed with status ${response.status}`, response.status);
    }
    return body;
  }
}
