import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { MAX_AMOUNT_CENTS, parseAmount } from './money';
import type { CreateExpenseInput, ListExpensesQuery, ValidationResult } from './types';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MAX_KEY_LENGTH = 100;

function isCalendarDate(value: string): boolean {
  const [year, month, day] = value.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

const idempotencyKeySchema = z
  .string({ invalid_type_error: 'Idempotency key must be a string' })
  .trim()
  .min(1, 'Idempotency key cannot be empty')
  .max(MAX_KEY_LENGTH, `Idempotency key must be ${MAX_KEY_LENGTH} characters or less`);

const createExpenseSchema = z.object({
  idempotency_key: idempotencyKeySchema.optional(),

  amount: z.unknown().transform((value, ctx) => {
    if (value === undefined || value === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount is required' });
      return z.NEVER;
    }
    const parsed = parseAmount(value);
    if (!parsed.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
      return z.NEVER;
    }
    if (parsed.cents <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be greater than 0' });
      return z.NEVER;
    }
    if (parsed.cents > MAX_AMOUNT_CENTS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount exceeds maximum allowed value' });
      return z.NEVER;
    }
    return parsed.cents;
  }),

  category: z
    .string({ required_error: 'Category is required', invalid_type_error: 'Category must be a string' })
    .trim()
    .min(1, 'Category cannot be blank')
    .max(100, 'Category must be 100 characters or less'),

  description: z
    .string({ invalid_type_error: 'Description must be a string' })
    .trim()
    .max(1000, 'Description must be 1000 characters or less')
    .nullish()
    .transform((value) => (value ? value : null)),

  date: z
    .string({ required_error: 'Date is required', invalid_type_error: 'Date must be a string' })
    .trim()
    .superRefine((value, ctx) => {
      if (!DATE_PATTERN.test(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Date must be in YYYY-MM-DD format' });
      } else if (!isCalendarDate(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Date is not a valid date' });
      }
    }),
});

const listExpensesSchema = z.object({
  category: z
    .string({ invalid_type_error: 'Category filter must be a single string' })
    .trim()
    .max(100, 'Category filter must be 100 characters or less')
    .optional()
    .transform((value) => (value ? value : undefined)),
  sort: z
    .enum(['date_desc', 'date_asc'], {
      errorMap: () => ({ message: 'Sort must be one of: date_desc, date_asc' }),
    })
    .default('date_desc'),
});

function isObject(input: unknown): input is object {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/**
 * Validates a create request body. The idempotency key comes from the body,
 * the Idempotency-Key header, or is generated; body and header must agree
 * when both are sent.
 */
export function validateExpenseInput(
  input: unknown,
  headerKey?: string
): ValidationResult<CreateExpenseInput> {
  if (!isObject(input)) {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  const errors: string[] = [];
  const result = createExpenseSchema.safeParse(input);
  if (!result.success) {
    errors.push(...result.error.issues.map((issue) => issue.message));
  }

  let fromHeader: string | undefined;
  if (headerKey !== undefined) {
    const header = idempotencyKeySchema.safeParse(headerKey);
    if (header.success) {
      fromHeader = header.data;
    } else {
      errors.push(...header.error.issues.map((issue) => `Idempotency-Key header: ${issue.message}`));
    }
  }

  if (!result.success || errors.length > 0) {
    return { valid: false, errors };
  }

  const fromBody = result.data.idempotency_key;
  if (fromBody !== undefined && fromHeader !== undefined && fromBody !== fromHeader) {
    return {
      valid: false,
      errors: ['Idempotency-Key header does not match idempotency_key in body'],
    };
  }

  return {
    valid: true,
    errors: [],
    data: {
      idempotency_key: fromBody ?? fromHeader ?? uuidv4(),
      amount: result.data.amount,
      category: result.data.category,
      description: result.data.description,
      date: result.data.date,
    },
  };
}

export function validateListQuery(input: unknown): ValidationResult<ListExpensesQuery> {
  const result = listExpensesSchema.safeParse(isObject(input) ? input : {});
  if (!result.success) {
    return { valid: false, errors: result.error.issues.map((issue) => issue.message) };
  }
  return { valid: true, errors: [], data: result.data };
}
