import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { ValidationError } from './errors';
import type { ExpenseService } from './expenseService';
import { formatAmount } from './money';
import type { Expense, ExpenseListResponse, ExpenseResponse } from './types';
import { validateExpenseInput, validateListQuery } from './validation';

// Convert stored expense (amount in cents) to response (decimal string)
export function toExpenseResponse(expense: Expense): ExpenseResponse {
  return {
    id: expense.id,
    idempotency_key: expense.idempotency_key,
    amount: formatAmount(expense.amount),
    category: expense.category,
    description: expense.description,
    date: expense.date,
    created_at: expense.created_at,
  };
}

export function createExpenseRouter(expenseService: ExpenseService): Router {
  const router = Router();

  /**
   * POST /expenses - Create an expense.
   * 201 when stored now, 200 when the idempotency key was already used.
   */
  router.post('/expenses', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = validateExpenseInput(req.body, req.get('Idempotency-Key'));
      if (!validation.valid) {
        throw new ValidationError('Validation failed', validation.errors);
      }

      const result = await expenseService.createExpense(validation.data);
      if (result.status === 'failed') {
        throw result.error;
      }

      const created = result.status === 'created';
      res
        .status(created ? 201 : 200)
        .set('Idempotent-Replayed', String(!created))
        .json(toExpenseResponse(result.expense));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /expenses - List expenses (query: category, sort)
   */
  router.get('/expenses', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = validateListQuery(req.query);
      if (!validation.valid) {
        throw new ValidationError('Invalid query', validation.errors);
      }

      const result = await expenseService.listExpenses(validation.data);
      const response: ExpenseListResponse = {
        expenses: result.expenses.map(toExpenseResponse),
        count: result.count,
        total: formatAmount(result.total),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /categories - Distinct categories, alphabetical
   */
  router.get('/categories', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await expenseService.listCategories());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
