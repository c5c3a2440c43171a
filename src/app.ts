import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createErrorHandler, notFoundHandler } from './errorHandler';
import type { ExpenseService } from './expenseService';
import type { Logger } from './logger';
import { createExpenseRouter } from './routes';
import type { ExpenseStore } from './store';

export interface AppDependencies {
  store: ExpenseStore;
  expenseService: ExpenseService;
  logger: Logger;
  nodeEnv: string;
  corsOrigin: string;
}

export function createApp(deps: AppDependencies): Express {
  const { store, expenseService, logger } = deps;
  const app = express();

  // Middleware
  app.use(cors({ origin: deps.corsOrigin, exposedHeaders: ['Idempotent-Replayed', 'Retry-After'] }));
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', { method: req.method, path: req.path });
    next();
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Expense Tracker API is running' });
  });

  // Health check endpoint
  app.get('/health', async (_req: Request, res: Response) => {
    try {
      await store.ping();
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    } catch (error) {
      logger.warn('Health check failed', { error });
      res.status(503).json({ status: 'unavailable', timestamp: new Date().toISOString() });
    }
  });

  app.use(createExpenseRouter(expenseService));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger, deps.nodeEnv));

  return app;
}
