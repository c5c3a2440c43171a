import 'dotenv/config';
import { createApp } from './app';
import { loadConfig, type Config } from './config';
import { MongoExpenseStore } from './database';
import { ConfigError } from './errors';
import { ExpenseService } from './expenseService';
import { createLogger, type Logger } from './logger';
import { InMemoryExpenseStore } from './memoryStore';
import type { ExpenseStore } from './store';

export function createStore(config: Config, logger: Logger): ExpenseStore {
  if (config.STORE_DRIVER === 'memory') {
    logger.warn('Using in-memory store; expenses are lost on restart');
    return new InMemoryExpenseStore();
  }
  return new MongoExpenseStore({
    uri: config.MONGODB_URI,
    dbName: config.DB_NAME,
    useTransactions: config.MONGODB_TRANSACTIONS,
    logger,
  });
}

// Initialize storage and start server
async function start(): Promise<void> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError && Array.isArray(error.details)) {
      console.error('Environment validation failed:');
      error.details.forEach((issue) => console.error(`  - ${String(issue)}`));
      console.error('\nCheck .env.example for the expected variables');
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger(config);
  const store = createStore(config, logger);
  const expenseService = new ExpenseService(store, logger, {
    maxAttempts: config.RETRY_MAX_ATTEMPTS,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
  });

  try {
    await store.init();
  } catch (error) {
    logger.error('Failed to initialize storage', { error });
    process.exit(1);
  }

  const app = createApp({
    store,
    expenseService,
    logger,
    nodeEnv: config.NODE_ENV,
    corsOrigin: config.CORS_ORIGIN,
  });

  const server = app.listen(config.PORT, () => {
    logger.info(`Expense Tracker API running on http://localhost:${config.PORT}`, {
      storeDriver: config.STORE_DRIVER,
    });
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info('Shutting down gracefully...', { signal });
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close storage', { error });
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  start().catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
