import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_ATTEMPTS } from './retry';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),

  // Storage
  STORE_DRIVER: z.enum(['mongodb', 'memory']).default('mongodb'),
  MONGODB_URI: z.string().min(1).default('mongodb://localhost:27017'),
  DB_NAME: z.string().min(1).default('expense_tracker'),
  // Multi-document transactions need a replica set or sharded cluster
  MONGODB_TRANSACTIONS: booleanFlag,

  // Write retries
  RETRY_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1, { message: 'RETRY_MAX_ATTEMPTS must be at least 1' })
    .default(DEFAULT_MAX_ATTEMPTS),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_BASE_DELAY_MS),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  CORS_ORIGIN: z.string().default('*'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parses configuration from the environment. Throws ConfigError listing
 * every invalid variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  return result.data;
}
