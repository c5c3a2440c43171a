import winston from 'winston';
import type { Config } from './config';

const SECRET_KEYS = /password|secret|token|api[_-]?key|authorization/i;
const SECRET_IN_TEXT = /(mongodb(?:\+srv)?:\/\/[^:/\s]+:)([^@\s]+)(@)/gi;

/**
 * Redacts credentials from log payloads: secret-looking keys, and passwords
 * embedded in connection strings. Errors become plain objects; their stack
 * is kept unless `keepStack` is false.
 */
export function redactSecrets(value: unknown, keepStack = true): unknown {
  if (typeof value === 'string') {
    return value.replace(SECRET_IN_TEXT, '$1***REDACTED***$3');
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redactSecrets(entry, keepStack));
  }
  if (value instanceof Error) {
    const redacted: Record<string, unknown> = {
      name: value.name,
      message: redactSecrets(value.message, keepStack),
    };
    if (keepStack && value.stack) {
      redacted.stack = redactSecrets(value.stack, keepStack);
    }
    return redacted;
  }
  if (value && typeof value === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      redacted[key] = SECRET_KEYS.test(key) ? '***REDACTED***' : redactSecrets(entry, keepStack);
    }
    return redacted;
  }
  return value;
}

const redactFormat = winston.format((info, opts: { keepStack?: boolean } = {}) => {
  for (const key of Object.keys(info)) {
    if (key !== 'level') {
      info[key] = redactSecrets(info[key], opts.keepStack ?? true);
    }
  }
  return info;
});

export type LoggerConfig = Pick<Config, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>;

export function createLogger(config: LoggerConfig): winston.Logger {
  const isProduction = config.NODE_ENV === 'production';

  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        ...(isProduction ? [] : [winston.format.colorize()]),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (isProduction && config.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: config.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: config.LOG_LEVEL,
    silent: config.NODE_ENV === 'test',
    format: winston.format.combine(
      redactFormat({ keepStack: !isProduction }),
      winston.format.errors({ stack: true })
    ),
    transports,
    exitOnError: false,
  });
}

export type Logger = winston.Logger;
