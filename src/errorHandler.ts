import type { Request, Response, NextFunction } from 'express';
import { isAppError, toError } from './errors';
import { redactSecrets, type Logger } from './logger';
import type { ApiError } from './types';

// Hint for clients after a storage outage outlived the retries
const RETRY_AFTER_SECONDS = '5';

/**
 * Maps application errors to HTTP responses and logs each with request context.
 */
export function createErrorHandler(logger: Logger, nodeEnv: string) {
  return (thrown: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const err = toError(thrown);
    const context = {
      method: req.method,
      path: req.path,
      body: redactSecrets(req.body),
    };

    if (isAppError(err)) {
      const log = err.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
      log('Application error', { code: err.code, message: err.message, ...context });

      if (err.statusCode === 503) {
        res.set('Retry-After', RETRY_AFTER_SECONDS);
      }
      const body: ApiError = { error: err.code, message: err.message };
      if (err.details !== undefined) body.details = err.details;
      res.status(err.statusCode).json(body);
      return;
    }

    if (err.name === 'SyntaxError' && 'body' in err) {
      logger.warn('Invalid JSON in request', { message: err.message, ...context });
      const body: ApiError = { error: 'INVALID_JSON', message: 'Invalid JSON in request body' };
      res.status(400).json(body);
      return;
    }

    logger.error('Unexpected error', {
      message: err.message,
      name: err.name,
      stack: err.stack,
      ...context,
    });
    const body: ApiError = {
      error: 'INTERNAL_SERVER_ERROR',
      message: nodeEnv === 'development' ? err.message : 'An unexpected error occurred',
    };
    res.status(500).json(body);
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  const body: ApiError = { error: 'NOT_FOUND', message: 'The requested resource was not found' };
  res.status(404).json(body);
}
