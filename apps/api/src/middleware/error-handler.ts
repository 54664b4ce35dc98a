import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { consoleLogger, type Logger } from '../services/logger.js';

function statusOf(err: Error): number {
  if ('status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export function createErrorHandler(logger: Logger = consoleLogger) {
  return function errorHandler(
    err: unknown,
    _req: Request,
    res: Response,
    _next: NextFunction,
  ): void {
    if (err instanceof ZodError) {
      res.status(400).json({ error: 'validation_error', details: err.errors });
      return;
    }
    if (err instanceof Error) {
      const status = statusOf(err);
      if (status >= 500) logger.error('[api] unhandled error', err);
      res.status(status).json({ error: err.message });
      return;
    }
    logger.error('[api] unhandled non-error value', err);
    res.status(500).json({ error: 'Internal server error' });
  };
}
