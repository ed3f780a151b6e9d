import type { NextFunction, Request, Response } from 'express';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'http-validate' });

function errorType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return undefined;
}

/**
 * Last middleware in the chain. Unparseable JSON gets the same 400 body as
 * any other malformed request; anything else is a 500.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const type = errorType(err);
  if (type === 'entity.parse.failed') {
    logger.warn('invalid_request', { status: 400, error: type });
    res.status(400).json({
      error: 'Invalid request',
      details: [{ field: 'body', message: 'request body must be valid JSON' }],
    });
    return;
  }

  logger.error('unhandled_error', {
    status: 500,
    error: err instanceof Error ? err.message : String(err),
  });
  res.status(500).json({ error: 'Internal server error' });
}
