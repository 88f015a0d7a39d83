import type { NextFunction, Request, Response } from 'express';
import { isFlowError, MissingFeaturesError } from '../utils/errors';
import logger from '../utils/logger';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: `Not found: ${req.method} ${req.originalUrl}` });
}

/**
 * Answer with the status a FlowError carries, 500 for anything else.
 */
export function sendError(res: Response, err: unknown, fallbackMessage = 'Internal server error'): void {
  if (isFlowError(err)) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(err instanceof MissingFeaturesError ? { trackIds: err.trackIds } : {}),
    });
    return;
  }

  logger.error(`${fallbackMessage}:`, err);
  res.status(500).json({
    error: err instanceof Error ? err.message : fallbackMessage,
  });
}

// body-parser rejects unreadable bodies (bad JSON, too large) with a 4xx status
function isRequestBodyError(err: unknown): err is Error & { status: number } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

// Express only treats a handler with four parameters as an error handler
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isRequestBodyError(err)) {
    logger.warn(`Rejected request body for ${req.method} ${req.originalUrl}: ${err.message}`);
    res.status(err.status).json({ error: err.message, code: 'INVALID_REQUEST' });
    return;
  }
  sendError(res, err);
}
