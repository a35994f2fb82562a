import type { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { logger } from '../../lib/logger.js';
import { AppError, errorMessage } from '../../lib/errors.js';

/**
 * Status carried by body-parser and http-errors failures (malformed JSON,
 * payload too large), when it is a client error.
 */
function clientStatus(error: Error): number | undefined {
  const status = 'status' in error ? error.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Terminal error middleware.
 *
 * The response carries the triggering error's own message. Nothing is
 * redacted or replaced by a generic text.
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    next(error);
    return;
  }

  let status: number = StatusCodes.INTERNAL_SERVER_ERROR;
  const message = errorMessage(error);

  if (error instanceof AppError) {
    status = error.statusCode;
  } else if (error instanceof Error) {
    status = clientStatus(error) ?? StatusCodes.INTERNAL_SERVER_ERROR;
  }

  if (status >= 500) {
    logger.error({ error, requestId: req.id }, 'Unhandled error');
  } else {
    logger.warn({ error, requestId: req.id }, 'Handled error');
  }

  res.status(status).json({ success: false, error: message });
}
