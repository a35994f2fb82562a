import type { NextFunction, Request, Response } from 'express';
import { v4 as uuid } from 'uuid';

/**
 * Echo the caller's x-request-id or mint one, so access logs and error logs
 * for the same request can be correlated.
 */
export function requestContext(req: Request, res: Response, next: NextFunction) {
  const header = req.headers['x-request-id'];
  const requestId = (Array.isArray(header) ? header[0] : header) ?? uuid();
  req.id = requestId;
  res.setHeader('x-request-id', requestId);
  next();
}
