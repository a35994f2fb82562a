import express from 'express';
import type { IncomingMessage } from 'node:http';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ValidationError } from '../../lib/errors.js';

const BODY_LIMIT = '1mb';

/** Requests whose body carried at least one byte */
const nonEmptyBodies = new WeakSet<IncomingMessage>();

/**
 * Parse the body as JSON whatever the Content-Type says, and reject requests
 * that sent nothing.
 *
 * body-parser skips non-JSON content types and turns an empty body into `{}`;
 * either would let the schema defaults stand in for a missing payload.
 *
 * @example
 * router.post('/', ...jsonBody(), asyncHandler(controller.createTodo.bind(controller)));
 */
export function jsonBody(): RequestHandler[] {
  const parse = express.json({
    limit: BODY_LIMIT,
    type: () => true,
    verify: (req, _res, buf) => {
      if (buf.length > 0) {
        nonEmptyBodies.add(req);
      }
    }
  });

  const requireBody = (req: Request, _res: Response, next: NextFunction) => {
    if (!nonEmptyBodies.has(req)) {
      next(new ValidationError('Request body is empty'));
      return;
    }
    next();
  };

  return [parse, requireBody];
}
