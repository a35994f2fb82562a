import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Async handler wrapper for Express route handlers.
 *
 * Express 4 does not await handlers, so a rejected promise would never reach
 * the error middleware. The wrapper forwards the rejection to next().
 *
 * @example
 * router.get('/', asyncHandler(controller.listTodos.bind(controller)));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
