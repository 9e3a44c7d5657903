import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Adapts a route handler that awaits a use case to Express 4, which ignores
 * returned promises: a rejection is passed on to the error handler.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
