import type { NextFunction, Request, Response } from 'express';

type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Wraps an async controller so a rejected promise reaches the global error handler.
 * The returned promise settles once the error has been forwarded.
 */
export const asyncHandler =
  (fn: AsyncRouteHandler) =>
  (req: Request, res: Response, next: NextFunction): Promise<void> =>
    fn(req, res, next).then(
      () => undefined,
      (err: unknown) => next(err)
    );
