import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Error handler wrapper: forwards rejected promises to Express error middleware
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
