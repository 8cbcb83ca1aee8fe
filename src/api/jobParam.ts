import { Request, Response, NextFunction } from 'express';
import { validate as isUuid } from 'uuid';

/**
 * Rejects ids that are not job ids before they reach the file-based store
 */
export function checkJobId(_req: Request, res: Response, next: NextFunction, value: unknown): void {
  if (typeof value !== 'string' || !isUuid(value)) {
    res.status(404).json({ error: 'Job not found' });
    return;
  }
  next();
}
