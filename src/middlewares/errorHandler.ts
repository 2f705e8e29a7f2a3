import { Request, Response, NextFunction } from 'express';
import { HttpError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('errors');

/**
 * Fallback for routes nobody matched
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({ detail: 'Not Found' });
};

/**
 * Error handling middleware
 * Domain errors carry their own status; anything else is a server fault
 */
export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof HttpError) {
    res.status(err.status).json({ detail: err.detail });
    return;
  }

  log.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
  res.status(500).json({ detail: 'Internal Server Error' });
};

export default errorHandler;
