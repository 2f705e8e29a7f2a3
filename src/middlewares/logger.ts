import { Request, Response, NextFunction } from 'express';
import { createLogger } from '../utils/logger';

const log = createLogger('http');

/**
 * Logger middleware for Express
 * Logs every request with method, URL, status code and response time once the response is sent
 */
export const loggerMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const start = Date.now();

  res.on('finish', () => {
    const responseTime = Date.now() - start;
    log.info(`${req.method} ${req.originalUrl || req.url} ${res.statusCode} ${responseTime}ms`);
  });

  next();
};

export default loggerMiddleware;
