import express, { Request, Response, NextFunction } from 'express';
import request from 'supertest';
import { errorHandler, notFoundHandler } from '../../middlewares/errorHandler';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors';

// Mock logger
jest.mock('../../utils/logger', () => ({
  createLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const appThrowing = (error: unknown) => {
  const app = express();
  app.get('/boom', (req: Request, res: Response, next: NextFunction): void => {
    next(error);
  });
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
};

describe('errorHandler', () => {
  it.each([
    [new NotFoundError('Activity not found'), 404, 'Activity not found'],
    [new ConflictError('Student is already signed up'), 400, 'Student is already signed up'],
    [new ValidationError("Query parameter 'email' is required"), 422, "Query parameter 'email' is required"],
  ])('maps %p to its status', async (error, status, detail) => {
    const res = await request(appThrowing(error)).get('/boom');

    expect(res.status).toBe(status);
    expect(res.body).toEqual({ detail });
  });

  it('hides unexpected errors behind a 500', async () => {
    const res = await request(appThrowing(new Error('SQLITE_BUSY: database is locked'))).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ detail: 'Internal Server Error' });
  });

  it('answers unmatched routes with 404', async () => {
    const res = await request(appThrowing(new Error('unused'))).get('/missing');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: 'Not Found' });
  });
});
