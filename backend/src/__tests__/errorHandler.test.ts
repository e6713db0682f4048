import request from 'supertest';
import express from 'express';
import { ErrorCodes } from '../errors';
import { ClientInitializationError, CoreError } from '../exceptions';
import { errorHandler, notFoundHandler, toCoreError, toErrorPayload } from '../middleware/errorHandler';

class QuotaExceededError extends CoreError {
  constructor(details: string) {
    super('Quota exceeded.', ErrorCodes.RATE_LIMITED, details);
  }
}

function makeApp(opts = { exposeDetails: true, maxDetailsLength: 2000 }) {
  const app = express();
  app.get('/client', () => {
    throw new ClientInitializationError(new Error('connection refused'));
  });
  app.get('/quota', () => {
    throw new QuotaExceededError('daily limit');
  });
  app.get('/unknown', () => {
    throw new TypeError('x is not a function');
  });
  app.get('/async', (_req, _res, next) => {
    Promise.reject(new ClientInitializationError('late')).catch(next);
  });
  app.use(notFoundHandler);
  app.use(errorHandler(opts));
  return app;
}

describe('error rendering boundary', () => {
  test('renders ClientInitializationError as 503', async () => {
    const res = await request(makeApp()).get('/client');
    expect(res.status).toBe(503);
    expect(res.body).toEqual({
      code: 'CLIENT_INITIALIZATION_ERROR',
      message: 'The client initialization failed.',
      details: 'Error: connection refused',
    });
  });

  test('renders variants it has never seen from the base fields', async () => {
    const res = await request(makeApp()).get('/quota');
    expect(res.status).toBe(429);
    expect(res.body).toEqual({ code: 'RATE_LIMITED', message: 'Quota exceeded.', details: 'daily limit' });
  });

  test('wraps foreign errors as SERVER_ERROR', async () => {
    const res = await request(makeApp()).get('/unknown');
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ code: 'SERVER_ERROR', message: 'Internal server error', details: 'TypeError: x is not a function' });
  });

  test('handles errors forwarded with next()', async () => {
    const res = await request(makeApp()).get('/async');
    expect(res.status).toBe(503);
    expect(res.body.details).toBe('late');
  });

  test('unmatched routes become NOT_FOUND', async () => {
    const res = await request(makeApp()).get('/missing');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ code: 'NOT_FOUND', message: 'The requested resource was not found.', details: 'GET /missing' });
  });

  test('omits details when not exposed', async () => {
    const res = await request(makeApp({ exposeDetails: false, maxDetailsLength: 2000 })).get('/client');
    expect(res.status).toBe(503);
    expect(res.body).toEqual({ code: 'CLIENT_INITIALIZATION_ERROR', message: 'The client initialization failed.' });
  });
});

describe('toErrorPayload / toCoreError', () => {
  test('truncates long details', () => {
    const err = new CoreError('m', ErrorCodes.SERVER_ERROR, 'abcdefgh');
    expect(toErrorPayload(err, { exposeDetails: true, maxDetailsLength: 5 })).toEqual({ code: 'SERVER_ERROR', message: 'm', details: 'abcde…' });
    expect(err.details).toBe('abcdefgh');
  });

  test('passes CoreError through untouched', () => {
    const err = new ClientInitializationError('boom');
    expect(toCoreError(err)).toBe(err);
  });

  test('maps body parser failures to INVALID_REQUEST', () => {
    const parseErr = Object.assign(new SyntaxError('Unexpected token b'), { type: 'entity.parse.failed' });
    const err = toCoreError(parseErr);
    expect(err.code).toBe('INVALID_REQUEST');
    expect(err.details).toBe('SyntaxError: Unexpected token b');
  });

  test('wraps non-error throwables', () => {
    const err = toCoreError('plain string');
    expect(err.code).toBe('SERVER_ERROR');
    expect(err.details).toBe('plain string');
  });
});
