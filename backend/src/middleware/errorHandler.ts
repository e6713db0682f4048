import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ErrorCodes, httpStatusFor } from '../errors';
import {
  CoreError,
  InvalidRequestError,
  RouteNotFoundError,
  isCoreError,
  normalizeDetails,
  truncateDetails,
  type CoreErrorJson,
} from '../exceptions';
import { errorFields, logger } from '../logger';

export type ErrorPayload = CoreErrorJson & { requestId?: string };

export type ErrorHandlerOptions = {
  exposeDetails: boolean;
  maxDetailsLength: number;
};

/**
 * Renders any CoreError using only its base fields. Never switches on the
 * concrete variant.
 */
export function toErrorPayload(err: CoreError, opts: ErrorHandlerOptions): CoreErrorJson {
  const payload: CoreErrorJson = { code: err.code, message: err.message };
  if (opts.exposeDetails && err.details !== undefined) {
    payload.details = truncateDetails(err.details, opts.maxDetailsLength);
  }
  return payload;
}

function isBodyParseError(err: unknown): err is Error & { type: string } {
  return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';
}

export function toCoreError(err: unknown): CoreError {
  if (isCoreError(err)) return err;
  if (isBodyParseError(err)) return new InvalidRequestError(err);
  return new CoreError('Internal server error', ErrorCodes.SERVER_ERROR, normalizeDetails(err));
}

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new RouteNotFoundError(req.method, req.path));
};

export function errorHandler(opts: ErrorHandlerOptions): ErrorRequestHandler {
  return (err, req, res, next) => {
    if (res.headersSent) return next(err);
    const coreErr = toCoreError(err);
    const status = httpStatusFor(coreErr.code);
    const fields = { ...errorFields(coreErr), status, path: req.path, method: req.method, requestId: req.requestId };
    if (status >= 500) logger.error('http.error', fields);
    else logger.warn('http.error', fields);
    const body: ErrorPayload = toErrorPayload(coreErr, opts);
    if (req.requestId) body.requestId = req.requestId;
    res.status(status).json(body);
  };
}
