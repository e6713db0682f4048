import { ErrorCodes } from '../errors';
import { CoreError } from './core.error';
import { normalizeDetails } from './details';

export class RouteNotFoundError extends CoreError {
  constructor(method: string, path: string) {
    super('The requested resource was not found.', ErrorCodes.NOT_FOUND, `${method.toUpperCase()} ${path}`);
  }
}

export class InvalidRequestError extends CoreError {
  constructor(details: Error | string) {
    super('The request could not be processed.', ErrorCodes.INVALID_REQUEST, normalizeDetails(details));
  }
}

export class RateLimitedError extends CoreError {
  constructor() {
    super('Too many requests.', ErrorCodes.RATE_LIMITED);
  }
}
