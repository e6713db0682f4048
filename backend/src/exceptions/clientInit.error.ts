import { ErrorCodes } from '../errors';
import { CoreError } from './core.error';
import { normalizeDetails } from './details';

// Raised when an external client (db, queue, SDK) cannot be brought up.
export class ClientInitializationError extends CoreError {
  constructor(details: Error | string) {
    super('The client initialization failed.', ErrorCodes.CLIENT_INITIALIZATION_ERROR, normalizeDetails(details));
  }
}
