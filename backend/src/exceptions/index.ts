export { CoreError, isCoreError } from './core.error';
export type { CoreErrorJson } from './core.error';
export { ClientInitializationError } from './clientInit.error';
export { RouteNotFoundError, InvalidRequestError, RateLimitedError } from './http.errors';
export { normalizeDetails, truncateDetails } from './details';
