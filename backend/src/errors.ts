// Central error codes registry. Append-only: never remove or repurpose a code.
export const ErrorCodes = Object.freeze({
  INVALID_REQUEST: 'INVALID_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  RATE_LIMITED: 'RATE_LIMITED',
  SERVER_ERROR: 'SERVER_ERROR',
  CLIENT_INITIALIZATION_ERROR: 'CLIENT_INITIALIZATION_ERROR',
} as const);

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

const HTTP_STATUS: Record<ErrorCode, number> = {
  INVALID_REQUEST: 400,
  NOT_FOUND: 404,
  RATE_LIMITED: 429,
  SERVER_ERROR: 500,
  CLIENT_INITIALIZATION_ERROR: 503,
};

const KNOWN = new Set<string>(Object.values(ErrorCodes));

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && KNOWN.has(value);
}

export function httpStatusFor(code: ErrorCode): number {
  return HTTP_STATUS[code];
}
