import type { ErrorCode } from '../errors';

export type CoreErrorJson = {
  code: ErrorCode;
  message: string;
  details?: string;
};

/**
 * Base of every structured failure. Renderers only ever need `code`,
 * `message` and `details`; variants pre-fill these and add nothing else.
 * Instances are frozen, so variants cannot declare fields of their own.
 */
export class CoreError extends Error {
  readonly code: ErrorCode;
  readonly details?: string;

  constructor(message: string, code: ErrorCode, details?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    Object.freeze(this);
  }

  toJSON(): CoreErrorJson {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

export function isCoreError(value: unknown): value is CoreError {
  return value instanceof CoreError;
}
