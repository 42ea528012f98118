import type { ErrorCode } from './codes.js';

export class AccessControlError extends Error {
  readonly code: ErrorCode;
  readonly details: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AccessControlError';
    this.code = code;
    this.details = details;
  }
}

/** Details attached to an ACCOUNT_LOCKED error. */
export interface AccountLockedDetails {
  readonly retryAfterMs: number;
}

export function isAccessControlError(
  error: unknown,
  code?: ErrorCode,
): error is AccessControlError {
  return (
    error instanceof AccessControlError &&
    (code === undefined || error.code === code)
  );
}
