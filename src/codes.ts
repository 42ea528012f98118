export const ErrorCode = {
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  ACCOUNT_LOCKED: 'ACCOUNT_LOCKED',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
  SESSION_EXPIRED: 'SESSION_EXPIRED',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  AUDIT_SINK_UNAVAILABLE: 'AUDIT_SINK_UNAVAILABLE',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  NOT_FOUND: 'NOT_FOUND',
  UNKNOWN_ROLE: 'UNKNOWN_ROLE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];
