import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

// ── Redaction ────────────────────────────────────────────────────
//
// Anything credential-shaped is censored before a log line is written,
// whichever component produced it.

export const redactionPaths = [
  'password',
  'currentPassword',
  'newPassword',
  'passwordHash',
  'passwordSalt',
  'salt',
  'token',
  '*.password',
  '*.passwordHash',
  '*.passwordSalt',
  '*.token',
];

// ── createLogger ─────────────────────────────────────────────────

export function createLogger(options?: { level?: string; name?: string }): Logger {
  const config: LoggerOptions = {
    name: options?.name ?? 'rbac-guard',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    redact: { paths: redactionPaths, censor: '[redacted]' },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: stdTimeFunctions.isoTime,
  };
  return pino(config);
}

/** Child logger tagged with the component that writes through it. */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
