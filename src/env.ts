import { z } from 'zod';
import { ROLE_CHANGE_POLICIES, formatIssues, type AccessControlConfig } from './config.js';
import { ErrorCode } from './codes.js';
import { AccessControlError } from './errors.js';

const envSchema = z.object({
  AUTH_SALT: z.string().min(1),
  SESSION_TIMEOUT_SECONDS: z.coerce.number().int().positive().optional(),
  MAX_LOGIN_ATTEMPTS: z.coerce.number().int().min(1).max(10).optional(),
  LOCKOUT_DURATION_SECONDS: z.coerce.number().int().positive().optional(),
  FAILURE_WINDOW_SECONDS: z.coerce.number().int().positive().optional(),
  ROLE_CHANGE_POLICY: z.enum(ROLE_CHANGE_POLICIES).optional(),
});

export type EnvSettings = Pick<
  AccessControlConfig,
  | 'salt'
  | 'sessionTimeoutSeconds'
  | 'maxLoginAttempts'
  | 'lockoutDurationSeconds'
  | 'failureWindowSeconds'
  | 'roleChangePolicy'
>;

/**
 * Reads the scalar settings from environment variables. Unset variables
 * are left out so `resolveConfig` applies its defaults.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new AccessControlError(
      ErrorCode.VALIDATION_ERROR,
      `Invalid environment variables: ${formatIssues(result.error)}`,
      result.error.issues,
    );
  }

  const vars = result.data;
  return {
    salt: vars.AUTH_SALT,
    ...(vars.SESSION_TIMEOUT_SECONDS !== undefined
      ? { sessionTimeoutSeconds: vars.SESSION_TIMEOUT_SECONDS }
      : {}),
    ...(vars.MAX_LOGIN_ATTEMPTS !== undefined ? { maxLoginAttempts: vars.MAX_LOGIN_ATTEMPTS } : {}),
    ...(vars.LOCKOUT_DURATION_SECONDS !== undefined
      ? { lockoutDurationSeconds: vars.LOCKOUT_DURATION_SECONDS }
      : {}),
    ...(vars.FAILURE_WINDOW_SECONDS !== undefined
      ? { failureWindowSeconds: vars.FAILURE_WINDOW_SECONDS }
      : {}),
    ...(vars.ROLE_CHANGE_POLICY !== undefined ? { roleChangePolicy: vars.ROLE_CHANGE_POLICY } : {}),
  };
}
