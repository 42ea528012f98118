import { z } from 'zod';
import type { Logger } from 'pino';
import type { RoleDefinition } from './auth/permission-catalog.js';
import type { AuditConfig } from './audit/audit-types.js';
import { ErrorCode } from './codes.js';
import { AccessControlError } from './errors.js';

export type { AuditEntry, AuditConfig, AuditQuery, AuditSink } from './audit/audit-types.js';

// ── Policies ──────────────────────────────────────────────────────

export const ROLE_CHANGE_POLICIES = ['retain-sessions', 'revoke-sessions'] as const;

/**
 * What happens to a user's live sessions when an administrator changes
 * their role. `retain-sessions` keeps the role snapshot until the session
 * ends; `revoke-sessions` forces a new login.
 */
export type RoleChangePolicy = (typeof ROLE_CHANGE_POLICIES)[number];

// ── Defaults ──────────────────────────────────────────────────────

export const DEFAULT_SESSION_TIMEOUT_SECONDS = 3600;
export const DEFAULT_MAX_LOGIN_ATTEMPTS = 3;
export const DEFAULT_LOCKOUT_DURATION_SECONDS = 300;
export const DEFAULT_FAILURE_WINDOW_SECONDS = 900;
export const DEFAULT_ROLE_CHANGE_POLICY: RoleChangePolicy = 'retain-sessions';

// ── Config (user-facing) ──────────────────────────────────────────

export interface AccessControlConfig {
  /** Deployment-wide salt mixed into every password hash. */
  readonly salt: string;

  /** Idle session timeout. Default: 3600. */
  readonly sessionTimeoutSeconds?: number;

  /** Consecutive failed logins that lock a username. Default: 3. */
  readonly maxLoginAttempts?: number;

  /** How long a lockout lasts. Default: 300. */
  readonly lockoutDurationSeconds?: number;

  /** Failures older than this are forgotten when no lock was set. Default: 900. */
  readonly failureWindowSeconds?: number;

  /** Session handling on role change. Default: 'retain-sessions'. */
  readonly roleChangePolicy?: RoleChangePolicy;

  /** Roles added to the default admin/manager/viewer catalog. */
  readonly customRoles?: readonly RoleDefinition[];

  /** Audit sink and in-memory log settings. */
  readonly audit?: AuditConfig;

  /** Base logger. Default: a pino logger named after the package. */
  readonly logger?: Logger;

  /** Clock in epoch milliseconds. Default: Date.now. */
  readonly now?: () => number;
}

// ── Validation ────────────────────────────────────────────────────

const settingsSchema = z.object({
  salt: z.string().min(1, 'salt must not be empty'),
  sessionTimeoutSeconds: z.number().int().positive().default(DEFAULT_SESSION_TIMEOUT_SECONDS),
  maxLoginAttempts: z.number().int().min(1).max(10).default(DEFAULT_MAX_LOGIN_ATTEMPTS),
  lockoutDurationSeconds: z.number().int().positive().default(DEFAULT_LOCKOUT_DURATION_SECONDS),
  failureWindowSeconds: z.number().int().positive().default(DEFAULT_FAILURE_WINDOW_SECONDS),
  roleChangePolicy: z.enum(ROLE_CHANGE_POLICIES).default(DEFAULT_ROLE_CHANGE_POLICY),
});

// ── Resolved Config (all defaults applied) ────────────────────────

export interface ResolvedConfig {
  readonly salt: string;
  readonly sessionTimeoutMs: number;
  readonly maxLoginAttempts: number;
  readonly lockoutDurationMs: number;
  readonly failureWindowMs: number;
  readonly roleChangePolicy: RoleChangePolicy;
  readonly customRoles: readonly RoleDefinition[];
  readonly audit: AuditConfig;
  readonly logger: Logger | null;
  readonly now: () => number;
}

// ── Resolve ───────────────────────────────────────────────────────

/** Applies defaults and converts seconds to milliseconds. Throws VALIDATION_ERROR. */
export function resolveConfig(config: AccessControlConfig): ResolvedConfig {
  const parsed = settingsSchema.safeParse({
    salt: config.salt,
    sessionTimeoutSeconds: config.sessionTimeoutSeconds,
    maxLoginAttempts: config.maxLoginAttempts,
    lockoutDurationSeconds: config.lockoutDurationSeconds,
    failureWindowSeconds: config.failureWindowSeconds,
    roleChangePolicy: config.roleChangePolicy,
  });

  if (!parsed.success) {
    throw new AccessControlError(
      ErrorCode.VALIDATION_ERROR,
      `Invalid access-control configuration: ${formatIssues(parsed.error)}`,
      parsed.error.issues,
    );
  }

  const settings = parsed.data;

  return {
    salt: settings.salt,
    sessionTimeoutMs: settings.sessionTimeoutSeconds * 1000,
    maxLoginAttempts: settings.maxLoginAttempts,
    lockoutDurationMs: settings.lockoutDurationSeconds * 1000,
    failureWindowMs: settings.failureWindowSeconds * 1000,
    roleChangePolicy: settings.roleChangePolicy,
    customRoles: config.customRoles ?? [],
    audit: config.audit ?? {},
    logger: config.logger ?? null,
    now: config.now ?? Date.now,
  };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
