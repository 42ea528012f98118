// ── Main ─────────────────────────────────────────────────────────

export { AccessControl } from './access-control.js';
export type { AccessRequest, AccessResult } from './access-control.js';

// ── Configuration ────────────────────────────────────────────────

export { resolveConfig, ROLE_CHANGE_POLICIES } from './config.js';
export type {
  AccessControlConfig,
  ResolvedConfig,
  RoleChangePolicy,
  AuditConfig,
  AuditEntry,
  AuditQuery,
  AuditSink,
} from './config.js';
export { loadEnvConfig } from './env.js';
export type { EnvSettings } from './env.js';
export { createLogger } from './logger.js';

// ── Permissions ──────────────────────────────────────────────────

export {
  PermissionCatalog,
  DEFAULT_ROLE_DEFINITIONS,
  OPERATIONS,
  SENSITIVE_CATEGORIES,
  BUILTIN_ROLES,
  ALL_CATEGORIES,
  ALL_REPORTS,
} from './auth/permission-catalog.js';
export type {
  Operation,
  SensitiveCategory,
  Role,
  BuiltinRole,
  RoleDefinition,
  RolePermissions,
} from './auth/permission-catalog.js';
export { PermissionEngine } from './auth/permission-engine.js';
export type { AuthorizationDecision } from './auth/permission-engine.js';

// ── Redaction ────────────────────────────────────────────────────

export { RedactionFilter } from './redaction/redaction-filter.js';
export { REDACTED } from './redaction/redaction-types.js';
export type { DataRecord, RecordSchema } from './redaction/redaction-types.js';

// ── Identity ─────────────────────────────────────────────────────

export { AccountManager } from './identity/account-manager.js';
export { SessionManager } from './identity/session-manager.js';
export { LockoutTracker } from './identity/lockout-tracker.js';
export { normalizeUsername } from './identity/identity-types.js';
export type {
  Session,
  UserAccount,
  CreateAccountInput,
  UpdateProfileInput,
  ListAccountsOptions,
  ListAccountsResult,
  LockoutRecord,
} from './identity/identity-types.js';

// ── Audit ────────────────────────────────────────────────────────

export { AUDIT_ACTIONS } from './audit/audit-types.js';
export type { AuditAction, AuditEvent } from './audit/audit-types.js';

// ── Errors ───────────────────────────────────────────────────────

export { AccessControlError, isAccessControlError } from './errors.js';
export type { AccountLockedDetails } from './errors.js';
export { ErrorCode } from './codes.js';
