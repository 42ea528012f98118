import type { Store } from '@hamicek/noex-store';
import type { Logger } from 'pino';
import type { AccessControlConfig, ResolvedConfig } from './config.js';
import { resolveConfig } from './config.js';
import { ErrorCode } from './codes.js';
import { isAccessControlError } from './errors.js';
import { createLogger, componentLogger } from './logger.js';
import { PermissionCatalog } from './auth/permission-catalog.js';
import { PermissionEngine, type AuthorizationDecision } from './auth/permission-engine.js';
import { RedactionFilter } from './redaction/redaction-filter.js';
import type { DataRecord, RecordSchema } from './redaction/redaction-types.js';
import { AuditLogger } from './audit/audit-logger.js';
import type { AuditEntry, AuditQuery } from './audit/audit-types.js';
import { ensureSystemBuckets } from './identity/system-buckets.js';
import { CredentialStore } from './identity/credential-store.js';
import { LockoutTracker } from './identity/lockout-tracker.js';
import { SessionManager, type ExpiredSessionDetails } from './identity/session-manager.js';
import { Authenticator } from './identity/authenticator.js';
import { AccountManager } from './identity/account-manager.js';
import type { Session } from './identity/identity-types.js';

// ── Request / Result ─────────────────────────────────────────────

export interface AccessRequest {
  readonly operation: string;
  readonly category: string;
  readonly records: readonly DataRecord[];
  readonly schema: RecordSchema;
}

export type AccessResult =
  | { readonly allowed: true; readonly session: Session; readonly records: Record<string, unknown>[] }
  | { readonly allowed: false; readonly session: Session; readonly reason: string };

// ── AccessControl ────────────────────────────────────────────────
//
// Entry point for the surrounding application:
//
//   login ─▶ validateSession ─▶ authorize ─▶ redact ─▶ audit
//
// `accessRecords` runs that whole pipeline for one request.

export class AccessControl {
  readonly #config: ResolvedConfig;
  readonly #log: Logger;
  readonly #engine: PermissionEngine;
  readonly #redaction: RedactionFilter;
  readonly #audit: AuditLogger;
  readonly #sessions: SessionManager;
  readonly #authenticator: Authenticator;
  readonly #accounts: AccountManager;

  private constructor(store: Store, config: ResolvedConfig, audit: AuditLogger, log: Logger) {
    this.#config = config;
    this.#log = log;
    this.#audit = audit;

    const catalog = PermissionCatalog.create(config.customRoles);
    this.#engine = new PermissionEngine(catalog);
    this.#redaction = new RedactionFilter(this.#engine);

    const credentials = new CredentialStore(store);
    this.#sessions = new SessionManager(store, {
      timeoutMs: config.sessionTimeoutMs,
      now: config.now,
      logger: componentLogger(log, 'sessions'),
    });
    const lockout = new LockoutTracker({
      maxAttempts: config.maxLoginAttempts,
      lockoutDurationMs: config.lockoutDurationMs,
      failureWindowMs: config.failureWindowMs,
      now: config.now,
    });

    this.#authenticator = new Authenticator({
      credentials,
      lockout,
      sessions: this.#sessions,
      audit,
      salt: config.salt,
      logger: componentLogger(log, 'authenticator'),
    });
    this.#accounts = new AccountManager({
      credentials,
      sessions: this.#sessions,
      lockout,
      catalog,
      audit,
      salt: config.salt,
      roleChangePolicy: config.roleChangePolicy,
      now: config.now,
      logger: componentLogger(log, 'accounts'),
    });
  }

  /**
   * Creates and initializes the access-control core.
   *
   * 1. Validates the configuration.
   * 2. Creates the account and session buckets (idempotent).
   * 3. Starts the audit logger and its sink dispatcher.
   */
  static async start(store: Store, config: AccessControlConfig): Promise<AccessControl> {
    const resolved = resolveConfig(config);
    const log = resolved.logger ?? createLogger();

    await ensureSystemBuckets(store);
    const audit = await AuditLogger.start({
      ...resolved.audit,
      now: resolved.now,
      logger: componentLogger(log, 'audit'),
    });

    return new AccessControl(store, resolved, audit, log);
  }

  /** Flushes pending audit entries and stops the sink dispatcher. */
  async stop(): Promise<void> {
    await this.#audit.stop();
  }

  get accounts(): AccountManager {
    return this.#accounts;
  }

  get catalog(): PermissionCatalog {
    return this.#engine.catalog;
  }

  get config(): ResolvedConfig {
    return this.#config;
  }

  // ── Authentication ─────────────────────────────────────────────

  /** Throws INVALID_CREDENTIALS or ACCOUNT_LOCKED. */
  async login(username: string, password: string): Promise<Session> {
    return this.#authenticator.authenticate(username, password);
  }

  /** Throws SESSION_NOT_FOUND or SESSION_EXPIRED; both mean "log in again". */
  async validateSession(token: string): Promise<Session> {
    try {
      return await this.#sessions.validate(token);
    } catch (error) {
      if (isAccessControlError(error, ErrorCode.SESSION_EXPIRED)) {
        const details = expiredDetails(error.details);
        this.#audit.record({
          username: details?.username ?? null,
          role: details?.role ?? null,
          action: 'session_expired',
          detail: 'session expired after inactivity',
        });
      }
      throw error;
    }
  }

  /** Idempotent. Takes effect for calls made after it returns. */
  async logout(token: string): Promise<void> {
    const session = await this.#sessions.invalidate(token);
    if (session === null) return;

    this.#audit.record({
      username: session.username,
      role: session.role,
      action: 'logout',
      detail: 'session revoked by user',
    });
  }

  // ── Authorization & redaction ──────────────────────────────────

  authorize(role: string, operation: string, category: string): boolean {
    return this.#engine.authorize(role, operation, category).allowed;
  }

  /** Full decision including the denial reason. */
  decide(role: string, operation: string, category: string): AuthorizationDecision {
    return this.#engine.authorize(role, operation, category);
  }

  canAccessReport(role: string, report: string): boolean {
    return this.#engine.canAccessReport(role, report);
  }

  redact(record: DataRecord, schema: RecordSchema, role: string): Record<string, unknown> {
    return this.#redaction.filter(record, schema, role);
  }

  /**
   * Validates the session, authorizes the request against the session's
   * role snapshot, redacts the records and audits the outcome. A denial is
   * returned, not thrown; session errors are thrown.
   */
  async accessRecords(token: string, request: AccessRequest): Promise<AccessResult> {
    const session = await this.validateSession(token);
    const { operation, category } = request;
    const decision = this.#engine.authorize(session.role, operation, category);

    if (!decision.allowed) {
      this.#audit.record({
        username: session.username,
        role: session.role,
        action: 'permission_denied',
        category,
        detail: `${operation}: ${decision.reason}`,
      });
      return { allowed: false, session, reason: decision.reason };
    }

    const records = this.#redaction.filterMany(request.records, request.schema, session.role);
    const masked = this.#redaction.maskedFields(request.schema, session.role);

    this.#audit.record({
      username: session.username,
      role: session.role,
      action: 'data_access',
      category,
      detail:
        `${operation}: accessed ${records.length} records` +
        (masked.length > 0 ? `; masked ${masked.join(', ')}` : ''),
    });

    return { allowed: true, session, records };
  }

  /** Records a denial the surrounding application decided on its own. */
  recordDenied(session: Session, operation: string, category: string, reason: string): void {
    this.#audit.record({
      username: session.username,
      role: session.role,
      action: 'permission_denied',
      category,
      detail: `${operation}: ${reason}`,
    });
  }

  // ── Audit ──────────────────────────────────────────────────────

  /** Newest first. */
  listAuditEntries(filter?: AuditQuery): AuditEntry[] {
    return this.#audit.query(filter);
  }

  /** Resolves to the number of entries the sink has not acknowledged yet. */
  async flushAudit(): Promise<number> {
    const pending = await this.#audit.flush();
    if (pending > 0) this.#log.warn({ pending }, 'audit entries awaiting redelivery');
    return pending;
  }
}

function expiredDetails(details: unknown): ExpiredSessionDetails | null {
  if (typeof details !== 'object' || details === null) return null;
  if (!('username' in details) || !('role' in details)) return null;
  const { username, role } = details;
  if (typeof username !== 'string' || typeof role !== 'string') return null;
  return { username, role };
}
