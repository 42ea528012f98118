import type { AccessControlError } from '../errors.js';

// ── Actions ──────────────────────────────────────────────────────

export const AUDIT_ACTIONS = [
  'login_success',
  'login_failure',
  'lockout_triggered',
  'data_access',
  'permission_denied',
  'logout',
  'session_expired',
  'account_created',
  'account_updated',
  'role_changed',
  'account_deactivated',
  'account_reactivated',
  'password_changed',
] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

// ── Audit Entry ──────────────────────────────────────────────────

export interface AuditEntry {
  /** Monotonic sequence number within one logger. */
  readonly id: number;
  readonly timestamp: number;
  readonly username: string | null;
  readonly role: string | null;
  readonly action: AuditAction;
  readonly category: string | null;
  readonly detail: string;
}

/** What a component reports; the logger stamps id and timestamp. */
export interface AuditEvent {
  readonly username: string | null;
  readonly role?: string | null;
  readonly action: AuditAction;
  readonly category?: string | null;
  readonly detail?: string;
}

// ── Audit Sink ───────────────────────────────────────────────────

/**
 * Durable destination for audit entries. `signal` is aborted when the
 * write exceeds the configured timeout.
 */
export interface AuditSink {
  write(entry: AuditEntry, signal: AbortSignal): Promise<void>;
}

// ── Audit Config ─────────────────────────────────────────────────

export interface AuditConfig {
  /** Durable sink. When omitted, entries live only in the in-memory log. */
  readonly sink?: AuditSink;
  /** Per-write timeout for the sink. Default: 2_000 ms. */
  readonly sinkTimeoutMs?: number;
  /** Delay before redelivering after a sink failure. Default: 1_000 ms. */
  readonly retryDelayMs?: number;
  /** Maximum number of entries kept in memory (ring buffer). Default: 10_000. */
  readonly maxEntries?: number;
  /** Operational error channel for sink failures. */
  readonly onSinkError?: (error: AccessControlError) => void;
}

// ── Audit Query ──────────────────────────────────────────────────

export interface AuditQuery {
  readonly username?: string;
  readonly action?: AuditAction;
  readonly category?: string;
  readonly from?: number;
  readonly to?: number;
  readonly limit?: number;
}
