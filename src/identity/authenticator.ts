import type { Logger } from 'pino';
import { ErrorCode } from '../codes.js';
import { AccessControlError, type AccountLockedDetails } from '../errors.js';
import type { AuditLogger } from '../audit/audit-logger.js';
import type { CredentialStore } from './credential-store.js';
import type { LockoutTracker } from './lockout-tracker.js';
import type { SessionManager } from './session-manager.js';
import type { AccountRecord, Session } from './identity-types.js';
import { normalizeUsername } from './identity-types.js';
import { verifyPassword } from './password-hasher.js';

// Verified against when the username is unknown or inactive, so a miss costs
// the same scrypt round as a wrong password.
const DUMMY_SALT = Buffer.alloc(16).toString('base64');
const DUMMY_HASH = `$scrypt$16384$8$1$${Buffer.alloc(64).toString('base64')}`;

export interface AuthenticatorDeps {
  readonly credentials: CredentialStore;
  readonly lockout: LockoutTracker;
  readonly sessions: SessionManager;
  readonly audit: AuditLogger;
  /** Deployment-wide salt. */
  readonly salt: string;
  readonly logger?: Logger;
}

// ── Authenticator ────────────────────────────────────────────────

export class Authenticator {
  readonly #deps: AuthenticatorDeps;

  constructor(deps: AuthenticatorDeps) {
    this.#deps = deps;
  }

  /**
   * Authenticate with username and password.
   *
   * 1. Refuse locked usernames without reading the credential store.
   * 2. Look up the account and verify the password.
   * 3. On failure, count it (possibly triggering a lockout).
   * 4. On success, reset the counter and issue a session.
   *
   * Each call writes exactly one audit entry.
   */
  async authenticate(username: string, password: string): Promise<Session> {
    const { credentials, lockout } = this.#deps;
    const name = normalizeUsername(username);

    this.#refuseIfLocked(name);

    const account = await credentials.findByUsername(name);
    const valid = await this.#verify(account, password);

    if (account === undefined || !account.active || !valid) {
      this.#recordFailure(name);
      throw new AccessControlError(ErrorCode.INVALID_CREDENTIALS, 'Invalid credentials');
    }

    // A concurrent failure may have locked the account while we were hashing.
    this.#refuseIfLocked(name);
    lockout.reset(name);

    return this.#issueSession(account);
  }

  async #issueSession(account: AccountRecord): Promise<Session> {
    const { sessions, audit } = this.#deps;

    let session: Session;
    try {
      session = await sessions.create(account.username, account.role);
    } catch (error) {
      audit.record({
        username: account.username,
        role: account.role,
        action: 'login_failure',
        detail: 'session store unavailable',
      });
      this.#deps.logger?.error({ err: error, username: account.username }, 'session could not be issued');
      throw error;
    }

    audit.record({
      username: account.username,
      role: account.role,
      action: 'login_success',
      detail: 'session issued',
    });
    this.#deps.logger?.info({ username: account.username, role: account.role }, 'login');

    return session;
  }

  #refuseIfLocked(username: string): void {
    const lock = this.#deps.lockout.isLocked(username);
    if (!lock.locked) return;

    this.#deps.audit.record({ username, action: 'login_failure', detail: 'account locked' });
    const details: AccountLockedDetails = { retryAfterMs: lock.retryAfterMs };
    throw new AccessControlError(
      ErrorCode.ACCOUNT_LOCKED,
      'Account temporarily locked due to too many failed attempts. Try again later.',
      details,
    );
  }

  async #verify(account: AccountRecord | undefined, password: string): Promise<boolean> {
    if (account === undefined || !account.active) {
      await verifyPassword(password, DUMMY_SALT, this.#deps.salt, DUMMY_HASH);
      return false;
    }
    return verifyPassword(password, account.passwordSalt, this.#deps.salt, account.passwordHash);
  }

  #recordFailure(username: string): void {
    const { lockout, audit } = this.#deps;
    const outcome = lockout.recordFailure(username);

    if (outcome.lockedNow) {
      audit.record({
        username,
        action: 'lockout_triggered',
        detail: `locked after ${outcome.count} failed attempts`,
      });
      this.#deps.logger?.warn({ username, lockedUntil: outcome.lockedUntil }, 'account locked');
      return;
    }

    audit.record({ username, action: 'login_failure', detail: 'invalid credentials' });
  }
}
