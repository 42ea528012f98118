import { z } from 'zod';
import type { Logger } from 'pino';
import type { PermissionCatalog } from '../auth/permission-catalog.js';
import type { AuditLogger } from '../audit/audit-logger.js';
import type { RoleChangePolicy } from '../config.js';
import { ErrorCode } from '../codes.js';
import { AccessControlError, type AccountLockedDetails } from '../errors.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import type { CredentialStore } from './credential-store.js';
import { toUserAccount } from './credential-store.js';
import type { LockoutTracker } from './lockout-tracker.js';
import type { SessionManager } from './session-manager.js';
import type {
  AccountRecord,
  CreateAccountInput,
  ListAccountsOptions,
  ListAccountsResult,
  UpdateProfileInput,
  UserAccount,
} from './identity-types.js';
import { normalizeUsername, USERNAME_MAX_LENGTH, USERNAME_MIN_LENGTH } from './identity-types.js';
import { generateSalt, hashPassword, verifyPassword } from './password-hasher.js';

const MIN_PASSWORD_LENGTH = 8;
const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 200;

// ── Input validation ─────────────────────────────────────────────

const usernameSchema = z
  .string()
  .min(USERNAME_MIN_LENGTH, `Username must be between ${USERNAME_MIN_LENGTH} and ${USERNAME_MAX_LENGTH} characters`)
  .max(USERNAME_MAX_LENGTH, `Username must be between ${USERNAME_MIN_LENGTH} and ${USERNAME_MAX_LENGTH} characters`);

const passwordSchema = z
  .string()
  .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`);

const profileSchema = z.object({
  fullName: z.string().max(200).optional(),
  email: z.string().email('Email must be a valid address').optional(),
  department: z.string().max(200).optional(),
});

function validate<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join('; ');
    throw new AccessControlError(ErrorCode.VALIDATION_ERROR, message, result.error.issues);
  }
  return result.data;
}

export interface AccountManagerDeps {
  readonly credentials: CredentialStore;
  readonly sessions: SessionManager;
  /** Shared with the authenticator, so wrong current passwords count toward the login lockout. */
  readonly lockout: LockoutTracker;
  readonly catalog: PermissionCatalog;
  readonly audit: AuditLogger;
  readonly salt: string;
  readonly roleChangePolicy: RoleChangePolicy;
  readonly now: () => number;
  readonly logger?: Logger;
}

// ── AccountManager ───────────────────────────────────────────────
//
// Administrative lifecycle of accounts. Accounts are deactivated, never
// deleted, so audit entries keep pointing at a real username. Mutations
// of one username are serialized.

export class AccountManager {
  readonly #deps: AccountManagerDeps;
  readonly #locks = new KeyedMutex();

  constructor(deps: AccountManagerDeps) {
    this.#deps = deps;
  }

  /**
   * Create a new account.
   * Throws VALIDATION_ERROR for invalid input, UNKNOWN_ROLE for a role the
   * catalog does not define, ALREADY_EXISTS for a taken username.
   */
  async createAccount(input: CreateAccountInput, actor: string | null = null): Promise<UserAccount> {
    const username = validate(usernameSchema, normalizeUsername(input.username));
    const password = validate(passwordSchema, input.password);
    const profile = validate(profileSchema, {
      fullName: input.fullName,
      email: input.email,
      department: input.department,
    });
    this.#requireRole(input.role);

    return this.#locks.run(username, async () => {
      const existing = await this.#deps.credentials.findByUsername(username);
      if (existing !== undefined) {
        throw new AccessControlError(ErrorCode.ALREADY_EXISTS, `User "${username}" already exists`);
      }

      const now = this.#deps.now();
      const passwordSalt = generateSalt();
      const passwordHash = await hashPassword(password, passwordSalt, this.#deps.salt);

      const record = await this.#deps.credentials.insert({
        username,
        passwordHash,
        passwordSalt,
        role: input.role,
        active: input.active ?? true,
        ...profile,
        createdAt: now,
        updatedAt: now,
        passwordChangedAt: now,
      });

      this.#deps.audit.record({
        username: actor,
        action: 'account_created',
        detail: `created "${username}" with role ${input.role}`,
      });
      return toUserAccount(record);
    });
  }

  /** Creates the accounts that do not exist yet; existing ones are left as they are. */
  async ensureAccounts(inputs: readonly CreateAccountInput[]): Promise<UserAccount[]> {
    const accounts: UserAccount[] = [];
    for (const input of inputs) {
      const existing = await this.#deps.credentials.findByUsername(normalizeUsername(input.username));
      accounts.push(existing !== undefined ? toUserAccount(existing) : await this.createAccount(input));
    }
    return accounts;
  }

  /** Throws NOT_FOUND if the account does not exist. */
  async getAccount(username: string): Promise<UserAccount> {
    return toUserAccount(await this.#require(normalizeUsername(username)));
  }

  async listAccounts(options?: ListAccountsOptions): Promise<ListAccountsResult> {
    const page = Math.max(1, options?.page ?? 1);
    const pageSize = Math.min(MAX_PAGE_SIZE, Math.max(1, options?.pageSize ?? DEFAULT_PAGE_SIZE));

    const matching = (await this.#deps.credentials.all())
      .filter((a) => options?.role === undefined || a.role === options.role)
      .filter((a) => options?.active === undefined || a.active === options.active)
      .sort((a, b) => a.username.localeCompare(b.username));

    const start = (page - 1) * pageSize;
    return {
      accounts: matching.slice(start, start + pageSize).map(toUserAccount),
      total: matching.length,
      page,
      pageSize,
    };
  }

  async updateProfile(
    username: string,
    updates: UpdateProfileInput,
    actor: string | null = null,
  ): Promise<UserAccount> {
    const profile = validate(profileSchema, updates);

    return this.#mutate(username, async (account) => {
      if (Object.values(profile).every((v) => v === undefined)) return account;

      const updated = await this.#deps.credentials.update(account.id, {
        ...profile,
        updatedAt: this.#deps.now(),
      });
      this.#deps.audit.record({
        username: actor,
        action: 'account_updated',
        detail: `updated profile of "${account.username}"`,
      });
      return updated;
    });
  }

  /**
   * Change the account's role. Live sessions keep their role snapshot
   * unless the policy is `revoke-sessions`.
   */
  async changeRole(username: string, role: string, actor: string | null = null): Promise<UserAccount> {
    this.#requireRole(role);

    return this.#mutate(username, async (account) => {
      if (account.role === role) return account;

      const updated = await this.#deps.credentials.update(account.id, {
        role,
        updatedAt: this.#deps.now(),
      });

      let detail = `changed role of "${account.username}" from ${account.role} to ${role}`;
      if (this.#deps.roleChangePolicy === 'revoke-sessions') {
        const revoked = await this.#deps.sessions.invalidateUserSessions(account.username);
        detail += `; ${revoked} session(s) revoked`;
      }

      this.#deps.audit.record({ username: actor, role, action: 'role_changed', detail });
      return updated;
    });
  }

  /** Deactivate the account and revoke all of its sessions. */
  async deactivate(username: string, actor: string | null = null): Promise<UserAccount> {
    return this.#mutate(username, async (account) => {
      const updated = account.active
        ? await this.#deps.credentials.update(account.id, {
            active: false,
            updatedAt: this.#deps.now(),
          })
        : account;
      const revoked = await this.#deps.sessions.invalidateUserSessions(account.username);

      this.#deps.audit.record({
        username: actor,
        action: 'account_deactivated',
        detail: `deactivated "${account.username}"; ${revoked} session(s) revoked`,
      });
      return updated;
    });
  }

  async reactivate(username: string, actor: string | null = null): Promise<UserAccount> {
    return this.#mutate(username, async (account) => {
      if (account.active) return account;

      const updated = await this.#deps.credentials.update(account.id, {
        active: true,
        updatedAt: this.#deps.now(),
      });
      this.#deps.audit.record({
        username: actor,
        action: 'account_reactivated',
        detail: `reactivated "${account.username}"`,
      });
      return updated;
    });
  }

  /**
   * Change a password after verifying the current one. Revokes every
   * session of the user.
   *
   * A wrong current password counts as a failed login attempt. Throws
   * ACCOUNT_LOCKED while the username is locked and INVALID_CREDENTIALS if
   * the current password is wrong.
   */
  async changePassword(username: string, currentPassword: string, newPassword: string): Promise<void> {
    const password = validate(passwordSchema, newPassword);

    await this.#mutate(username, async (account) => {
      this.#refuseIfLocked(account.username);

      const valid = await verifyPassword(
        currentPassword,
        account.passwordSalt,
        this.#deps.salt,
        account.passwordHash,
      );
      if (!valid) {
        this.#recordWrongPassword(account);
        throw new AccessControlError(ErrorCode.INVALID_CREDENTIALS, 'Current password is incorrect');
      }

      this.#refuseIfLocked(account.username);
      this.#deps.lockout.reset(account.username);

      const updated = await this.#storePassword(account, password);
      this.#deps.audit.record({
        username: account.username,
        role: account.role,
        action: 'password_changed',
        detail: 'password changed by owner',
      });
      return updated;
    });
  }

  /** Administrative password reset, no current password needed. Revokes every session. */
  async resetPassword(username: string, newPassword: string, actor: string | null = null): Promise<void> {
    const password = validate(passwordSchema, newPassword);

    await this.#mutate(username, async (account) => {
      const updated = await this.#storePassword(account, password);
      this.#deps.audit.record({
        username: actor,
        action: 'password_changed',
        detail: `password of "${account.username}" reset`,
      });
      return updated;
    });
  }

  // ── Internals ──────────────────────────────────────────────────

  async #storePassword(account: AccountRecord, password: string): Promise<AccountRecord> {
    const now = this.#deps.now();
    const passwordSalt = generateSalt();
    const passwordHash = await hashPassword(password, passwordSalt, this.#deps.salt);

    const updated = await this.#deps.credentials.update(account.id, {
      passwordHash,
      passwordSalt,
      passwordChangedAt: now,
      updatedAt: now,
    });
    await this.#deps.sessions.invalidateUserSessions(account.username);
    return updated;
  }

  #refuseIfLocked(username: string): void {
    const lock = this.#deps.lockout.isLocked(username);
    if (!lock.locked) return;

    this.#deps.audit.record({
      username,
      action: 'login_failure',
      detail: 'password change refused: account locked',
    });
    const details: AccountLockedDetails = { retryAfterMs: lock.retryAfterMs };
    throw new AccessControlError(
      ErrorCode.ACCOUNT_LOCKED,
      'Account temporarily locked due to too many failed attempts. Try again later.',
      details,
    );
  }

  #recordWrongPassword(account: AccountRecord): void {
    const outcome = this.#deps.lockout.recordFailure(account.username);

    if (outcome.lockedNow) {
      this.#deps.audit.record({
        username: account.username,
        role: account.role,
        action: 'lockout_triggered',
        detail: `locked after ${outcome.count} failed attempts`,
      });
      this.#deps.logger?.warn({ username: account.username, lockedUntil: outcome.lockedUntil }, 'account locked');
      return;
    }

    this.#deps.audit.record({
      username: account.username,
      role: account.role,
      action: 'login_failure',
      detail: 'wrong current password on password change',
    });
  }

  async #mutate(
    username: string,
    change: (account: AccountRecord) => Promise<AccountRecord>,
  ): Promise<UserAccount> {
    const name = normalizeUsername(username);
    return this.#locks.run(name, async () => toUserAccount(await change(await this.#require(name))));
  }

  async #require(username: string): Promise<AccountRecord> {
    const account = await this.#deps.credentials.findByUsername(username);
    if (account === undefined) {
      throw new AccessControlError(ErrorCode.NOT_FOUND, `User "${username}" not found`);
    }
    return account;
  }

  #requireRole(role: string): void {
    if (!this.#deps.catalog.has(role)) {
      throw new AccessControlError(ErrorCode.UNKNOWN_ROLE, `Role "${role}" is not defined`);
    }
  }
}
