// ── Identity Types ───────────────────────────────────────────────
//
// Records kept in the system buckets (_accounts, _sessions) and the
// public shapes returned from them.

// ── Account ──────────────────────────────────────────────────────

export interface AccountRecord {
  readonly id: string;
  readonly username: string;
  readonly passwordHash: string;
  readonly passwordSalt: string;
  readonly role: string;
  readonly active: boolean;
  readonly fullName?: string;
  readonly email?: string;
  readonly department?: string;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly passwordChangedAt: number;
  readonly _version: number;
  readonly _createdAt: number;
  readonly _updatedAt: number;
}

/** Account as returned by public APIs (hash and salt stripped). */
export interface UserAccount {
  readonly id: string;
  readonly username: string;
  readonly role: string;
  readonly active: boolean;
  readonly fullName?: string;
  readonly email?: string;
  readonly department?: string;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly passwordChangedAt: number;
}

export interface CreateAccountInput {
  readonly username: string;
  readonly password: string;
  readonly role: string;
  readonly fullName?: string;
  readonly email?: string;
  readonly department?: string;
  readonly active?: boolean;
}

export interface UpdateProfileInput {
  readonly fullName?: string;
  readonly email?: string;
  readonly department?: string;
}

export interface ListAccountsOptions {
  readonly role?: string;
  readonly active?: boolean;
  readonly page?: number;
  readonly pageSize?: number;
}

export interface ListAccountsResult {
  readonly accounts: readonly UserAccount[];
  readonly total: number;
  readonly page: number;
  readonly pageSize: number;
}

// ── Session ──────────────────────────────────────────────────────

export interface SessionRecord {
  readonly id: string;
  readonly token: string;
  readonly username: string;
  readonly role: string;
  readonly createdAt: number;
  readonly lastActivityAt: number;
  readonly timeoutMs: number;
  readonly _version: number;
  readonly _createdAt: number;
  readonly _updatedAt: number;
}

export interface Session {
  readonly token: string;
  readonly username: string;
  /** Role at the moment the session was issued. */
  readonly role: string;
  readonly createdAt: number;
  readonly lastActivityAt: number;
  readonly timeoutMs: number;
  readonly expiresAt: number;
}

// ── Lockout ──────────────────────────────────────────────────────

export interface LockoutRecord {
  readonly count: number;
  readonly firstFailureAt: number;
  readonly lockedUntil: number | null;
}

// ── Usernames ────────────────────────────────────────────────────

export const USERNAME_MIN_LENGTH = 3;
export const USERNAME_MAX_LENGTH = 64;

export function normalizeUsername(username: string): string {
  return username.trim().toLowerCase();
}

// ── System Bucket Names ──────────────────────────────────────────

export const SYSTEM_BUCKET_NAMES = ['_accounts', '_sessions'] as const;
export type SystemBucketName = (typeof SYSTEM_BUCKET_NAMES)[number];
