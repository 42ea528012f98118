import { ErrorCode } from '../codes.js';
import { AccessControlError } from '../errors.js';
import type { LockoutRecord } from './identity-types.js';

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_LOCKOUT_DURATION_MS = 5 * 60 * 1000; // 5 minutes
const DEFAULT_FAILURE_WINDOW_MS = 15 * 60 * 1000; // 15 minutes

export interface LockoutOptions {
  /** Consecutive failures that trigger a lockout. Default: 3. */
  readonly maxAttempts?: number;
  /** How long a lockout lasts. Default: 5 minutes. */
  readonly lockoutDurationMs?: number;
  /** Failures older than this are forgotten when no lock is set. Default: 15 minutes. */
  readonly failureWindowMs?: number;
  readonly now?: () => number;
}

export interface FailureOutcome {
  readonly count: number;
  /** True only for the failure that crossed the threshold. */
  readonly lockedNow: boolean;
  readonly lockedUntil: number | null;
}

export interface LockStatus {
  readonly locked: boolean;
  readonly retryAfterMs: number;
}

const UNLOCKED: LockStatus = { locked: false, retryAfterMs: 0 };

// ── LockoutTracker ───────────────────────────────────────────────
//
// Every method is one synchronous read-modify-write of a single map entry,
// so concurrent callers for the same username cannot lose an increment.

export class LockoutTracker {
  readonly #maxAttempts: number;
  readonly #lockoutDurationMs: number;
  readonly #failureWindowMs: number;
  readonly #now: () => number;
  readonly #records = new Map<string, LockoutRecord>();

  constructor(options?: LockoutOptions) {
    this.#maxAttempts = options?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.#lockoutDurationMs = options?.lockoutDurationMs ?? DEFAULT_LOCKOUT_DURATION_MS;
    this.#failureWindowMs = options?.failureWindowMs ?? DEFAULT_FAILURE_WINDOW_MS;
    this.#now = options?.now ?? Date.now;
  }

  get maxAttempts(): number {
    return this.#maxAttempts;
  }

  get lockoutDurationMs(): number {
    return this.#lockoutDurationMs;
  }

  /** Current lock state. Expired locks and stale windows are cleaned up here. */
  isLocked(username: string): LockStatus {
    const now = this.#now();
    const record = this.#live(username, now);
    if (record === undefined || record.lockedUntil === null) return UNLOCKED;
    return { locked: true, retryAfterMs: record.lockedUntil - now };
  }

  /** Throws ACCOUNT_LOCKED while the username is locked out. */
  check(username: string): void {
    const status = this.isLocked(username);
    if (!status.locked) return;

    throw new AccessControlError(
      ErrorCode.ACCOUNT_LOCKED,
      'Account temporarily locked due to too many failed attempts. Try again later.',
      { retryAfterMs: status.retryAfterMs },
    );
  }

  /** Record a failed login attempt for the given username. */
  recordFailure(username: string): FailureOutcome {
    const now = this.#now();
    const record = this.#live(username, now);

    const count = (record?.count ?? 0) + 1;
    const alreadyLocked = record !== undefined && record.lockedUntil !== null;
    const lockedNow = !alreadyLocked && count >= this.#maxAttempts;
    const lockedUntil = lockedNow
      ? now + this.#lockoutDurationMs
      : (record?.lockedUntil ?? null);

    this.#records.set(username, {
      count,
      firstFailureAt: record?.firstFailureAt ?? now,
      lockedUntil,
    });

    return { count, lockedNow, lockedUntil };
  }

  /** Reset the counter for a username (after a successful login). */
  reset(username: string): void {
    this.#records.delete(username);
  }

  get(username: string): LockoutRecord | undefined {
    return this.#live(username, this.#now());
  }

  /** Number of usernames with a live record. */
  get size(): number {
    return this.#records.size;
  }

  #live(username: string, now: number): LockoutRecord | undefined {
    const record = this.#records.get(username);
    if (record === undefined) return undefined;

    const expired =
      record.lockedUntil !== null
        ? record.lockedUntil <= now
        : now - record.firstFailureAt > this.#failureWindowMs;

    if (expired) {
      this.#records.delete(username);
      return undefined;
    }
    return record;
  }
}
