import { randomBytes } from 'node:crypto';
import type { Store } from '@hamicek/noex-store';
import type { Logger } from 'pino';
import { ErrorCode } from '../codes.js';
import { AccessControlError } from '../errors.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import type { SessionRecord, Session } from './identity-types.js';

const DEFAULT_SESSION_TIMEOUT_MS = 60 * 60 * 1000; // 1 hour
const TOKEN_BYTES = 32;

export interface SessionManagerOptions {
  /** Idle timeout; a session expires this long after its last activity. Default: 1 hour. */
  readonly timeoutMs?: number;
  readonly now?: () => number;
  readonly logger?: Logger;
}

/** Details attached to a SESSION_EXPIRED error. */
export interface ExpiredSessionDetails {
  readonly username: string;
  readonly role: string;
}

// ── SessionManager ──────────────────────────────────────────────
//
//   Active ──validate──▶ Active (last activity refreshed)
//   Active ──idle ≥ timeout──▶ Expired (evicted on next validate)
//   Active ──invalidate──▶ Revoked
//
// Expired and Revoked sessions are gone from the bucket; their tokens
// read as unknown from then on. Every read-modify-write on a token runs
// under that token's lock.

export class SessionManager {
  readonly #store: Store;
  readonly #timeoutMs: number;
  readonly #now: () => number;
  readonly #log: Logger | null;
  readonly #locks = new KeyedMutex();

  constructor(store: Store, options?: SessionManagerOptions) {
    this.#store = store;
    this.#timeoutMs = options?.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.#now = options?.now ?? Date.now;
    this.#log = options?.logger ?? null;
  }

  get timeoutMs(): number {
    return this.#timeoutMs;
  }

  async create(username: string, role: string): Promise<Session> {
    const token = randomBytes(TOKEN_BYTES).toString('base64url');

    return this.#locks.run(token, async () => {
      const now = this.#now();
      const record = (await this.#store.bucket('_sessions').insert({
        token,
        username,
        role,
        createdAt: now,
        lastActivityAt: now,
        timeoutMs: this.#timeoutMs,
      })) as unknown as SessionRecord;

      this.#log?.debug({ username, role }, 'session created');
      return toSession(record);
    });
  }

  /**
   * Returns the session and slides its expiry window.
   * Throws SESSION_NOT_FOUND for unknown tokens and SESSION_EXPIRED for
   * idle sessions, which are evicted on the way out.
   */
  async validate(token: string): Promise<Session> {
    return this.#locks.run(token, async () => {
      const record = await this.#find(token);
      if (record === undefined) {
        throw new AccessControlError(ErrorCode.SESSION_NOT_FOUND, 'Session not found');
      }

      const now = this.#now();
      if (now - record.lastActivityAt >= record.timeoutMs) {
        await this.#store.bucket('_sessions').delete(record.id);
        this.#log?.debug({ username: record.username }, 'session expired');

        const details: ExpiredSessionDetails = {
          username: record.username,
          role: record.role,
        };
        throw new AccessControlError(ErrorCode.SESSION_EXPIRED, 'Session expired', details);
      }

      const updated = (await this.#store
        .bucket('_sessions')
        .update(record.id, { lastActivityAt: now })) as unknown as SessionRecord;

      return toSession(updated);
    });
  }

  /** Removes the session. Returns what was removed, or null if nothing was. */
  async invalidate(token: string): Promise<Session | null> {
    return this.#locks.run(token, async () => {
      const record = await this.#find(token);
      if (record === undefined) return null;

      await this.#store.bucket('_sessions').delete(record.id);
      return toSession(record);
    });
  }

  /** Revokes every session of the user. Returns how many were removed. */
  async invalidateUserSessions(username: string): Promise<number> {
    const sessions = (await this.#store
      .bucket('_sessions')
      .where({ username })) as unknown as SessionRecord[];

    let removed = 0;
    for (const session of sessions) {
      const result = await this.invalidate(session.token);
      if (result !== null) removed++;
    }

    if (removed > 0) this.#log?.debug({ username, removed }, 'user sessions revoked');
    return removed;
  }

  /** Live sessions of the user. Does not refresh or evict anything. */
  async listUserSessions(username: string): Promise<Session[]> {
    const now = this.#now();
    const sessions = (await this.#store
      .bucket('_sessions')
      .where({ username })) as unknown as SessionRecord[];

    return sessions
      .filter((s) => now - s.lastActivityAt < s.timeoutMs)
      .map(toSession);
  }

  async #find(token: string): Promise<SessionRecord | undefined> {
    const matches = (await this.#store
      .bucket('_sessions')
      .where({ token })) as unknown as SessionRecord[];
    return matches[0];
  }
}

function toSession(record: SessionRecord): Session {
  return {
    token: record.token,
    username: record.username,
    role: record.role,
    createdAt: record.createdAt,
    lastActivityAt: record.lastActivityAt,
    timeoutMs: record.timeoutMs,
    expiresAt: record.lastActivityAt + record.timeoutMs,
  };
}
