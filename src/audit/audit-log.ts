import { ErrorCode } from '../codes.js';
import { AccessControlError } from '../errors.js';
import type { AuditEntry, AuditQuery } from './audit-types.js';

const DEFAULT_AUDIT_CAPACITY = 10_000;

type EntryPredicate = (entry: AuditEntry) => boolean;

// ── AuditLog ─────────────────────────────────────────────────────
//
// Bounded in-memory view of recent entries, oldest overwritten first.
// `append` hands back whatever it overwrote so the owner can decide
// whether that entry was already persisted elsewhere.

export class AuditLog {
  readonly #slots: AuditEntry[] = [];
  readonly #capacity: number;
  #next = 0;
  #evicted = 0;

  constructor(capacity: number = DEFAULT_AUDIT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new AccessControlError(
        ErrorCode.VALIDATION_ERROR,
        `Audit log capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.#capacity = capacity;
  }

  /** Stores the entry. Returns the entry it displaced once the log is full. */
  append(entry: AuditEntry): AuditEntry | undefined {
    const displaced = this.#slots[this.#next];
    this.#slots[this.#next] = entry;
    this.#next = (this.#next + 1) % this.#capacity;

    if (displaced !== undefined) this.#evicted++;
    return displaced;
  }

  get size(): number {
    return this.#slots.length;
  }

  get capacity(): number {
    return this.#capacity;
  }

  /** Entries displaced since the log was created. */
  get evicted(): number {
    return this.#evicted;
  }

  /** Newest first; `limit` applies after the other filters. */
  query(filter?: AuditQuery): AuditEntry[] {
    const accept = predicateFor(filter);
    const limit = filter?.limit ?? Infinity;
    const result: AuditEntry[] = [];

    for (const entry of this.#newestFirst()) {
      if (result.length >= limit) break;
      if (accept(entry)) result.push(entry);
    }
    return result;
  }

  *#newestFirst(): Generator<AuditEntry> {
    const count = this.#slots.length;
    for (let back = 1; back <= count; back++) {
      const entry = this.#slots[(this.#next - back + count) % count];
      if (entry !== undefined) yield entry;
    }
  }
}

// ── Filters ──────────────────────────────────────────────────────

function predicateFor(filter: AuditQuery | undefined): EntryPredicate {
  if (filter === undefined) return () => true;

  const checks: EntryPredicate[] = [];
  const { username, action, category, from, to } = filter;

  if (username !== undefined) checks.push((e) => e.username === username);
  if (action !== undefined) checks.push((e) => e.action === action);
  if (category !== undefined) checks.push((e) => e.category === category);
  if (from !== undefined) checks.push((e) => e.timestamp >= from);
  if (to !== undefined) checks.push((e) => e.timestamp <= to);

  return (entry) => checks.every((check) => check(entry));
}
