import { describe, it, expect } from 'vitest';
import { AuditLog } from '../../../src/audit/audit-log.js';
import type { AuditEntry } from '../../../src/audit/audit-types.js';
import { isAccessControlError } from '../../../src/errors.js';
import { ErrorCode } from '../../../src/codes.js';

// ── Helpers ──────────────────────────────────────────────────────

let sequence = 0;

function entry(overrides?: Partial<AuditEntry>): AuditEntry {
  return {
    id: ++sequence,
    timestamp: 1_000,
    username: 'alice',
    role: 'viewer',
    action: 'data_access',
    category: 'projects',
    detail: '',
    ...overrides,
  };
}

// ── Tests ────────────────────────────────────────────────────────

describe('AuditLog', () => {
  describe('append', () => {
    it('starts empty', () => {
      const log = new AuditLog();
      expect(log.size).toBe(0);
      expect(log.query()).toEqual([]);
    });

    it('stores entries', () => {
      const log = new AuditLog();
      log.append(entry());
      log.append(entry());
      expect(log.size).toBe(2);
    });

    it('evicts the oldest entries when full', () => {
      const log = new AuditLog(3);
      for (let i = 1; i <= 5; i++) log.append(entry({ timestamp: i }));

      expect(log.size).toBe(3);
      expect(log.query().map((e) => e.timestamp)).toEqual([5, 4, 3]);
    });

    it('returns the displaced entry once full', () => {
      const log = new AuditLog(2);
      const first = entry({ timestamp: 1 });

      expect(log.append(first)).toBeUndefined();
      expect(log.append(entry({ timestamp: 2 }))).toBeUndefined();
      expect(log.append(entry({ timestamp: 3 }))).toBe(first);
      expect(log.evicted).toBe(1);
    });

    it('counts every eviction', () => {
      const log = new AuditLog(1);
      for (let i = 1; i <= 4; i++) log.append(entry({ timestamp: i }));

      expect(log.evicted).toBe(3);
      expect(log.capacity).toBe(1);
      expect(log.query().map((e) => e.timestamp)).toEqual([4]);
    });

    it('rejects a capacity below one', () => {
      try {
        new AuditLog(0);
        expect.unreachable('constructor should throw');
      } catch (error) {
        expect(isAccessControlError(error, ErrorCode.VALIDATION_ERROR)).toBe(true);
      }
    });
  });

  describe('query', () => {
    it('returns newest first', () => {
      const log = new AuditLog();
      log.append(entry({ timestamp: 1 }));
      log.append(entry({ timestamp: 2 }));
      log.append(entry({ timestamp: 3 }));

      expect(log.query().map((e) => e.timestamp)).toEqual([3, 2, 1]);
    });

    it('filters by username', () => {
      const log = new AuditLog();
      log.append(entry({ username: 'alice' }));
      log.append(entry({ username: 'bob' }));
      log.append(entry({ username: null }));

      expect(log.query({ username: 'bob' }).map((e) => e.username)).toEqual(['bob']);
    });

    it('filters by action', () => {
      const log = new AuditLog();
      log.append(entry({ action: 'login_success' }));
      log.append(entry({ action: 'login_failure' }));
      log.append(entry({ action: 'login_failure' }));

      expect(log.query({ action: 'login_failure' })).toHaveLength(2);
    });

    it('filters by category', () => {
      const log = new AuditLog();
      log.append(entry({ category: 'projects' }));
      log.append(entry({ category: 'employees' }));

      expect(log.query({ category: 'employees' }).map((e) => e.category)).toEqual(['employees']);
    });

    it('filters by time range, inclusive', () => {
      const log = new AuditLog();
      for (const timestamp of [100, 200, 300, 400]) log.append(entry({ timestamp }));

      expect(log.query({ from: 200, to: 300 }).map((e) => e.timestamp)).toEqual([300, 200]);
    });

    it('applies limit after filtering', () => {
      const log = new AuditLog();
      log.append(entry({ action: 'logout', timestamp: 1 }));
      log.append(entry({ action: 'data_access', timestamp: 2 }));
      log.append(entry({ action: 'logout', timestamp: 3 }));
      log.append(entry({ action: 'logout', timestamp: 4 }));

      expect(log.query({ action: 'logout', limit: 2 }).map((e) => e.timestamp)).toEqual([4, 3]);
    });

    it('combines filters', () => {
      const log = new AuditLog();
      log.append(entry({ username: 'alice', action: 'logout' }));
      log.append(entry({ username: 'alice', action: 'data_access' }));
      log.append(entry({ username: 'bob', action: 'logout' }));

      expect(log.query({ username: 'alice', action: 'logout' })).toHaveLength(1);
    });
  });
});
