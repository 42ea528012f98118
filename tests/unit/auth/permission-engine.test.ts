import { describe, it, expect } from 'vitest';
import { PermissionCatalog } from '../../../src/auth/permission-catalog.js';
import { PermissionEngine } from '../../../src/auth/permission-engine.js';
import { isAccessControlError } from '../../../src/errors.js';
import { ErrorCode } from '../../../src/codes.js';

describe('PermissionEngine', () => {
  const engine = new PermissionEngine(PermissionCatalog.create());

  describe('authorize', () => {
    it('allows manager to read employees', () => {
      expect(engine.authorize('manager', 'read', 'employees')).toEqual({ allowed: true });
    });

    it('denies manager deleting employees', () => {
      expect(engine.authorize('manager', 'delete', 'employees')).toEqual({
        allowed: false,
        reason: 'Role "manager" may not perform "delete"',
      });
    });

    it('allows admin any operation on any category', () => {
      expect(engine.authorize('admin', 'delete', 'payroll').allowed).toBe(true);
      expect(engine.authorize('admin', 'manage_users', 'users').allowed).toBe(true);
    });

    it('denies a category outside the role data access', () => {
      expect(engine.authorize('viewer', 'read', 'tasks')).toEqual({
        allowed: false,
        reason: 'Role "viewer" has no access to category "tasks"',
      });
    });

    it('denies an operation outside the vocabulary', () => {
      expect(engine.authorize('admin', 'approve', 'projects')).toEqual({
        allowed: false,
        reason: 'Role "admin" may not perform "approve"',
      });
    });

    it('denies unknown roles', () => {
      expect(engine.authorize('intern', 'read', 'projects')).toEqual({
        allowed: false,
        reason: 'Unknown role "intern"',
      });
    });

    it('gives the same answer for the same inputs', () => {
      const first = engine.authorize('viewer', 'export', 'projects');
      const second = engine.authorize('viewer', 'export', 'projects');
      expect(second).toEqual(first);
    });

    it('checks the category before the operation', () => {
      const decision = engine.authorize('viewer', 'delete', 'tasks');
      expect(decision).toEqual({
        allowed: false,
        reason: 'Role "viewer" has no access to category "tasks"',
      });
    });
  });

  describe('assertAuthorized', () => {
    it('passes when allowed', () => {
      expect(() => engine.assertAuthorized('manager', 'update', 'projects')).not.toThrow();
    });

    it('throws PERMISSION_DENIED with the reason', () => {
      try {
        engine.assertAuthorized('viewer', 'update', 'projects');
        expect.unreachable('assertAuthorized should throw');
      } catch (error) {
        expect(isAccessControlError(error, ErrorCode.PERMISSION_DENIED)).toBe(true);
        if (isAccessControlError(error)) {
          expect(error.message).toBe('Role "viewer" may not perform "update"');
          expect(error.details).toEqual({ role: 'viewer', operation: 'update', category: 'projects' });
        }
      }
    });
  });

  describe('canAccessReport', () => {
    it('lets all_reports grant any report', () => {
      expect(engine.canAccessReport('admin', 'headcount_forecast')).toBe(true);
    });

    it('checks named reports for other roles', () => {
      expect(engine.canAccessReport('manager', 'employee_data')).toBe(true);
      expect(engine.canAccessReport('viewer', 'employee_data')).toBe(false);
      expect(engine.canAccessReport('viewer', 'cost_analysis')).toBe(true);
    });

    it('returns false for unknown roles', () => {
      expect(engine.canAccessReport('intern', 'cost_analysis')).toBe(false);
    });
  });

  describe('sensitiveCategories', () => {
    it('returns the role grants', () => {
      expect([...engine.sensitiveCategories('manager')]).toEqual(['salary']);
    });

    it('returns an empty set for unknown roles', () => {
      expect(engine.sensitiveCategories('intern').size).toBe(0);
    });
  });
});
