import { describe, it, expect } from 'vitest';
import {
  PermissionCatalog,
  DEFAULT_ROLE_DEFINITIONS,
  isOperation,
  isSensitiveCategory,
  type RoleDefinition,
} from '../../../src/auth/permission-catalog.js';
import { AccessControlError } from '../../../src/errors.js';
import { ErrorCode } from '../../../src/codes.js';

const auditor: RoleDefinition = {
  name: 'auditor',
  displayName: 'Auditor',
  dataAccess: ['projects'],
  operations: ['read'],
  reports: ['cost_analysis'],
  sensitiveData: ['financial_data'],
};

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof AccessControlError) return error.code;
    throw error;
  }
  return undefined;
}

describe('PermissionCatalog', () => {
  describe('default roles', () => {
    const catalog = PermissionCatalog.create();

    it('defines admin, manager and viewer in order', () => {
      expect(catalog.roles()).toEqual(['admin', 'manager', 'viewer']);
    });

    it('grants admin every operation and sensitive category', () => {
      const admin = catalog.get('admin');
      expect(admin?.operations.size).toBe(7);
      expect(admin?.operations.has('manage_users')).toBe(true);
      expect([...(admin?.sensitiveData ?? [])]).toEqual(['salary', 'personal_info', 'financial_data']);
      expect(admin?.dataAccess.has('all')).toBe(true);
    });

    it('grants manager salary but not delete', () => {
      const manager = catalog.get('manager');
      expect(manager?.operations.has('delete')).toBe(false);
      expect(manager?.operations.has('import')).toBe(true);
      expect([...(manager?.sensitiveData ?? [])]).toEqual(['salary']);
      expect(manager?.dataAccess.has('tasks')).toBe(true);
    });

    it('limits viewer to read and export without sensitive data', () => {
      const viewer = catalog.get('viewer');
      expect([...(viewer?.operations ?? [])]).toEqual(['read', 'export']);
      expect(viewer?.sensitiveData.size).toBe(0);
      expect(viewer?.dataAccess.has('tasks')).toBe(false);
    });

    it('returns undefined for unknown roles', () => {
      expect(catalog.get('intern')).toBeUndefined();
      expect(catalog.has('intern')).toBe(false);
    });
  });

  describe('displayName', () => {
    const catalog = PermissionCatalog.create();

    it('returns the configured label', () => {
      expect(catalog.displayName('admin')).toBe('Administrator');
      expect(catalog.displayName('viewer')).toBe('Viewer');
    });

    it('falls back to "User" for unknown roles', () => {
      expect(catalog.displayName('intern')).toBe('User');
    });

    it('falls back to the role name when no label is given', () => {
      const custom = PermissionCatalog.create([{ ...auditor, name: 'qa', displayName: undefined }]);
      expect(custom.displayName('qa')).toBe('qa');
    });
  });

  describe('custom roles', () => {
    it('adds a role next to the defaults', () => {
      const catalog = PermissionCatalog.create([auditor]);

      expect(catalog.roles()).toEqual(['admin', 'manager', 'viewer', 'auditor']);
      expect(catalog.get('auditor')?.sensitiveData.has('financial_data')).toBe(true);
    });

    it('rejects a role that reuses an existing name', () => {
      expect(codeOf(() => PermissionCatalog.create([{ ...auditor, name: 'viewer' }]))).toBe(
        ErrorCode.ALREADY_EXISTS,
      );
    });

    it('rejects an empty role name', () => {
      expect(codeOf(() => PermissionCatalog.create([{ ...auditor, name: '  ' }]))).toBe(
        ErrorCode.VALIDATION_ERROR,
      );
    });

    it('builds exactly the given definitions with fromDefinitions', () => {
      const catalog = PermissionCatalog.fromDefinitions([auditor]);
      expect(catalog.roles()).toEqual(['auditor']);
      expect(catalog.has('admin')).toBe(false);
    });
  });

  describe('vocabulary guards', () => {
    it('recognizes operations', () => {
      expect(isOperation('manage_users')).toBe(true);
      expect(isOperation('approve')).toBe(false);
    });

    it('recognizes sensitive categories', () => {
      expect(isSensitiveCategory('personal_info')).toBe(true);
      expect(isSensitiveCategory('employees')).toBe(false);
    });
  });

  it('keeps the default definitions untouched', () => {
    PermissionCatalog.create([auditor]);
    expect(DEFAULT_ROLE_DEFINITIONS.map((d) => d.name)).toEqual(['admin', 'manager', 'viewer']);
  });
});
