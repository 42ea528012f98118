import { ErrorCode } from '../codes.js';
import { AccessControlError } from '../errors.js';

// ── Vocabulary ───────────────────────────────────────────────────

export const OPERATIONS = [
  'create',
  'read',
  'update',
  'delete',
  'export',
  'import',
  'manage_users',
] as const;
export type Operation = (typeof OPERATIONS)[number];

export const SENSITIVE_CATEGORIES = ['salary', 'personal_info', 'financial_data'] as const;
export type SensitiveCategory = (typeof SENSITIVE_CATEGORIES)[number];

export const BUILTIN_ROLES = ['admin', 'manager', 'viewer'] as const;
export type BuiltinRole = (typeof BUILTIN_ROLES)[number];

/** A built-in role name or the name of a custom role registered in the catalog. */
export type Role = BuiltinRole | (string & {});

/** Data-access tag that grants every category. */
export const ALL_CATEGORIES = 'all';

/** Report tag that grants every report type. */
export const ALL_REPORTS = 'all_reports';

export function isOperation(value: string): value is Operation {
  return OPERATIONS.some((op) => op === value);
}

export function isSensitiveCategory(value: string): value is SensitiveCategory {
  return SENSITIVE_CATEGORIES.some((c) => c === value);
}

// ── Definitions ──────────────────────────────────────────────────

export interface RoleDefinition {
  readonly name: string;
  readonly displayName?: string;
  /** Data categories the role may touch. `all` grants every category. */
  readonly dataAccess: readonly string[];
  readonly operations: readonly Operation[];
  /** Report types the role may produce. `all_reports` grants every report. */
  readonly reports: readonly string[];
  /** Sensitive categories the role sees unmasked. */
  readonly sensitiveData: readonly SensitiveCategory[];
}

export interface RolePermissions {
  readonly name: string;
  readonly displayName: string;
  readonly dataAccess: ReadonlySet<string>;
  readonly operations: ReadonlySet<Operation>;
  readonly reports: ReadonlySet<string>;
  readonly sensitiveData: ReadonlySet<SensitiveCategory>;
}

export const DEFAULT_ROLE_DEFINITIONS: readonly RoleDefinition[] = [
  {
    name: 'admin',
    displayName: 'Administrator',
    dataAccess: [ALL_CATEGORIES],
    operations: ['create', 'read', 'update', 'delete', 'export', 'import', 'manage_users'],
    reports: [ALL_REPORTS, 'financial_summary', 'employee_data', 'cost_analysis'],
    sensitiveData: ['salary', 'personal_info', 'financial_data'],
  },
  {
    name: 'manager',
    displayName: 'Manager',
    dataAccess: ['employees', 'subcontractors', 'projects', 'tasks'],
    operations: ['create', 'read', 'update', 'export', 'import'],
    reports: ['financial_summary', 'employee_data', 'cost_analysis'],
    sensitiveData: ['salary'],
  },
  {
    name: 'viewer',
    displayName: 'Viewer',
    dataAccess: ['employees', 'subcontractors', 'projects'],
    operations: ['read', 'export'],
    reports: ['financial_summary', 'cost_analysis'],
    sensitiveData: [],
  },
];

// ── PermissionCatalog ────────────────────────────────────────────
//
// Role → permission table. Built once at start-up from the default
// definitions plus any custom roles; adding a role means adding a row.

export class PermissionCatalog {
  readonly #roles: ReadonlyMap<string, RolePermissions>;

  private constructor(roles: ReadonlyMap<string, RolePermissions>) {
    this.#roles = roles;
  }

  /**
   * Builds a catalog from the default roles plus `customRoles`.
   * Throws VALIDATION_ERROR for malformed definitions and ALREADY_EXISTS
   * when a custom role reuses an existing name.
   */
  static create(customRoles: readonly RoleDefinition[] = []): PermissionCatalog {
    return PermissionCatalog.fromDefinitions([...DEFAULT_ROLE_DEFINITIONS, ...customRoles]);
  }

  /** Builds a catalog from exactly the given definitions. */
  static fromDefinitions(definitions: readonly RoleDefinition[]): PermissionCatalog {
    const roles = new Map<string, RolePermissions>();

    for (const definition of definitions) {
      validateDefinition(definition);
      if (roles.has(definition.name)) {
        throw new AccessControlError(
          ErrorCode.ALREADY_EXISTS,
          `Role "${definition.name}" is defined more than once`,
        );
      }
      roles.set(definition.name, toPermissions(definition));
    }

    return new PermissionCatalog(roles);
  }

  get(role: string): RolePermissions | undefined {
    return this.#roles.get(role);
  }

  has(role: string): boolean {
    return this.#roles.has(role);
  }

  /** Role names in definition order. */
  roles(): string[] {
    return Array.from(this.#roles.keys());
  }

  /** Human-readable role label; unknown roles read as "User". */
  displayName(role: string): string {
    return this.#roles.get(role)?.displayName ?? 'User';
  }
}

// ── Helpers ──────────────────────────────────────────────────────

function validateDefinition(definition: RoleDefinition): void {
  if (typeof definition.name !== 'string' || definition.name.trim().length === 0) {
    throw new AccessControlError(ErrorCode.VALIDATION_ERROR, 'Role name must not be empty');
  }

  const badOperation = definition.operations.find((op) => !isOperation(op));
  if (badOperation !== undefined) {
    throw new AccessControlError(
      ErrorCode.VALIDATION_ERROR,
      `Role "${definition.name}" lists unknown operation "${badOperation}"`,
    );
  }

  const badCategory = definition.sensitiveData.find((c) => !isSensitiveCategory(c));
  if (badCategory !== undefined) {
    throw new AccessControlError(
      ErrorCode.VALIDATION_ERROR,
      `Role "${definition.name}" lists unknown sensitive category "${badCategory}"`,
    );
  }
}

function toPermissions(definition: RoleDefinition): RolePermissions {
  return Object.freeze({
    name: definition.name,
    displayName: definition.displayName ?? definition.name,
    dataAccess: new Set(definition.dataAccess),
    operations: new Set(definition.operations),
    reports: new Set(definition.reports),
    sensitiveData: new Set(definition.sensitiveData),
  });
}
