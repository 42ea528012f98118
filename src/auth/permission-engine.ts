import { ErrorCode } from '../codes.js';
import { AccessControlError } from '../errors.js';
import type { PermissionCatalog, SensitiveCategory } from './permission-catalog.js';
import { ALL_CATEGORIES, ALL_REPORTS, isOperation } from './permission-catalog.js';

// ── Decision ─────────────────────────────────────────────────────

export type AuthorizationDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: string };

const ALLOWED: AuthorizationDecision = { allowed: true };

const NO_SENSITIVE_DATA: ReadonlySet<SensitiveCategory> = new Set();

// ── PermissionEngine ─────────────────────────────────────────────
//
// Pure lookups against the catalog. Session state is checked before
// anything reaches here, so the same inputs always give the same answer.

export class PermissionEngine {
  readonly #catalog: PermissionCatalog;

  constructor(catalog: PermissionCatalog) {
    this.#catalog = catalog;
  }

  get catalog(): PermissionCatalog {
    return this.#catalog;
  }

  /**
   * Both the data category and the operation must be granted to the role.
   * A denial is returned, not thrown.
   */
  authorize(role: string, operation: string, category: string): AuthorizationDecision {
    const permissions = this.#catalog.get(role);
    if (permissions === undefined) {
      return { allowed: false, reason: `Unknown role "${role}"` };
    }

    const categoryGranted =
      permissions.dataAccess.has(ALL_CATEGORIES) || permissions.dataAccess.has(category);
    if (!categoryGranted) {
      return {
        allowed: false,
        reason: `Role "${role}" has no access to category "${category}"`,
      };
    }

    if (!isOperation(operation) || !permissions.operations.has(operation)) {
      return {
        allowed: false,
        reason: `Role "${role}" may not perform "${operation}"`,
      };
    }

    return ALLOWED;
  }

  /** Throwing variant of `authorize` for callers that treat a denial as an error. */
  assertAuthorized(role: string, operation: string, category: string): void {
    const decision = this.authorize(role, operation, category);
    if (!decision.allowed) {
      throw new AccessControlError(ErrorCode.PERMISSION_DENIED, decision.reason, {
        role,
        operation,
        category,
      });
    }
  }

  canAccessReport(role: string, report: string): boolean {
    const permissions = this.#catalog.get(role);
    if (permissions === undefined) return false;
    return permissions.reports.has(ALL_REPORTS) || permissions.reports.has(report);
  }

  /** Sensitive categories the role sees unmasked. Empty for unknown roles. */
  sensitiveCategories(role: string): ReadonlySet<SensitiveCategory> {
    return this.#catalog.get(role)?.sensitiveData ?? NO_SENSITIVE_DATA;
  }
}
