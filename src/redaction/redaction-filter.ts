import type { PermissionEngine } from '../auth/permission-engine.js';
import type { SensitiveCategory } from '../auth/permission-catalog.js';
import type { DataRecord, RecordSchema } from './redaction-types.js';
import { REDACTED } from './redaction-types.js';

// ── RedactionFilter ──────────────────────────────────────────────
//
// Masks by category tag, never by field name. A role the catalog does not
// know is granted no sensitive category, so every tagged field is masked,
// and a tag outside the known categories is masked for every role.

export class RedactionFilter {
  readonly #engine: PermissionEngine;

  constructor(engine: PermissionEngine) {
    this.#engine = engine;
  }

  /** Returns a masked copy of `record`. The source object is left untouched. */
  filter(record: DataRecord, schema: RecordSchema, role: string): Record<string, unknown> {
    const granted = this.#engine.sensitiveCategories(role);
    const copy: Record<string, unknown> = {};

    for (const [field, value] of Object.entries(record)) {
      copy[field] = isVisible(tagOf(schema, field), granted) ? value : REDACTED;
    }

    return copy;
  }

  filterMany(
    records: readonly DataRecord[],
    schema: RecordSchema,
    role: string,
  ): Record<string, unknown>[] {
    return records.map((record) => this.filter(record, schema, role));
  }

  /** Fields of the schema that `role` would see masked. */
  maskedFields(schema: RecordSchema, role: string): string[] {
    const granted = this.#engine.sensitiveCategories(role);
    return Object.keys(schema).filter((field) => !isVisible(tagOf(schema, field), granted));
  }
}

function tagOf(schema: RecordSchema, field: string): SensitiveCategory | null | undefined {
  return Object.hasOwn(schema, field) ? schema[field] : undefined;
}

function isVisible(
  tag: SensitiveCategory | null | undefined,
  granted: ReadonlySet<SensitiveCategory>,
): boolean {
  if (tag === null || tag === undefined) return true;
  return granted.has(tag);
}
