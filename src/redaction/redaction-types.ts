import type { SensitiveCategory } from '../auth/permission-catalog.js';

/** Placeholder written over every value the caller may not see. */
export const REDACTED = '*** Restricted ***';

/** A data record as handed over by the surrounding application. */
export type DataRecord = Readonly<Record<string, unknown>>;

/**
 * Per-field sensitivity tags. A field maps to at most one sensitive
 * category; fields that are absent or tagged `null` are not sensitive.
 */
export type RecordSchema = Readonly<Record<string, SensitiveCategory | null | undefined>>;
