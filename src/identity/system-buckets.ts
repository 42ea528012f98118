import type { Store, BucketDefinition } from '@hamicek/noex-store';
import { SYSTEM_BUCKET_NAMES, type SystemBucketName } from './identity-types.js';

// ── Bucket Definitions ───────────────────────────────────────────

export const ACCOUNTS_BUCKET: BucketDefinition = {
  key: 'id',
  schema: {
    id:                { type: 'string', generated: 'uuid' },
    username:          { type: 'string', required: true, unique: true, minLength: 3, maxLength: 64 },
    passwordHash:      { type: 'string', required: true },
    passwordSalt:      { type: 'string', required: true },
    role:              { type: 'string', required: true },
    active:            { type: 'boolean', default: true },
    fullName:          { type: 'string' },
    email:             { type: 'string' },
    department:        { type: 'string' },
    createdAt:         { type: 'number', required: true },
    updatedAt:         { type: 'number', required: true },
    passwordChangedAt: { type: 'number', required: true },
  },
  indexes: ['username', 'role'],
};

export const SESSIONS_BUCKET: BucketDefinition = {
  key: 'id',
  schema: {
    id:             { type: 'string', generated: 'uuid' },
    token:          { type: 'string', required: true, unique: true },
    username:       { type: 'string', required: true },
    role:           { type: 'string', required: true },
    createdAt:      { type: 'number', required: true },
    lastActivityAt: { type: 'number', required: true },
    timeoutMs:      { type: 'number', required: true },
  },
  indexes: ['token', 'username'],
};

const BUCKET_MAP: Record<SystemBucketName, BucketDefinition> = {
  '_accounts': ACCOUNTS_BUCKET,
  '_sessions': SESSIONS_BUCKET,
};

// ── ensureSystemBuckets ──────────────────────────────────────────

/**
 * Creates the account and session buckets if they don't already exist.
 * Idempotent, so it runs on every start.
 */
export async function ensureSystemBuckets(store: Store): Promise<void> {
  for (const name of SYSTEM_BUCKET_NAMES) {
    if (!store.hasBucket(name)) {
      await store.defineBucket(name, BUCKET_MAP[name]);
    }
  }
}
