import type { Store } from '@hamicek/noex-store';
import type { AccountRecord, UserAccount } from './identity-types.js';

export type AccountChanges = Partial<
  Pick<
    AccountRecord,
    | 'passwordHash'
    | 'passwordSalt'
    | 'role'
    | 'active'
    | 'fullName'
    | 'email'
    | 'department'
    | 'updatedAt'
    | 'passwordChangedAt'
  >
>;

export type NewAccount = Omit<AccountRecord, 'id' | '_version' | '_createdAt' | '_updatedAt'>;

// ── CredentialStore ─────────────────────────────────────────────
//
// Sole owner of the _accounts bucket. Usernames arrive here already
// normalized.

export class CredentialStore {
  readonly #store: Store;

  constructor(store: Store) {
    this.#store = store;
  }

  async findByUsername(username: string): Promise<AccountRecord | undefined> {
    const matches = (await this.#store
      .bucket('_accounts')
      .where({ username })) as unknown as AccountRecord[];
    return matches[0];
  }

  async get(id: string): Promise<AccountRecord | undefined> {
    return (await this.#store.bucket('_accounts').get(id)) as unknown as
      | AccountRecord
      | undefined;
  }

  async all(): Promise<AccountRecord[]> {
    return (await this.#store.bucket('_accounts').all()) as unknown as AccountRecord[];
  }

  async insert(account: NewAccount): Promise<AccountRecord> {
    const data: Record<string, unknown> = {
      username: account.username,
      passwordHash: account.passwordHash,
      passwordSalt: account.passwordSalt,
      role: account.role,
      active: account.active,
      createdAt: account.createdAt,
      updatedAt: account.updatedAt,
      passwordChangedAt: account.passwordChangedAt,
    };
    if (account.fullName !== undefined) data['fullName'] = account.fullName;
    if (account.email !== undefined) data['email'] = account.email;
    if (account.department !== undefined) data['department'] = account.department;

    return (await this.#store.bucket('_accounts').insert(data)) as unknown as AccountRecord;
  }

  async update(id: string, changes: AccountChanges): Promise<AccountRecord> {
    const data: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(changes)) {
      if (value !== undefined) data[field] = value;
    }

    return (await this.#store
      .bucket('_accounts')
      .update(id, data)) as unknown as AccountRecord;
  }
}

// ── Helpers ──────────────────────────────────────────────────────

export function toUserAccount(record: AccountRecord): UserAccount {
  return {
    id: record.id,
    username: record.username,
    role: record.role,
    active: record.active,
    ...(record.fullName !== undefined ? { fullName: record.fullName } : {}),
    ...(record.email !== undefined ? { email: record.email } : {}),
    ...(record.department !== undefined ? { department: record.department } : {}),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    passwordChangedAt: record.passwordChangedAt,
  };
}
