/**
 * 01 - Access Control
 *
 * Walks one request through the whole pipeline: seed accounts, log in,
 * read employee records with per-role masking, trip the lockout and
 * print the audit trail.
 *
 * Run:
 *   AUTH_SALT=example-salt npx tsx examples/01-access-control.example.ts
 */

import { Store } from '@hamicek/noex-store';
import {
  AccessControl,
  loadEnvConfig,
  isAccessControlError,
  ErrorCode,
  type AuditEntry,
  type RecordSchema,
} from '../src/index.js';

const employeeSchema: RecordSchema = {
  name: null,
  department: null,
  salary: 'salary',
  phone: 'personal_info',
  bankAccount: 'financial_data',
};

const employees = [
  { name: 'Jana Example', department: 'Sales', salary: 48_000, phone: '000-111-222', bankAccount: 'EX-01' },
  { name: 'Petr Example', department: 'Ops', salary: 51_000, phone: '000-333-444', bankAccount: 'EX-02' },
];

async function main() {
  // ── 1. Start ────────────────────────────────────────────────────

  const store = await Store.start({ name: 'access-control-demo' });
  const ac = await AccessControl.start(store, {
    ...loadEnvConfig(),
    audit: {
      sink: {
        async write(entry: AuditEntry) {
          console.log(`[audit] #${entry.id} ${entry.action} ${entry.username ?? '-'} ${entry.detail}`);
        },
      },
    },
  });

  await ac.accounts.ensureAccounts([
    { username: 'admin', password: 'admin-example', role: 'admin', fullName: 'Example Admin' },
    { username: 'manager', password: 'manager-example', role: 'manager' },
    { username: 'viewer', password: 'viewer-example', role: 'viewer' },
  ]);

  // ── 2. Same records, three roles ────────────────────────────────

  for (const [username, password] of [
    ['admin', 'admin-example'],
    ['manager', 'manager-example'],
    ['viewer', 'viewer-example'],
  ] as const) {
    const session = await ac.login(username, password);
    const result = await ac.accessRecords(session.token, {
      operation: 'read',
      category: 'employees',
      records: employees,
      schema: employeeSchema,
    });

    console.log(`\n${ac.catalog.displayName(session.role)} sees:`);
    if (result.allowed) console.table(result.records);
    await ac.logout(session.token);
  }

  // ── 3. Denied operation ─────────────────────────────────────────

  const viewer = await ac.login('viewer', 'viewer-example');
  const denied = await ac.accessRecords(viewer.token, {
    operation: 'delete',
    category: 'employees',
    records: employees,
    schema: employeeSchema,
  });
  if (!denied.allowed) console.log('\nDenied:', denied.reason);

  // ── 4. Lockout ──────────────────────────────────────────────────

  for (let attempt = 1; attempt <= 4; attempt++) {
    try {
      await ac.login('manager', 'not-the-password');
    } catch (error) {
      if (isAccessControlError(error, ErrorCode.ACCOUNT_LOCKED)) {
        console.log(`Attempt ${attempt}: locked`, error.details);
      } else if (isAccessControlError(error)) {
        console.log(`Attempt ${attempt}: ${error.message}`);
      } else {
        throw error;
      }
    }
  }

  // ── 5. Audit trail ──────────────────────────────────────────────

  console.log('\nLast five audit entries:');
  for (const entry of ac.listAuditEntries({ limit: 5 })) {
    console.log(new Date(entry.timestamp).toISOString(), entry.action, entry.username, entry.detail);
  }

  await ac.stop();
  await store.stop();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
