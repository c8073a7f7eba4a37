/**
 * Demo data: one user per role, two areas, two machines and two items.
 * Each group is only created when its table is empty, so the script can be
 * re-run safely.
 *
 *   npm run db:seed
 */

import { config, createLogger } from '@stockroom/config';
import { DrizzleRequisitionStore, closeDb, db, type RequisitionStore } from '@stockroom/db';
import type { UserRole } from '@stockroom/shared-types';
import {
  createArea,
  createInventoryItem,
  createMachine,
  createUser,
  type Actor,
} from '../services/reference-data.service.js';

const log = createLogger('seed-demo');

const DEMO_USERS: Array<{ username: string; fullName: string; role: UserRole }> = [
  { username: 'supervisor1', fullName: 'Demo Supervisor', role: 'requester' },
  { username: 'bodega1', fullName: 'Demo Storekeeper', role: 'approver' },
  { username: 'admin', fullName: 'Demo Administrator', role: 'administrator' },
];

const SYSTEM: Actor = { userId: null };

async function seedDemo(store: RequisitionStore, password: string): Promise<void> {
  if ((await store.listUsers()).length === 0) {
    for (const user of DEMO_USERS) {
      await createUser(store, { ...user, password }, SYSTEM);
    }
    log.info({ users: DEMO_USERS.map((u) => u.username) }, 'Seeded users');
  }

  const admin = await store.findUserByUsername('admin');
  if (!admin) {
    log.warn('No admin user; skipping reference data');
    return;
  }
  const by: Actor = { userId: admin.id };

  if ((await store.listAreas()).length === 0) {
    const a1 = await createArea(store, { code: 'A1', name: 'Area 1' }, by);
    const a2 = await createArea(store, { code: 'A2', name: 'Area 2' }, by);
    await createMachine(store, { code: 'MACH-001', name: 'Machine 1', areaId: a1.id }, by);
    await createMachine(store, { code: 'MACH-002', name: 'Machine 2', areaId: a2.id }, by);
    log.info('Seeded areas and machines');
  }

  if ((await store.listInventoryItems()).length === 0) {
    await createInventoryItem(store, { sku: 'SKU-001', description: 'Filtro', stock: 50, unit: 'un' }, by);
    await createInventoryItem(store, { sku: 'SKU-002', description: 'Tornillo M8', stock: 1000, unit: 'pcs' }, by);
    log.info('Seeded inventory items');
  }
}

async function main() {
  const store = new DrizzleRequisitionStore(db, { lockTimeoutMs: config.DB_LOCK_TIMEOUT_MS });
  try {
    await seedDemo(store, config.SEED_DEFAULT_PASSWORD);
  } finally {
    await closeDb();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Seeding failed');
  process.exitCode = 1;
});
