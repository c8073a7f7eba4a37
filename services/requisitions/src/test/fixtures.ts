import type { UserRow } from '@stockroom/db';
import { generateAccessToken } from '@stockroom/auth-utils';
import type { LifecycleOptions } from '../services/requisition-lifecycle.service.js';
import { InMemoryRequisitionStore } from './memory-store.js';

export const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z');
export const FIXED_DAY = '20260301';

export function testLifecycleOptions(overrides: Partial<LifecycleOptions> = {}): LifecycleOptions {
  return { codeTimeZone: 'UTC', maxCodeAttempts: 5, now: () => FIXED_NOW, ...overrides };
}

/** A small warehouse: one user per role, two areas, two machines, two items. */
export function seedWarehouse(store: InMemoryRequisitionStore = new InMemoryRequisitionStore()) {
  const requester = store.addUser({ username: 'supervisor1', fullName: 'Shift Supervisor', role: 'requester' });
  const otherRequester = store.addUser({ username: 'supervisor2', role: 'requester' });
  const approver = store.addUser({ username: 'bodega1', fullName: 'Storekeeper', role: 'approver' });
  const admin = store.addUser({ username: 'admin', role: 'administrator' });

  const areaA1 = store.addArea({ code: 'A1', name: 'Assembly' });
  const areaA2 = store.addArea({ code: 'A2', name: 'Packaging' });
  const press = store.addMachine({ code: 'MACH-001', name: 'Press', areaId: areaA1.id });
  const looseMachine = store.addMachine({ code: 'MACH-002', name: 'Forklift' });

  const filter = store.addInventoryItem({ sku: 'SKU-001', description: 'Filtro', stock: 50 });
  const bolt = store.addInventoryItem({ sku: 'SKU-002', description: 'Tornillo M8', stock: 1000, unit: 'pcs' });

  return { store, requester, otherRequester, approver, admin, areaA1, areaA2, press, looseMachine, filter, bolt };
}

export type Warehouse = ReturnType<typeof seedWarehouse>;

export function bearer(user: Pick<UserRow, 'id' | 'username' | 'role'>): string {
  return `Bearer ${generateAccessToken({ sub: user.id, username: user.username, role: user.role })}`;
}
