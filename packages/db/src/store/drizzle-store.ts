import { and, asc, desc, eq, inArray, sql, type SQL } from 'drizzle-orm';
import { db as defaultDb, setLockTimeout, type Database, type DbOrTransaction } from '../client.js';
import {
  users,
  areas,
  machines,
  inventoryItems,
  requisitions,
  requisitionItems,
  approvals,
  requisitionCodeCounters,
} from '../schema/index.js';
import { verifyAuditChain, writeAuditEntry, type AuditChainBreak, type AuditEntryInput } from '../audit-writer.js';
import { DuplicateKeyError, isUniqueViolation } from '../errors.js';
import type {
  AreaRow,
  ApprovalRow,
  InventoryItemRow,
  MachineRow,
  NewApproval,
  NewArea,
  NewInventoryItem,
  NewMachine,
  NewRequisition,
  NewRequisitionItem,
  NewUser,
  RequisitionDetail,
  RequisitionFilter,
  RequisitionItemRow,
  RequisitionReads,
  RequisitionRow,
  RequisitionStore,
  RequisitionStoreTx,
  UserPatch,
  UserRow,
} from './types.js';
import { UNIQUE_CONSTRAINTS } from './types.js';
import type { RequisitionStatus } from '@stockroom/shared-types';

// Runs `insert` inside a savepoint so a unique violation leaves the outer
// transaction usable, and reports it as DuplicateKeyError.
async function insertUnique<T>(
  conn: DbOrTransaction,
  insert: (sp: DbOrTransaction) => Promise<T>,
): Promise<T> {
  try {
    return await conn.transaction(async (sp) => insert(sp));
  } catch (err) {
    const constraint = uniqueConstraintOf(err);
    if (constraint) {
      throw new DuplicateKeyError(constraint, { cause: err });
    }
    throw err;
  }
}

function uniqueConstraintOf(err: unknown): string | null {
  return Object.values(UNIQUE_CONSTRAINTS).find((name) => isUniqueViolation(err, name)) ?? null;
}

// ─── Reads ────────────────────────────────────────────────────────────

class DrizzleReads implements RequisitionReads {
  constructor(protected readonly conn: DbOrTransaction) {}

  async findRequisition(id: string): Promise<RequisitionDetail | null> {
    const row = await this.conn.query.requisitions.findFirst({
      where: eq(requisitions.id, id),
      with: {
        requester: { columns: { id: true, username: true, fullName: true, role: true } },
        machine: true,
        area: true,
        items: { with: { inventoryItem: true }, orderBy: [asc(requisitionItems.lineNumber)] },
        approvals: { orderBy: [asc(approvals.createdAt)] },
      },
    });
    return row ?? null;
  }

  async findUser(id: string): Promise<UserRow | null> {
    const [row] = await this.conn.select().from(users).where(eq(users.id, id)).limit(1);
    return row ?? null;
  }

  async findArea(id: string): Promise<AreaRow | null> {
    const [row] = await this.conn.select().from(areas).where(eq(areas.id, id)).limit(1);
    return row ?? null;
  }

  async findMachine(id: string): Promise<MachineRow | null> {
    const [row] = await this.conn.select().from(machines).where(eq(machines.id, id)).limit(1);
    return row ?? null;
  }

  async findInventoryItems(ids: string[]): Promise<InventoryItemRow[]> {
    if (ids.length === 0) return [];
    return this.conn.select().from(inventoryItems).where(inArray(inventoryItems.id, ids));
  }
}

// ─── Transaction ──────────────────────────────────────────────────────

class DrizzleStoreTx extends DrizzleReads implements RequisitionStoreTx {
  async nextCodeSequence(day: string): Promise<number> {
    // The upsert takes the counter row lock and keeps it until commit,
    // so concurrent creations on the same day queue here.
    const [row] = await this.conn
      .insert(requisitionCodeCounters)
      .values({ day, lastSequence: 1 })
      .onConflictDoUpdate({
        target: requisitionCodeCounters.day,
        set: {
          lastSequence: sql`${requisitionCodeCounters.lastSequence} + 1`,
          updatedAt: new Date(),
        },
      })
      .returning({ lastSequence: requisitionCodeCounters.lastSequence });
    return row.lastSequence;
  }

  async insertRequisition(values: NewRequisition): Promise<RequisitionRow> {
    return insertUnique(this.conn, async (sp) => {
      const [row] = await sp
        .insert(requisitions)
        .values({ ...values, status: 'pending', updatedAt: values.createdAt })
        .returning();
      return row;
    });
  }

  async insertRequisitionItems(values: NewRequisitionItem[]): Promise<RequisitionItemRow[]> {
    if (values.length === 0) return [];
    const rows = await this.conn
      .insert(requisitionItems)
      .values(values.map((v) => ({ ...v, qtyApproved: null })))
      .returning();
    return rows.sort((a, b) => a.lineNumber - b.lineNumber);
  }

  async lockRequisition(id: string): Promise<RequisitionRow | null> {
    const [row] = await this.conn
      .select()
      .from(requisitions)
      .where(eq(requisitions.id, id))
      .for('update');
    return row ?? null;
  }

  async listRequisitionItems(requisitionId: string): Promise<RequisitionItemRow[]> {
    return this.conn
      .select()
      .from(requisitionItems)
      .where(eq(requisitionItems.requisitionId, requisitionId))
      .orderBy(asc(requisitionItems.lineNumber));
  }

  async lockInventoryItems(ids: string[]): Promise<InventoryItemRow[]> {
    if (ids.length === 0) return [];
    return this.conn
      .select()
      .from(inventoryItems)
      .where(inArray(inventoryItems.id, ids))
      .orderBy(asc(inventoryItems.id))
      .for('update');
  }

  async setInventoryStock(id: string, stock: number, updatedAt: Date): Promise<void> {
    await this.conn
      .update(inventoryItems)
      .set({ stock, updatedAt })
      .where(eq(inventoryItems.id, id));
  }

  async setApprovedQuantity(requisitionItemId: string, qtyApproved: number): Promise<void> {
    await this.conn
      .update(requisitionItems)
      .set({ qtyApproved })
      .where(eq(requisitionItems.id, requisitionItemId));
  }

  async setRequisitionStatus(id: string, status: RequisitionStatus, updatedAt: Date): Promise<RequisitionRow> {
    const [row] = await this.conn
      .update(requisitions)
      .set({ status, updatedAt })
      .where(eq(requisitions.id, id))
      .returning();
    return row;
  }

  async insertApproval(values: NewApproval): Promise<ApprovalRow> {
    const [row] = await this.conn.insert(approvals).values(values).returning();
    return row;
  }

  async appendAudit(entry: AuditEntryInput): Promise<void> {
    await writeAuditEntry(this.conn, entry);
  }

  async insertUser(values: NewUser): Promise<UserRow> {
    return insertUnique(this.conn, async (sp) => {
      const [row] = await sp.insert(users).values(values).returning();
      return row;
    });
  }

  async updateUser(id: string, patch: UserPatch, updatedAt: Date): Promise<UserRow | null> {
    const [row] = await this.conn
      .update(users)
      .set({ ...patch, updatedAt })
      .where(eq(users.id, id))
      .returning();
    return row ?? null;
  }

  async insertArea(values: NewArea): Promise<AreaRow> {
    return insertUnique(this.conn, async (sp) => {
      const [row] = await sp.insert(areas).values(values).returning();
      return row;
    });
  }

  async insertMachine(values: NewMachine): Promise<MachineRow> {
    return insertUnique(this.conn, async (sp) => {
      const [row] = await sp.insert(machines).values(values).returning();
      return row;
    });
  }

  async insertInventoryItem(values: NewInventoryItem): Promise<InventoryItemRow> {
    return insertUnique(this.conn, async (sp) => {
      const [row] = await sp.insert(inventoryItems).values(values).returning();
      return row;
    });
  }
}

// ─── Store ────────────────────────────────────────────────────────────

export interface DrizzleStoreOptions {
  /** `lock_timeout` applied to every transaction, in milliseconds. */
  lockTimeoutMs: number;
}

export class DrizzleRequisitionStore extends DrizzleReads implements RequisitionStore {
  constructor(
    private readonly database: Database = defaultDb,
    private readonly options: DrizzleStoreOptions = { lockTimeoutMs: 5000 },
  ) {
    super(database);
  }

  async transaction<T>(work: (tx: RequisitionStoreTx) => Promise<T>): Promise<T> {
    return this.database.transaction(async (tx) => {
      await setLockTimeout(tx, this.options.lockTimeoutMs);
      return work(new DrizzleStoreTx(tx));
    });
  }

  async listRequisitions(filter: RequisitionFilter): Promise<RequisitionDetail[]> {
    const conditions: SQL[] = [];
    if (filter.requesterId) conditions.push(eq(requisitions.requesterId, filter.requesterId));
    if (filter.status) conditions.push(eq(requisitions.status, filter.status));

    const direction = filter.order === 'newest' ? desc : asc;

    return this.database.query.requisitions.findMany({
      where: conditions.length > 0 ? and(...conditions) : undefined,
      with: {
        requester: { columns: { id: true, username: true, fullName: true, role: true } },
        machine: true,
        area: true,
        items: { with: { inventoryItem: true }, orderBy: [asc(requisitionItems.lineNumber)] },
        approvals: { orderBy: [asc(approvals.createdAt)] },
      },
      orderBy: [direction(requisitions.createdAt), direction(requisitions.code)],
      limit: filter.limit,
    });
  }

  async findInventoryItem(id: string): Promise<InventoryItemRow | null> {
    const [row] = await this.database
      .select()
      .from(inventoryItems)
      .where(eq(inventoryItems.id, id))
      .limit(1);
    return row ?? null;
  }

  async listInventoryItems(): Promise<InventoryItemRow[]> {
    return this.database.select().from(inventoryItems).orderBy(asc(inventoryItems.sku));
  }

  async findUserByUsername(username: string): Promise<UserRow | null> {
    const [row] = await this.database
      .select()
      .from(users)
      .where(eq(users.username, username))
      .limit(1);
    return row ?? null;
  }

  async listUsers(): Promise<UserRow[]> {
    return this.database.select().from(users).orderBy(asc(users.username));
  }

  async listAreas(): Promise<AreaRow[]> {
    return this.database.select().from(areas).orderBy(asc(areas.code));
  }

  async listMachines(): Promise<MachineRow[]> {
    return this.database.select().from(machines).orderBy(asc(machines.code));
  }

  async ping(): Promise<void> {
    await this.database.execute(sql`SELECT 1`);
  }

  async verifyAuditChain(): Promise<AuditChainBreak[]> {
    return verifyAuditChain(this.database);
  }
}
