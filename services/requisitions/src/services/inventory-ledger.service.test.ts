import { describe, it, expect, beforeEach } from 'vitest';
import { decrementStock, getStock, lockStock, type LedgerContext } from './inventory-ledger.service.js';
import { FIXED_NOW, seedWarehouse, type Warehouse } from '../test/fixtures.js';

describe('Inventory Ledger Service', () => {
  let w: Warehouse;
  let context: LedgerContext;

  beforeEach(() => {
    w = seedWarehouse();
    context = { at: FIXED_NOW, userId: w.approver.id, requisitionId: 'req-1', requisitionCode: 'REQ-20260301-0001' };
  });

  describe('getStock', () => {
    it('should return the item or null', async () => {
      expect((await getStock(w.store, w.filter.id))?.stock).toBe(50);
      expect(await getStock(w.store, '00000000-0000-0000-0000-000000000000')).toBeNull();
    });
  });

  describe('lockStock', () => {
    it('should lock each item once, in ascending id order', async () => {
      const ids = [w.bolt.id, w.filter.id, w.bolt.id];

      const rows = await w.store.transaction((tx) => lockStock(tx, ids));

      expect(w.store.lockOrder).toEqual([[w.bolt.id, w.filter.id].sort()]);
      expect([...rows.keys()].sort()).toEqual([w.bolt.id, w.filter.id].sort());
    });

    it('should reject unknown items', async () => {
      const missing = 'ffffffff-ffff-ffff-ffff-ffffffffffff';
      await expect(w.store.transaction((tx) => lockStock(tx, [w.filter.id, missing]))).rejects.toMatchObject({
        code: 'UNKNOWN_INVENTORY_ITEM',
        details: { unknownIds: [missing] },
      });
    });
  });

  describe('decrementStock', () => {
    it('should take the full quantity when stock allows', async () => {
      const result = await w.store.transaction((tx) => decrementStock(tx, w.filter.id, 10, context));

      expect(result).toEqual({
        inventoryItemId: w.filter.id,
        previousStock: 50,
        newStock: 40,
        decremented: 10,
        shortfall: 0,
      });
      expect(w.store.stockOf(w.filter.id)).toBe(40);
    });

    it('should stop at zero and report the shortfall', async () => {
      const result = await w.store.transaction((tx) => decrementStock(tx, w.filter.id, 80, context));

      expect(result).toMatchObject({ previousStock: 50, newStock: 0, decremented: 50, shortfall: 30 });
      expect(w.store.stockOf(w.filter.id)).toBe(0);
    });

    it('should write an audit entry with the movement', async () => {
      await w.store.transaction((tx) => decrementStock(tx, w.filter.id, 80, context));

      expect(w.store.audit).toHaveLength(1);
      expect(w.store.audit[0]).toMatchObject({
        sequenceNumber: 1,
        userId: w.approver.id,
        action: 'inventory.decremented',
        entityType: 'inventory_item',
        entityId: w.filter.id,
        previousState: { stock: 50 },
        newState: { stock: 0 },
        metadata: {
          sku: 'SKU-001',
          requested: 80,
          decremented: 50,
          shortfall: 30,
          requisitionId: 'req-1',
          requisitionCode: 'REQ-20260301-0001',
        },
        timestamp: FIXED_NOW,
      });
    });

    it('should leave empty stock and the audit log untouched', async () => {
      const empty = w.store.addInventoryItem({ sku: 'SKU-EMPTY', stock: 0 });

      const result = await w.store.transaction((tx) => decrementStock(tx, empty.id, 5, context));

      expect(result).toMatchObject({ previousStock: 0, newStock: 0, decremented: 0, shortfall: 5 });
      expect(w.store.audit).toHaveLength(0);
    });

    it('should reject negative and non-finite quantities', async () => {
      await expect(w.store.transaction((tx) => decrementStock(tx, w.filter.id, -1, context))).rejects.toMatchObject({
        code: 'INVALID_QUANTITY',
      });
      await expect(
        w.store.transaction((tx) => decrementStock(tx, w.filter.id, Number.NaN, context)),
      ).rejects.toMatchObject({ code: 'INVALID_QUANTITY' });
      expect(w.store.stockOf(w.filter.id)).toBe(50);
    });

    it('should reject an unknown item', async () => {
      const missing = 'ffffffff-ffff-ffff-ffff-ffffffffffff';
      await expect(w.store.transaction((tx) => decrementStock(tx, missing, 1, context))).rejects.toMatchObject({
        code: 'UNKNOWN_INVENTORY_ITEM',
        details: { unknownIds: [missing] },
      });
    });

    it('should roll the stock back when the audit write fails', async () => {
      w.store.failOn('appendAudit', new Error('audit unavailable'));

      await expect(w.store.transaction((tx) => decrementStock(tx, w.filter.id, 10, context))).rejects.toThrow(
        'audit unavailable',
      );
      expect(w.store.stockOf(w.filter.id)).toBe(50);
      expect(w.store.audit).toHaveLength(0);
    });

    it('should serialize concurrent decrements of the same item', async () => {
      const results = await Promise.all(
        [20, 20, 20].map((qty) => w.store.transaction((tx) => decrementStock(tx, w.filter.id, qty, context))),
      );

      expect(results.map((r) => r.decremented).reduce((a, b) => a + b, 0)).toBe(50);
      expect(results.map((r) => r.shortfall).reduce((a, b) => a + b, 0)).toBe(10);
      expect(w.store.stockOf(w.filter.id)).toBe(0);
    });
  });
});
