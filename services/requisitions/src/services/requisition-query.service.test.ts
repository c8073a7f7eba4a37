import { describe, it, expect, beforeEach } from 'vitest';
import { getInventory, getRequisition, listByRequester, listHistory, listPending } from './requisition-query.service.js';
import { seedWarehouse, type Warehouse } from '../test/fixtures.js';

describe('Requisition Query Service', () => {
  let w: Warehouse;

  beforeEach(() => {
    w = seedWarehouse();
    w.store.addRequisition({
      code: 'REQ-20260301-0001',
      requesterId: w.requester.id,
      createdAt: new Date('2026-03-01T08:00:00.000Z'),
      items: [{ inventoryItemId: w.filter.id, qtyRequested: 1 }],
    });
    w.store.addRequisition({
      code: 'REQ-20260301-0002',
      requesterId: w.otherRequester.id,
      status: 'approved',
      createdAt: new Date('2026-03-01T09:00:00.000Z'),
      items: [{ inventoryItemId: w.bolt.id, qtyRequested: 2, qtyApproved: 2 }],
    });
    w.store.addRequisition({
      code: 'REQ-20260301-0003',
      requesterId: w.requester.id,
      createdAt: new Date('2026-03-01T10:00:00.000Z'),
      items: [{ inventoryItemId: w.bolt.id, qtyRequested: 3 }],
    });
  });

  it('should list a requester’s own requisitions newest first', async () => {
    const mine = await listByRequester(w.store, w.requester.id);
    expect(mine.map((r) => r.code)).toEqual(['REQ-20260301-0003', 'REQ-20260301-0001']);
  });

  it('should list pending requisitions oldest first', async () => {
    const pending = await listPending(w.store);
    expect(pending.map((r) => r.code)).toEqual(['REQ-20260301-0001', 'REQ-20260301-0003']);
  });

  it('should list history newest first within the limit', async () => {
    expect((await listHistory(w.store)).map((r) => r.code)).toEqual([
      'REQ-20260301-0003',
      'REQ-20260301-0002',
      'REQ-20260301-0001',
    ]);
    expect((await listHistory(w.store, 2)).map((r) => r.code)).toEqual(['REQ-20260301-0003', 'REQ-20260301-0002']);
  });

  it('should reject limits outside the allowed range', async () => {
    await expect(listHistory(w.store, 0)).rejects.toMatchObject({
      statusCode: 400,
      code: 'INVALID_REQUEST',
      details: { limit: 0 },
    });
    await expect(listHistory(w.store, 501)).rejects.toMatchObject({ code: 'INVALID_REQUEST' });
    await expect(listHistory(w.store, 2.5)).rejects.toMatchObject({ code: 'INVALID_REQUEST' });
  });

  it('should return a requisition with its lines or 404', async () => {
    const [first] = await listPending(w.store);
    const detail = await getRequisition(w.store, first.id);
    expect(detail.items[0].inventoryItem.sku).toBe('SKU-001');
    expect(detail.requester.username).toBe('supervisor1');

    await expect(getRequisition(w.store, 'ffffffff-ffff-ffff-ffff-ffffffffffff')).rejects.toMatchObject({
      statusCode: 404,
      message: 'Requisition not found',
    });
  });

  it('should list inventory by SKU', async () => {
    expect((await getInventory(w.store)).map((item) => [item.sku, item.stock])).toEqual([
      ['SKU-001', 50],
      ['SKU-002', 1000],
    ]);
  });
});
