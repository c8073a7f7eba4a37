/**
 * Inventory Ledger Service
 *
 * Reads and transaction-safe decrements of inventory stock. Stock changes
 * only here, and only inside a store transaction that holds the row lock.
 */

import type { InventoryItemRow, RequisitionStore, RequisitionStoreTx } from '@stockroom/db';
import { ValidationError } from '../middleware/error-handler.js';

// ─── Types ────────────────────────────────────────────────────────────

export interface LedgerContext {
  at: Date;
  userId?: string;
  requisitionId?: string;
  requisitionCode?: string;
  ipAddress?: string;
  userAgent?: string;
}

export interface DecrementResult {
  inventoryItemId: string;
  previousStock: number;
  newStock: number;
  /** What was actually taken from stock: min(requested, previous stock). */
  decremented: number;
  /** Requested minus decremented; positive when stock ran short. */
  shortfall: number;
}

// ─── Read Operations ──────────────────────────────────────────────────

/** Plain read, no lock. */
export async function getStock(
  store: Pick<RequisitionStore, 'findInventoryItem'>,
  inventoryItemId: string,
): Promise<InventoryItemRow | null> {
  return store.findInventoryItem(inventoryItemId);
}

// ─── Write Operations ─────────────────────────────────────────────────

/**
 * Lock the given rows in ascending id order so that decisions over
 * overlapping item sets always lock in the same order.
 */
export async function lockStock(
  tx: RequisitionStoreTx,
  inventoryItemIds: string[],
): Promise<Map<string, InventoryItemRow>> {
  const ids = [...new Set(inventoryItemIds)].sort();
  const rows = await tx.lockInventoryItems(ids);
  const byId = new Map(rows.map((row) => [row.id, row]));

  const unknownIds = ids.filter((id) => !byId.has(id));
  if (unknownIds.length > 0) {
    throw new ValidationError('UNKNOWN_INVENTORY_ITEM', 'Unknown inventory item', { unknownIds });
  }
  return byId;
}

/**
 * Take up to `qty` from an item's stock, never going below zero, and report
 * any shortfall. Writes an `inventory.decremented` audit entry in the same
 * transaction when stock actually changed.
 */
export async function decrementStock(
  tx: RequisitionStoreTx,
  inventoryItemId: string,
  qty: number,
  context: LedgerContext,
): Promise<DecrementResult> {
  if (!Number.isFinite(qty) || qty < 0) {
    throw new ValidationError('INVALID_QUANTITY', 'Decrement quantity must be a finite, non-negative number', {
      inventoryItemId,
      qty,
    });
  }

  const [row] = await tx.lockInventoryItems([inventoryItemId]);
  if (!row) {
    throw new ValidationError('UNKNOWN_INVENTORY_ITEM', 'Unknown inventory item', {
      unknownIds: [inventoryItemId],
    });
  }

  const previousStock = row.stock;
  const decremented = Math.min(qty, previousStock);
  const newStock = previousStock - decremented;
  const result: DecrementResult = {
    inventoryItemId,
    previousStock,
    newStock,
    decremented,
    shortfall: qty - decremented,
  };

  if (decremented === 0) return result;

  await tx.setInventoryStock(inventoryItemId, newStock, context.at);
  await tx.appendAudit({
    userId: context.userId ?? null,
    action: 'inventory.decremented',
    entityType: 'inventory_item',
    entityId: inventoryItemId,
    previousState: { stock: previousStock },
    newState: { stock: newStock },
    metadata: {
      sku: row.sku,
      requested: qty,
      decremented,
      shortfall: result.shortfall,
      ...(context.requisitionId ? { requisitionId: context.requisitionId } : {}),
      ...(context.requisitionCode ? { requisitionCode: context.requisitionCode } : {}),
    },
    ipAddress: context.ipAddress ?? null,
    userAgent: context.userAgent ?? null,
    timestamp: context.at,
  });

  return result;
}
