import { config } from '@stockroom/config';
import type { InventoryItemRow, RequisitionDetail, RequisitionStore } from '@stockroom/db';
import { AppError, notFound } from '../middleware/error-handler.js';

/** Read-only projections over the store; none of these take locks. */

export async function getRequisition(store: RequisitionStore, id: string): Promise<RequisitionDetail> {
  const requisition = await store.findRequisition(id);
  if (!requisition) throw notFound('Requisition', id);
  return requisition;
}

/** The requester's own requisitions, newest first. */
export async function listByRequester(store: RequisitionStore, requesterId: string): Promise<RequisitionDetail[]> {
  return store.listRequisitions({ requesterId, order: 'newest' });
}

/** The approval queue, oldest first. */
export async function listPending(store: RequisitionStore): Promise<RequisitionDetail[]> {
  return store.listRequisitions({ status: 'pending', order: 'oldest' });
}

/**
 * Requisitions newest first, every requester's unless `requesterId` narrows
 * it. `limit` must be an integer between 1 and HISTORY_MAX_LIMIT; it defaults
 * to HISTORY_DEFAULT_LIMIT.
 */
export async function listHistory(
  store: RequisitionStore,
  limit: number = config.HISTORY_DEFAULT_LIMIT,
  requesterId?: string,
): Promise<RequisitionDetail[]> {
  if (!Number.isInteger(limit) || limit < 1 || limit > config.HISTORY_MAX_LIMIT) {
    throw new AppError(400, `limit must be an integer between 1 and ${config.HISTORY_MAX_LIMIT}`, 'INVALID_REQUEST', {
      limit,
    });
  }
  return store.listRequisitions({ order: 'newest', limit, ...(requesterId !== undefined && { requesterId }) });
}

/** All inventory items ordered by SKU. */
export async function getInventory(store: RequisitionStore): Promise<InventoryItemRow[]> {
  return store.listInventoryItems();
}
