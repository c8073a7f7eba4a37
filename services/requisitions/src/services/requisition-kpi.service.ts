import type { RequisitionDetail } from '@stockroom/db';
import type { RequisitionKpis, RequisitionStatus } from '@stockroom/shared-types';

const TOP_ITEMS_LIMIT = 10;
const MS_PER_HOUR = 3_600_000;

function emptyStatusCounts(): Record<RequisitionStatus, number> {
  return { pending: 0, approved: 0, partially_approved: 0, rejected: 0, cancelled: 0 };
}

/**
 * Summary over a history window: counts per status, mean hours from creation
 * to the first approval (two decimals; rejections do not count), and the
 * most requested items by total requested quantity.
 */
export function computeRequisitionKpis(requisitions: RequisitionDetail[]): RequisitionKpis {
  const byStatus = emptyStatusCounts();
  const approvalHours: number[] = [];
  const requested = new Map<string, RequisitionKpis['topRequestedItems'][number]>();

  for (const requisition of requisitions) {
    byStatus[requisition.status] += 1;

    const firstApproval = requisition.approvals
      .filter((approval) => approval.approved)
      .reduce<Date | null>(
        (earliest, approval) => (!earliest || approval.createdAt < earliest ? approval.createdAt : earliest),
        null,
      );
    if (firstApproval) {
      approvalHours.push((firstApproval.getTime() - requisition.createdAt.getTime()) / MS_PER_HOUR);
    }

    for (const item of requisition.items) {
      const entry = requested.get(item.inventoryItemId) ?? {
        inventoryItemId: item.inventoryItemId,
        sku: item.inventoryItem.sku,
        description: item.inventoryItem.description,
        totalRequested: 0,
      };
      entry.totalRequested += item.qtyRequested;
      requested.set(item.inventoryItemId, entry);
    }
  }

  const averageApprovalHours =
    approvalHours.length === 0
      ? null
      : Math.round((approvalHours.reduce((sum, h) => sum + h, 0) / approvalHours.length) * 100) / 100;

  const topRequestedItems = [...requested.values()]
    .sort((a, b) => b.totalRequested - a.totalRequested || a.sku.localeCompare(b.sku))
    .slice(0, TOP_ITEMS_LIMIT);

  return { total: requisitions.length, byStatus, averageApprovalHours, topRequestedItems };
}
