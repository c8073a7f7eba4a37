/**
 * CSV Export Service
 *
 * Streaming CSV generation for the requisition history export, RFC 4180
 * encoded, with formula injection sanitization.
 */

import { format, type CsvFormatterStream } from '@fast-csv/format';
import type { RequisitionDetail } from '@stockroom/db';

// ─── CSV Sanitization ────────────────────────────────────────────────

/**
 * Prepend a single quote to values beginning with =, +, - or @ so that
 * spreadsheet applications do not evaluate them as formulas.
 */
export function sanitizeCSVCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = value instanceof Date ? value.toISOString() : String(value);
  const firstChar = str.charAt(0);

  if (firstChar === '=' || firstChar === '+' || firstChar === '-' || firstChar === '@') {
    return `'${str}`;
  }

  return str;
}

export function sanitizeCSVRow(row: Record<string, unknown>): Record<string, string> {
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    sanitized[key] = sanitizeCSVCell(value);
  }
  return sanitized;
}

// ─── History Rows ────────────────────────────────────────────────────

export const HISTORY_EXPORT_HEADERS = [
  'code',
  'requester',
  'area',
  'machine',
  'sku',
  'description',
  'qtyRequested',
  'qtyApproved',
  'status',
  'createdAt',
] as const;

export type HistoryExportRow = Record<(typeof HISTORY_EXPORT_HEADERS)[number], string | number | null>;

/** One row per requisition line, in requisition then line order. */
export function toHistoryExportRows(requisitions: RequisitionDetail[]): HistoryExportRow[] {
  return requisitions.flatMap((requisition) =>
    requisition.items.map((item) => ({
      code: requisition.code,
      requester: requisition.requester.username,
      area: requisition.area?.name ?? null,
      machine: requisition.machine?.name ?? null,
      sku: item.inventoryItem.sku,
      description: item.inventoryItem.description,
      qtyRequested: item.qtyRequested,
      qtyApproved: item.qtyApproved,
      status: requisition.status,
      createdAt: requisition.createdAt.toISOString(),
    })),
  );
}

// ─── Filename Generation ─────────────────────────────────────────────

/**
 * Format: requisitions-history-{timestamp}.csv, the timestamp in ISO 8601
 * basic form so the name is filesystem safe.
 */
export function generateExportFilename(at: Date = new Date()): string {
  const timestamp = at.toISOString().replace(/[:.]/g, '').replace(/-/g, '');
  return `requisitions-history-${timestamp}.csv`;
}

// ─── Streaming CSV ───────────────────────────────────────────────────

/**
 * A CSV formatter that sanitizes every row before encoding it. Write row
 * objects in, read UTF-8 CSV (with BOM, for Excel) out.
 *
 * Usage:
 *   Readable.from(rows).pipe(createCSVStream([...HISTORY_EXPORT_HEADERS])).pipe(res);
 */
export function createCSVStream(headers: string[]): CsvFormatterStream<Record<string, unknown>, Record<string, string>> {
  return format<Record<string, unknown>, Record<string, string>>({
    headers,
    writeBOM: true,
    quoteColumns: true,
    quoteHeaders: true,
    alwaysWriteHeaders: true,
    transform: (row: Record<string, unknown>) => sanitizeCSVRow(row),
  });
}
