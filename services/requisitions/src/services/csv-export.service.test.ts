import { describe, it, expect } from 'vitest';
import { Readable } from 'node:stream';
import {
  HISTORY_EXPORT_HEADERS,
  createCSVStream,
  generateExportFilename,
  sanitizeCSVCell,
  sanitizeCSVRow,
  toHistoryExportRows,
} from './csv-export.service.js';
import { seedWarehouse } from '../test/fixtures.js';

async function collect(stream: NodeJS.ReadableStream): Promise<string> {
  let out = '';
  for await (const chunk of stream) {
    out += chunk.toString();
  }
  return out;
}

describe('CSV Export Service', () => {
  describe('sanitizeCSVCell', () => {
    it('should return empty string for null and undefined', () => {
      expect(sanitizeCSVCell(null)).toBe('');
      expect(sanitizeCSVCell(undefined)).toBe('');
    });

    it('should prefix formula triggers with a single quote', () => {
      expect(sanitizeCSVCell('=SUM(A1:A10)')).toBe("'=SUM(A1:A10)");
      expect(sanitizeCSVCell('+cmd|calc')).toBe("'+cmd|calc");
      expect(sanitizeCSVCell('-5')).toBe("'-5");
      expect(sanitizeCSVCell('@SUM(A1)')).toBe("'@SUM(A1)");
    });

    it('should leave safe values alone', () => {
      expect(sanitizeCSVCell('Tornillo M8')).toBe('Tornillo M8');
      expect(sanitizeCSVCell('REQ-20260301-0001')).toBe('REQ-20260301-0001');
      expect(sanitizeCSVCell(42)).toBe('42');
      expect(sanitizeCSVCell('total = 3')).toBe('total = 3');
    });

    it('should write dates as ISO 8601', () => {
      expect(sanitizeCSVCell(new Date('2026-03-01T10:00:00.000Z'))).toBe('2026-03-01T10:00:00.000Z');
    });
  });

  describe('sanitizeCSVRow', () => {
    it('should sanitize every value', () => {
      expect(sanitizeCSVRow({ sku: 'SKU-001', description: '=HYPERLINK("x")', qty: 3, area: null })).toEqual({
        sku: 'SKU-001',
        description: '\'=HYPERLINK("x")',
        qty: '3',
        area: '',
      });
    });
  });

  describe('generateExportFilename', () => {
    it('should embed a filesystem-safe timestamp', () => {
      expect(generateExportFilename(new Date('2026-03-01T10:15:30.123Z'))).toBe(
        'requisitions-history-20260301T101530123Z.csv',
      );
    });
  });

  describe('toHistoryExportRows', () => {
    it('should emit one row per line with names resolved', async () => {
      const w = seedWarehouse();
      w.store.addRequisition({
        code: 'REQ-20260301-0001',
        requesterId: w.requester.id,
        machineId: w.press.id,
        areaId: w.areaA1.id,
        status: 'partially_approved',
        createdAt: new Date('2026-03-01T08:00:00.000Z'),
        items: [
          { inventoryItemId: w.filter.id, qtyRequested: 10, qtyApproved: 4 },
          { inventoryItemId: w.bolt.id, qtyRequested: 20, qtyApproved: 0 },
        ],
      });

      const rows = toHistoryExportRows(await w.store.listRequisitions({ order: 'newest' }));

      expect(rows).toEqual([
        {
          code: 'REQ-20260301-0001',
          requester: 'supervisor1',
          area: 'Assembly',
          machine: 'Press',
          sku: 'SKU-001',
          description: 'Filtro',
          qtyRequested: 10,
          qtyApproved: 4,
          status: 'partially_approved',
          createdAt: '2026-03-01T08:00:00.000Z',
        },
        {
          code: 'REQ-20260301-0001',
          requester: 'supervisor1',
          area: 'Assembly',
          machine: 'Press',
          sku: 'SKU-002',
          description: 'Tornillo M8',
          qtyRequested: 20,
          qtyApproved: 0,
          status: 'partially_approved',
          createdAt: '2026-03-01T08:00:00.000Z',
        },
      ]);
    });
  });

  describe('createCSVStream', () => {
    it('should write a BOM, quoted headers and sanitized rows', async () => {
      const rows = [
        { code: 'REQ-20260301-0001', sku: 'SKU-001', note: '=1+1' },
        { code: 'REQ-20260301-0002', sku: 'SKU-002', note: null },
      ];

      const csv = await collect(Readable.from(rows).pipe(createCSVStream(['code', 'sku', 'note'])));

      expect(csv.startsWith('\ufeff')).toBe(true);
      expect(csv.slice(1).split('\n')).toEqual([
        '"code","sku","note"',
        '"REQ-20260301-0001","SKU-001","\'=1+1"',
        '"REQ-20260301-0002","SKU-002",""',
      ]);
    });

    it('should write the history headers even without rows', async () => {
      const csv = await collect(Readable.from([]).pipe(createCSVStream([...HISTORY_EXPORT_HEADERS])));
      expect(csv.replace(/^\ufeff/, '')).toBe(
        '"code","requester","area","machine","sku","description","qtyRequested","qtyApproved","status","createdAt"',
      );
    });
  });
});
