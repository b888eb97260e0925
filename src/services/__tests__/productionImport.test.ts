import { describe, it, expect, vi, beforeEach } from 'vitest';
import { importProductionBatch } from '../productionImport';
import type { ProductionRowInput } from '../../utils/productionDedup';

// In-process stand-in for the drizzle transaction the import runs in
const store = vi.hoisted(() => ({
  existing: [] as Record<string, unknown>[],
  inserted: [] as Record<string, unknown>[][],
}));

vi.mock('../../db/db', () => {
  const tx = {
    select: () => ({ from: () => ({ where: async () => store.existing }) }),
    insert: () => ({
      values: (rows: Record<string, unknown>[]) => {
        store.inserted.push(rows);
        const chain = {
          onConflictDoNothing: () => chain,
          returning: async () => rows.map((_, i) => ({ id: i + 1 })),
        };
        return chain;
      },
    }),
  };
  return { db: { transaction: async <T>(run: (t: typeof tx) => Promise<T>) => run(tx) } };
});

const uploadDate = new Date('2025-11-07T16:00:00.000Z');

const row = (overrides: Partial<ProductionRowInput> = {}): ProductionRowInput => ({
  orderNo: '2516572',
  model: 'M1',
  brandNo: 'B1',
  jobType: '钝化',
  quantity: 100,
  performanceFactor: 1.2,
  uploadDate,
  ...overrides,
});

describe('importProductionBatch', () => {
  beforeEach(() => {
    store.existing = [];
    store.inserted = [];
  });

  it('inserts new lines and reports repeats and bad rows', async () => {
    const summary = await importProductionBatch([row(), row(), row({ orderNo: '2516573', quantity: 0 })]);

    expect(summary).toEqual({
      received: 3,
      inserted: 1,
      skippedDuplicates: 1,
      duplicates: [
        { index: 1, message: 'Production info already imported: 2516572 / M1 / B1 / 钝化 / 2025-11-07T16:00:00.000Z' },
      ],
      rejected: [
        { index: 2, error: 'quantity must be a positive integer, got 0', details: { field: 'quantity', value: 0 } },
      ],
    });
    expect(store.inserted).toHaveLength(1);
    expect(store.inserted[0][0]).toMatchObject({ orderNo: '2516572', performanceFactor: '1.20', worklogNo: '' });
  });

  it('inserts nothing when the same sheet is imported again', async () => {
    store.existing = [{ orderNo: '2516572', model: 'M1', brandNo: 'B1', jobType: '钝化', uploadDate }];

    const summary = await importProductionBatch([row()]);

    expect(summary.inserted).toBe(0);
    expect(summary.skippedDuplicates).toBe(1);
    expect(store.inserted).toHaveLength(0);
  });
});
