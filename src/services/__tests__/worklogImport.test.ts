import { describe, it, expect, vi, beforeEach } from 'vitest';
import { importWorklogBatch, WorklogImportRow } from '../worklogImport';
import { ValidationResult } from '../../utils/worklogValidation';

// Each select() answers with the next queued result set
const store = vi.hoisted(() => ({
  selects: [] as Record<string, unknown>[][],
  inserted: [] as Record<string, unknown>[][],
}));

vi.mock('../../db/db', () => {
  const tx = {
    select: () => ({ from: () => ({ where: async () => store.selects.shift() ?? [] }) }),
    insert: () => ({
      values: (rows: Record<string, unknown>[]) => {
        store.inserted.push(rows);
        return { returning: async () => rows.map((_, i) => ({ id: i + 1 })) };
      },
    }),
  };
  return { db: { transaction: async <T>(run: (t: typeof tx) => Promise<T>) => run(tx) } };
});

const line = {
  id: 7,
  orderNo: '2516572',
  model: 'M1',
  brandNo: 'B1',
  jobType: '钝化',
  quantity: 100,
  uploadDate: new Date('2025-11-01T00:00:00Z'),
};

const row = (overrides: Partial<WorklogImportRow> = {}): WorklogImportRow => ({
  orderNo: '2516572',
  employeeId: 'E001',
  employeeName: '张三',
  jobType: '钝化',
  quantity: 50,
  performanceFactor: 1.2,
  workDate: new Date('2025-11-08T02:00:00Z'),
  ...overrides,
});

describe('importWorklogBatch', () => {
  beforeEach(() => {
    store.selects = [];
    store.inserted = [];
  });

  it('stores every row with its computed result', async () => {
    // production lines, then stored worklogs
    store.selects = [[line], []];
    const uploadDate = new Date('2025-11-09T00:00:00Z');

    const summary = await importWorklogBatch(
      [row(), row(), row({ orderNo: '9999999' }), row({ employeeId: 'E002', quantity: -1 })],
      uploadDate,
    );

    expect(summary.received).toBe(4);
    expect(summary.inserted).toBe(3);
    expect(summary.results[ValidationResult.PASSED]).toBe(1);
    expect(summary.results[ValidationResult.DUPLICATE]).toBe(1);
    expect(summary.results[ValidationResult.UNMATCHED]).toBe(1);
    expect(summary.unmatched).toEqual([{ index: 2, message: 'No production info for order 9999999 / 钝化' }]);
    expect(summary.rejected).toEqual([
      { index: 3, error: 'quantity must be a positive integer, got -1', details: { field: 'quantity', value: -1 } },
    ]);

    expect(store.inserted[0][0]).toEqual({
      orderNo: '2516572',
      model: null,
      brandNo: null,
      employeeId: 'E001',
      employeeName: '张三',
      jobType: '钝化',
      quantity: 50,
      performanceFactor: '1.20',
      performanceAmount: '60.00',
      workDate: new Date('2025-11-08T02:00:00Z'),
      uploadDate,
      validationResult: ValidationResult.PASSED,
    });
    expect(store.inserted[0].map((r) => r.validationResult)).toEqual([
      ValidationResult.PASSED,
      ValidationResult.DUPLICATE,
      ValidationResult.UNMATCHED,
    ]);
  });

  it('treats worklogs stored earlier the same day as duplicates', async () => {
    const stored = {
      orderNo: '2516572',
      model: null,
      brandNo: null,
      employeeId: 'E001',
      jobType: '钝化',
      quantity: 50,
      performanceFactor: '1.20',
      workDate: new Date('2025-11-07T23:00:00Z'),
      validationResult: ValidationResult.PASSED,
    };
    store.selects = [[line], [stored]];

    const summary = await importWorklogBatch([row()]);

    expect(summary.results[ValidationResult.DUPLICATE]).toBe(1);
    expect(summary.results[ValidationResult.PASSED]).toBe(0);
  });
});
