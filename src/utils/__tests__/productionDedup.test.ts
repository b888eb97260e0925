import { describe, it, expect } from 'vitest';
import { planProductionImport, ProductionRowInput } from '../productionDedup';
import { DuplicateImportError, InvalidFactorError, InvalidQuantityError } from '../../lib/errors';

const uploadDate = new Date('2025-11-07T16:00:00.000Z');

const row = (overrides: Partial<ProductionRowInput> = {}): ProductionRowInput => ({
  orderNo: ' 2516572 ',
  model: 'M1',
  brandNo: 'B1',
  jobType: '钝化',
  quantity: 100,
  performanceFactor: 1.2,
  uploadDate,
  ...overrides,
});

describe('planProductionImport', () => {
  it('normalizes the values it will insert', () => {
    const plan = planProductionImport([row()]);
    expect(plan.toInsert).toHaveLength(1);
    expect(plan.toInsert[0].values).toEqual({
      orderNo: '2516572',
      model: 'M1',
      brandNo: 'B1',
      jobType: '钝化',
      quantity: 100,
      worklogNo: '',
      performanceFactor: '1.20',
      uploadDate,
    });
  });

  it('skips rows already stored, so a re-import inserts nothing', () => {
    const first = planProductionImport([row()]);
    const again = planProductionImport([row()], first.toInsert.map((r) => r.key));

    expect(again.toInsert).toHaveLength(0);
    expect(again.duplicates).toHaveLength(1);
    expect(again.duplicates[0].error).toBeInstanceOf(DuplicateImportError);
    expect(again.duplicates[0].error.message).toBe(
      'Production info already imported: 2516572 / M1 / B1 / 钝化 / 2025-11-07T16:00:00.000Z',
    );
  });

  it('skips repeats within the same sheet', () => {
    const plan = planProductionImport([row(), row({ quantity: 80 })]);
    expect(plan.toInsert.map((r) => r.index)).toEqual([0]);
    expect(plan.duplicates.map((r) => r.index)).toEqual([1]);
  });

  it('keeps the same line uploaded on another day', () => {
    const plan = planProductionImport([row(), row({ uploadDate: new Date('2025-11-08T16:00:00.000Z') })]);
    expect(plan.toInsert).toHaveLength(2);
  });

  it('rejects rows with bad numbers or missing keys', () => {
    const plan = planProductionImport([
      row({ quantity: 0 }),
      row({ performanceFactor: -1 }),
      row({ jobType: '  ' }),
    ]);

    expect(plan.toInsert).toHaveLength(0);
    expect(plan.rejected[0].error).toBeInstanceOf(InvalidQuantityError);
    expect(plan.rejected[1].error).toBeInstanceOf(InvalidFactorError);
    expect(plan.rejected[2].error.message).toBe('order_no and job_type are required');
  });

  it('uses the document date as the creation time', () => {
    const docDate = new Date('2025-11-02T16:00:00.000Z');
    const [planned] = planProductionImport([row({ docDate, worklogNo: ' W01 ' })]).toInsert;
    expect(planned.values.createdAt).toEqual(docDate);
    expect(planned.values.updatedAt).toEqual(docDate);
    expect(planned.values.worklogNo).toBe('W01');
  });
});
