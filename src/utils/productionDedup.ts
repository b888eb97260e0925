// server/src/utils/productionDedup.ts
import { DuplicateImportError, ValidationError } from '../lib/errors';
import type { NewProductionInfo } from '../db/schema';
import { assertQuantity, normalizeFactor } from './performance';

export interface ProductionRowInput {
  orderNo: string;
  model: string;
  brandNo: string;
  jobType: string;
  quantity: number;
  performanceFactor: number | string;
  worklogNo?: string | null;
  uploadDate: Date;
  /** Document date from the order sheet; becomes created_at/updated_at. */
  docDate?: Date | null;
}

/** (order_no, model, brand_no, job_type, upload_date) */
export function productionKey(row: Pick<ProductionRowInput, 'orderNo' | 'model' | 'brandNo' | 'jobType' | 'uploadDate'>): string {
  return [row.orderNo, row.model, row.brandNo, row.jobType, row.uploadDate.toISOString()].join('\u0000');
}

export interface ProductionImportPlan {
  toInsert: { index: number; key: string; values: NewProductionInfo }[];
  duplicates: { index: number; key: string; error: DuplicateImportError }[];
  rejected: { index: number; error: ValidationError }[];
}

/**
 * Splits an order sheet into rows to insert, rows already present (by unique key,
 * in storage or earlier in the same sheet) and rows with invalid numbers.
 */
export function planProductionImport(rows: readonly ProductionRowInput[], existingKeys: Iterable<string> = []): ProductionImportPlan {
  const seen = new Set(existingKeys);
  const plan: ProductionImportPlan = { toInsert: [], duplicates: [], rejected: [] };

  rows.forEach((raw, index) => {
    const row = {
      ...raw,
      orderNo: raw.orderNo.trim(),
      model: raw.model.trim(),
      brandNo: raw.brandNo.trim(),
      jobType: raw.jobType.trim(),
    };

    if (!row.orderNo || !row.jobType) {
      plan.rejected.push({ index, error: new ValidationError('order_no and job_type are required', { index }) });
      return;
    }

    let performanceFactor: string;
    try {
      assertQuantity(row.quantity);
      performanceFactor = normalizeFactor(row.performanceFactor);
    } catch (error) {
      if (error instanceof ValidationError) {
        plan.rejected.push({ index, error });
        return;
      }
      throw error;
    }

    const key = productionKey(row);
    if (seen.has(key)) {
      plan.duplicates.push({ index, key, error: new DuplicateImportError(key.split('\u0000').join(' / ')) });
      return;
    }
    seen.add(key);

    plan.toInsert.push({
      index,
      key,
      values: {
        orderNo: row.orderNo,
        model: row.model,
        brandNo: row.brandNo,
        jobType: row.jobType,
        quantity: row.quantity,
        worklogNo: row.worklogNo?.trim() ?? '',
        performanceFactor,
        uploadDate: row.uploadDate,
        ...(row.docDate ? { createdAt: row.docDate, updatedAt: row.docDate } : {}),
      },
    });
  });

  return plan;
}
