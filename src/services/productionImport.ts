// server/src/services/productionImport.ts
import { inArray } from 'drizzle-orm';
import { db } from '../db/db';
import { productionInfo } from '../db/schema';
import { planProductionImport, productionKey, ProductionRowInput } from '../utils/productionDedup';

const INSERT_CHUNK_SIZE = 500;

export interface ProductionImportSummary {
  received: number;
  inserted: number;
  skippedDuplicates: number;
  duplicates: { index: number; message: string }[];
  rejected: { index: number; error: string; details: Record<string, unknown> }[];
}

/**
 * Inserts an order sheet, skipping rows whose unique key is already stored.
 * Runs in one transaction: a database failure rolls back the whole sheet.
 */
export async function importProductionBatch(rows: ProductionRowInput[]): Promise<ProductionImportSummary> {
  return db.transaction(async (tx) => {
    const orderNos = [...new Set(rows.map((r) => r.orderNo.trim()).filter(Boolean))];

    const existing = orderNos.length
      ? await tx
          .select({
            orderNo: productionInfo.orderNo,
            model: productionInfo.model,
            brandNo: productionInfo.brandNo,
            jobType: productionInfo.jobType,
            uploadDate: productionInfo.uploadDate,
          })
          .from(productionInfo)
          .where(inArray(productionInfo.orderNo, orderNos))
      : [];

    const plan = planProductionImport(rows, existing.map(productionKey));

    let inserted = 0;
    for (let i = 0; i < plan.toInsert.length; i += INSERT_CHUNK_SIZE) {
      const chunk = plan.toInsert.slice(i, i + INSERT_CHUNK_SIZE).map((r) => r.values);
      const ids = await tx
        .insert(productionInfo)
        .values(chunk)
        .onConflictDoNothing({
          target: [
            productionInfo.orderNo,
            productionInfo.model,
            productionInfo.brandNo,
            productionInfo.jobType,
            productionInfo.uploadDate,
          ],
        })
        .returning({ id: productionInfo.id });
      inserted += ids.length;
    }

    // rows another import stored between our read and our insert
    const raced = plan.toInsert.length - inserted;
    const skippedDuplicates = plan.duplicates.length + raced;

    console.log(
      `📦 Production import: ${rows.length} received, ${inserted} inserted, ${skippedDuplicates} already present, ${plan.rejected.length} rejected`,
    );

    return {
      received: rows.length,
      inserted,
      skippedDuplicates,
      duplicates: plan.duplicates.map((d) => ({ index: d.index, message: d.error.message })),
      rejected: plan.rejected.map((r) => ({ index: r.index, error: r.error.message, details: r.error.details })),
    };
  });
}
