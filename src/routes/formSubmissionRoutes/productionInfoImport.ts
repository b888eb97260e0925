// server/src/routes/formSubmissionRoutes/productionInfoImport.ts
import { Request, Response, Express } from 'express';
import { z } from 'zod';
import { insertProductionInfoSchema } from '../../db/schema';
import { getConfig } from '../../config/env';
import { verifyToken } from '../../middleware/verifyToken';
import { sendError, zodDetails } from '../../lib/respond';
import { importProductionBatch } from '../../services/productionImport';
import { startOfBusinessDay } from '../../utils/businessDay';

export const MAX_BATCH_ROWS = 5000;

// Numbers are only type-checked here; non-positive values are rejected per row by the import.
const productionRowSchema = insertProductionInfoSchema
  .pick({ orderNo: true, model: true, brandNo: true, jobType: true })
  .extend({
    quantity: z.number(),
    performanceFactor: z.union([z.number(), z.string()]).default(1),
    worklogNo: z.string().optional(),
    uploadDate: z.coerce.date().optional(),
    docDate: z.coerce.date().optional(),
  });

const productionImportSchema = z.object({
  rows: z.array(productionRowSchema).min(1, 'At least one row is required').max(MAX_BATCH_ROWS),
});

/**
 * POST /api/production-info/import
 * - Inserts order lines; rows whose (order, model, brand, job type, upload date) already exist are skipped.
 * - uploadDate defaults to the start of the current business day, so re-sending a sheet the same day is a no-op.
 */
export default function setupProductionInfoImportRoute(app: Express) {
  app.post('/api/production-info/import', verifyToken, async (req: Request, res: Response) => {
    try {
      const validationResult = productionImportSchema.safeParse(req.body);
      if (!validationResult.success) {
        return res.status(400).json({
          success: false,
          error: 'Validation failed for production info import.',
          details: zodDetails(validationResult.error),
        });
      }

      const today = startOfBusinessDay(new Date(), getConfig().businessUtcOffsetMinutes);
      const rows = validationResult.data.rows.map((r) => ({ ...r, uploadDate: r.uploadDate ?? today }));

      const summary = await importProductionBatch(rows);

      res.status(201).json({
        success: true,
        message: `Imported ${summary.inserted} of ${summary.received} production rows.`,
        data: summary,
      });
    } catch (error) {
      sendError(res, error, 'Production info import');
    }
  });

  console.log('✅ Production Info import endpoint setup complete');
}
