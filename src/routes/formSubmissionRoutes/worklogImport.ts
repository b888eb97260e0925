// server/src/routes/formSubmissionRoutes/worklogImport.ts
import { Request, Response, Express } from 'express';
import { z } from 'zod';
import { insertEmployeeWorklogSchema } from '../../db/schema';
import { verifyToken } from '../../middleware/verifyToken';
import { sendError, zodDetails } from '../../lib/respond';
import { importWorklogBatch } from '../../services/worklogImport';
import { MAX_BATCH_ROWS } from './productionInfoImport';

const worklogRowSchema = insertEmployeeWorklogSchema
  .pick({ orderNo: true, employeeId: true, jobType: true })
  .extend({
    model: z.string().nullish(),
    brandNo: z.string().nullish(),
    employeeName: z.string().nullish(),
    quantity: z.number(),
    performanceFactor: z.union([z.number(), z.string()]),
    workDate: z.coerce.date(),
  });

const worklogImportSchema = z.object({
  rows: z.array(worklogRowSchema).min(1, 'At least one row is required').max(MAX_BATCH_ROWS),
});

/**
 * POST /api/worklogs/import
 * - Computes performanceAmount and validationResult for every row and stores the batch.
 * - Duplicate and unmatched rows are stored tagged; rows with bad numbers are listed in `rejected`.
 */
export default function setupWorklogImportRoute(app: Express) {
  app.post('/api/worklogs/import', verifyToken, async (req: Request, res: Response) => {
    try {
      const validationResult = worklogImportSchema.safeParse(req.body);
      if (!validationResult.success) {
        return res.status(400).json({
          success: false,
          error: 'Validation failed for worklog import.',
          details: zodDetails(validationResult.error),
        });
      }

      const rows = validationResult.data.rows.map((r) => ({
        ...r,
        orderNo: r.orderNo.trim(),
        employeeId: r.employeeId.trim(),
        jobType: r.jobType.trim(),
      }));

      const summary = await importWorklogBatch(rows);

      res.status(201).json({
        success: true,
        message: `Stored ${summary.inserted} of ${summary.received} worklog rows.`,
        data: summary,
      });
    } catch (error) {
      sendError(res, error, 'Worklog import');
    }
  });

  console.log('✅ Worklog import endpoint setup complete');
}
