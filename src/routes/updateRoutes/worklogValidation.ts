// server/src/routes/updateRoutes/worklogValidation.ts
import { Request, Response, Express } from 'express';
import { z } from 'zod';
import { verifyToken } from '../../middleware/verifyToken';
import { sendError, zodDetails } from '../../lib/respond';
import { revalidateRange } from '../../services/revalidation';

const checkSchema = z
  .object({
    startDate: z.coerce.date({ required_error: 'startDate is required' }),
    endDate: z.coerce.date({ required_error: 'endDate is required' }),
  })
  .refine((v) => v.startDate.getTime() <= v.endDate.getTime(), {
    message: 'startDate must not be later than endDate',
    path: ['startDate'],
  });

/**
 * POST /api/validation/check
 * Re-runs matching and scoring for every worklog dated in the range and writes the results back.
 */
export default function setupWorklogValidationRoutes(app: Express) {
  app.post('/api/validation/check', verifyToken, async (req: Request, res: Response) => {
    try {
      const parsed = checkSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, error: 'Invalid date range', details: zodDetails(parsed.error) });
      }

      const report = await revalidateRange(parsed.data.startDate, parsed.data.endDate);
      return res.json({ success: true, data: report });
    } catch (error) {
      return sendError(res, error, 'Worklog validation');
    }
  });

  console.log('✅ Worklog validation endpoint setup complete');
}
