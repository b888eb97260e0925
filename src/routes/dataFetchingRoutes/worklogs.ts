// server/src/routes/dataFetchingRoutes/worklogs.ts
import { Request, Response, Express } from 'express';
import { and, count, desc, eq, gte, like, lte, SQL } from 'drizzle-orm';
import { z } from 'zod';
import { db } from '../../db/db';
import { employeeWorklog } from '../../db/schema';
import { verifyToken } from '../../middleware/verifyToken';
import { containsPattern, dateRangeSchema, paginationSchema } from '../../lib/listQuery';
import { sendError } from '../../lib/respond';
import { VALIDATION_RESULTS } from '../../utils/worklogValidation';

const listQuerySchema = paginationSchema
  .extend({
    orderNo: z.string().trim().min(1).optional(),
    employeeId: z.string().trim().min(1).optional(),
    validationResult: z.enum(VALIDATION_RESULTS).optional(),
  })
  .and(dateRangeSchema);

export default function setupWorklogRoutes(app: Express) {
  const ENDPOINT = 'worklogs';
  const TABLE_NAME = 'Employee Worklog';

  const buildWhere = (q: z.infer<typeof listQuerySchema>): SQL | undefined => {
    const conds: SQL[] = [];

    if (q.orderNo) conds.push(like(employeeWorklog.orderNo, containsPattern(q.orderNo)));
    if (q.employeeId) conds.push(eq(employeeWorklog.employeeId, q.employeeId));
    if (q.validationResult) conds.push(eq(employeeWorklog.validationResult, q.validationResult));

    // Filter: Date Range (using workDate)
    if (q.startDate) conds.push(gte(employeeWorklog.workDate, q.startDate));
    if (q.endDate) conds.push(lte(employeeWorklog.workDate, q.endDate));

    if (conds.length === 0) return undefined;
    return conds.length === 1 ? conds[0] : and(...conds);
  };

  // -------------------------------------------------------
  // 1. GET ALL (with pagination and filtering)
  // -------------------------------------------------------
  app.get(`/api/${ENDPOINT}`, verifyToken, async (req: Request, res: Response) => {
    try {
      const q = listQuerySchema.parse(req.query);
      const where = buildWhere(q);

      const [{ total }] = await db.select({ total: count() }).from(employeeWorklog).where(where);

      const data = await db
        .select()
        .from(employeeWorklog)
        .where(where)
        .orderBy(desc(employeeWorklog.workDate), desc(employeeWorklog.id))
        .limit(q.pageSize)
        .offset((q.page - 1) * q.pageSize);

      res.json({ success: true, total, page: q.page, pageSize: q.pageSize, data });
    } catch (error) {
      sendError(res, error, `Get ${TABLE_NAME} list`);
    }
  });

  // -------------------------------------------------------
  // 2. GET BY ORDER NUMBER (exact)
  // -------------------------------------------------------
  app.get(`/api/${ENDPOINT}/:orderNo`, verifyToken, async (req: Request, res: Response) => {
    try {
      const { orderNo } = req.params;

      const data = await db
        .select()
        .from(employeeWorklog)
        .where(eq(employeeWorklog.orderNo, orderNo))
        .orderBy(desc(employeeWorklog.workDate), desc(employeeWorklog.id));

      res.json({ success: true, count: data.length, data });
    } catch (error) {
      sendError(res, error, `Get ${TABLE_NAME} by order`);
    }
  });

  console.log(`✅ ${TABLE_NAME} GET endpoints setup complete`);
}
