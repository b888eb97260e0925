// server/src/routes/dataFetchingRoutes/productionInfo.ts
import { Request, Response, Express } from 'express';
import { and, count, desc, eq, gte, like, lte, SQL } from 'drizzle-orm';
import { z } from 'zod';
import { db } from '../../db/db';
import { productionInfo } from '../../db/schema';
import { verifyToken } from '../../middleware/verifyToken';
import { containsPattern, dateRangeSchema, paginationSchema } from '../../lib/listQuery';
import { sendError } from '../../lib/respond';

const listQuerySchema = paginationSchema
  .extend({ orderNo: z.string().trim().min(1).optional() })
  .and(dateRangeSchema);

export default function setupProductionInfoRoutes(app: Express) {
  const ENDPOINT = 'production-info';
  const TABLE_NAME = 'Production Info';

  // Helper to build WHERE clause for filtering
  const buildWhere = (q: z.infer<typeof listQuerySchema>): SQL | undefined => {
    const conds: SQL[] = [];

    // Filter: order number (substring)
    if (q.orderNo) conds.push(like(productionInfo.orderNo, containsPattern(q.orderNo)));

    // Filter: Date Range (using uploadDate)
    if (q.startDate) conds.push(gte(productionInfo.uploadDate, q.startDate));
    if (q.endDate) conds.push(lte(productionInfo.uploadDate, q.endDate));

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

      const [{ total }] = await db.select({ total: count() }).from(productionInfo).where(where);

      const data = await db
        .select()
        .from(productionInfo)
        .where(where)
        .orderBy(desc(productionInfo.uploadDate), desc(productionInfo.id))
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
        .from(productionInfo)
        .where(eq(productionInfo.orderNo, orderNo))
        .orderBy(desc(productionInfo.uploadDate), desc(productionInfo.id));

      res.json({ success: true, count: data.length, data });
    } catch (error) {
      sendError(res, error, `Get ${TABLE_NAME} by order`);
    }
  });

  console.log(`✅ ${TABLE_NAME} GET endpoints setup complete`);
}
