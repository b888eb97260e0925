// server/src/lib/listQuery.ts
import { z } from 'zod';

export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(10),
});

export const dateRangeSchema = z
  .object({
    startDate: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),
  })
  .refine((q) => !q.startDate || !q.endDate || q.startDate.getTime() <= q.endDate.getTime(), {
    message: 'startDate must not be later than endDate',
    path: ['startDate'],
  });

/** `%value%` for LIKE, with the pattern characters in `value` escaped. */
export function containsPattern(value: string): string {
  return `%${value.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}
