// server/src/services/worklogImport.ts
import { inArray } from 'drizzle-orm';
import { db, DbExecutor } from '../db/db';
import { employeeWorklog, NewEmployeeWorklog, productionInfo } from '../db/schema';
import { getConfig } from '../config/env';
import { UnmatchedOrderError } from '../lib/errors';
import {
  bookedQuantities,
  ValidationResult,
  WorklogBatchValidator,
  WorklogEntry,
  worklogNaturalKey,
} from '../utils/worklogValidation';

const INSERT_CHUNK_SIZE = 500;

export interface WorklogImportRow extends WorklogEntry {
  employeeName?: string | null;
}

export interface WorklogImportSummary {
  received: number;
  inserted: number;
  results: Record<ValidationResult, number>;
  unmatched: { index: number; message: string }[];
  rejected: { index: number; error: string; details: Record<string, unknown> }[];
}

const emptyCounts = (): Record<ValidationResult, number> => ({
  [ValidationResult.UNVALIDATED]: 0,
  [ValidationResult.PASSED]: 0,
  [ValidationResult.UNMATCHED]: 0,
  [ValidationResult.DUPLICATE]: 0,
  [ValidationResult.EXCEEDS_QUOTA]: 0,
});

const trimmed = (v: string | null | undefined) => {
  const t = v?.trim();
  return t ? t : null;
};

/**
 * Loads what a batch is validated against: the production lines of its orders,
 * the natural keys of worklogs already stored for them and, for the quota check,
 * how much of each line stored passed worklogs have used.
 */
export async function loadValidationContext(tx: DbExecutor, orderNos: string[], offsetMinutes: number) {
  if (orderNos.length === 0) {
    return { lines: [], existingKeys: new Set<string>(), consumed: new Map<number, number>() };
  }

  const lines = await tx
    .select({
      id: productionInfo.id,
      orderNo: productionInfo.orderNo,
      model: productionInfo.model,
      brandNo: productionInfo.brandNo,
      jobType: productionInfo.jobType,
      quantity: productionInfo.quantity,
      uploadDate: productionInfo.uploadDate,
    })
    .from(productionInfo)
    .where(inArray(productionInfo.orderNo, orderNos));

  const stored = await tx
    .select({
      orderNo: employeeWorklog.orderNo,
      model: employeeWorklog.model,
      brandNo: employeeWorklog.brandNo,
      employeeId: employeeWorklog.employeeId,
      jobType: employeeWorklog.jobType,
      quantity: employeeWorklog.quantity,
      performanceFactor: employeeWorklog.performanceFactor,
      workDate: employeeWorklog.workDate,
      validationResult: employeeWorklog.validationResult,
    })
    .from(employeeWorklog)
    .where(inArray(employeeWorklog.orderNo, orderNos));

  const existingKeys = new Set(stored.map((row) => worklogNaturalKey(row, offsetMinutes)));
  const consumed = bookedQuantities(lines, stored);

  return { lines, existingKeys, consumed };
}

/**
 * Validates and stores one worklog sheet in a single transaction.
 *
 * Duplicates and unmatched rows are stored with their tag; rows with a
 * non-positive quantity or factor are left out and listed in `rejected`.
 */
export async function importWorklogBatch(rows: WorklogImportRow[], uploadDate = new Date()): Promise<WorklogImportSummary> {
  const config = getConfig();

  return db.transaction(async (tx) => {
    const orderNos = [...new Set(rows.map((r) => r.orderNo))];
    const { lines, existingKeys, consumed } = await loadValidationContext(tx, orderNos, config.businessUtcOffsetMinutes);

    const validator = new WorklogBatchValidator(lines, {
      quotaCheck: config.quotaCheckEnabled,
      offsetMinutes: config.businessUtcOffsetMinutes,
      existingKeys,
      consumed,
    });
    const { scored, rejected } = validator.validateAll(rows);

    const results = emptyCounts();
    const unmatched: WorklogImportSummary['unmatched'] = [];
    const values: NewEmployeeWorklog[] = scored.map(({ index, entry, result }) => {
      results[result.validationResult] += 1;
      if (result.validationResult === ValidationResult.UNMATCHED) {
        unmatched.push({ index, message: new UnmatchedOrderError(entry.orderNo, entry.jobType).message });
      }
      return {
        orderNo: entry.orderNo,
        model: trimmed(entry.model),
        brandNo: trimmed(entry.brandNo),
        employeeId: entry.employeeId,
        employeeName: trimmed(entry.employeeName),
        jobType: entry.jobType,
        quantity: entry.quantity,
        performanceFactor: result.performanceFactor,
        performanceAmount: result.performanceAmount,
        workDate: entry.workDate,
        uploadDate,
        validationResult: result.validationResult,
      };
    });

    let inserted = 0;
    for (let i = 0; i < values.length; i += INSERT_CHUNK_SIZE) {
      const ids = await tx
        .insert(employeeWorklog)
        .values(values.slice(i, i + INSERT_CHUNK_SIZE))
        .returning({ id: employeeWorklog.id });
      inserted += ids.length;
    }

    console.log(
      `🧾 Worklog import: ${rows.length} received, ${inserted} stored ` +
        `(${results[ValidationResult.PASSED]} passed, ${results[ValidationResult.UNMATCHED]} unmatched, ` +
        `${results[ValidationResult.DUPLICATE]} duplicate, ${results[ValidationResult.EXCEEDS_QUOTA]} over quota), ` +
        `${rejected.length} rejected`,
    );

    return {
      received: rows.length,
      inserted,
      results,
      unmatched,
      rejected: rejected.map((r) => ({ index: r.index, error: r.error.message, details: r.error.details })),
    };
  });
}
