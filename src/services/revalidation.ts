// server/src/services/revalidation.ts
import { and, asc, eq, gt, gte, inArray, lt, lte, or } from 'drizzle-orm';
import { db } from '../db/db';
import { employeeWorklog, EmployeeWorklog, productionInfo } from '../db/schema';
import { getConfig } from '../config/env';
import { ValidationError } from '../lib/errors';
import {
  bookedQuantities,
  isValidationResult,
  ValidationResult,
  WorklogBatchValidator,
  worklogNaturalKey,
} from '../utils/worklogValidation';

export interface ValidationExceptionGroup {
  orderNo: string;
  exceptionType: ValidationResult;
  worklogs: EmployeeWorklog[];
}

export interface ValidationNormalGroup {
  orderNo: string;
  worklogs: EmployeeWorklog[];
}

export interface ValidationReport {
  totalProductionRecords: number;
  totalWorklogRecords: number;
  exceptionCount: number;
  normalCount: number;
  exceptions: ValidationExceptionGroup[];
  normal: ValidationNormalGroup[];
}

/** Groups re-validated worklogs: passed rows by order, the rest by order and result. */
export function groupValidationOutcome(worklogs: EmployeeWorklog[]): Pick<ValidationReport, 'exceptions' | 'normal'> {
  const exceptions = new Map<string, ValidationExceptionGroup>();
  const normal = new Map<string, ValidationNormalGroup>();

  for (const w of worklogs) {
    if (w.validationResult === ValidationResult.PASSED) {
      const group: ValidationNormalGroup = normal.get(w.orderNo) ?? { orderNo: w.orderNo, worklogs: [] };
      group.worklogs.push(w);
      normal.set(w.orderNo, group);
      continue;
    }

    const exceptionType = isValidationResult(w.validationResult) ? w.validationResult : ValidationResult.UNVALIDATED;
    const key = `${w.orderNo}\u0000${exceptionType}`;
    const group: ValidationExceptionGroup = exceptions.get(key) ?? { orderNo: w.orderNo, exceptionType, worklogs: [] };
    group.worklogs.push(w);
    exceptions.set(key, group);
  }

  return { exceptions: [...exceptions.values()], normal: [...normal.values()] };
}

/**
 * Keys an in-range row can already be a duplicate of: those held by a stored
 * row outside the range with a lower id than the first in-range row of the key.
 */
export function keysOwnedOutside(
  inRange: readonly EmployeeWorklog[],
  outside: readonly EmployeeWorklog[],
  offsetMinutes: number,
): Set<string> {
  const firstInRange = new Map<string, number>();
  for (const w of inRange) {
    const key = worklogNaturalKey(w, offsetMinutes);
    firstInRange.set(key, Math.min(firstInRange.get(key) ?? w.id, w.id));
  }

  const owned = new Set<string>();
  for (const w of outside) {
    const key = worklogNaturalKey(w, offsetMinutes);
    const first = firstInRange.get(key);
    if (first !== undefined && w.id < first) owned.add(key);
  }
  return owned;
}

/**
 * Recomputes performance_amount and validation_result for every worklog whose
 * work_date falls in [startDate, endDate] and writes changed rows back.
 * The lowest id of a natural key is the original, whether or not it lies in the
 * range; passed rows outside the range still count against the quota.
 */
export async function revalidateRange(startDate: Date, endDate: Date): Promise<ValidationReport> {
  if (startDate.getTime() > endDate.getTime()) {
    throw new ValidationError('startDate must not be later than endDate', {
      startDate: startDate.toISOString(),
      endDate: endDate.toISOString(),
    });
  }

  const config = getConfig();
  const offset = config.businessUtcOffsetMinutes;

  return db.transaction(async (tx) => {
    const worklogs = await tx
      .select()
      .from(employeeWorklog)
      .where(and(gte(employeeWorklog.workDate, startDate), lte(employeeWorklog.workDate, endDate)))
      .orderBy(asc(employeeWorklog.id));

    const orderNos = [...new Set(worklogs.map((w) => w.orderNo))];
    const lines = orderNos.length
      ? await tx.select().from(productionInfo).where(inArray(productionInfo.orderNo, orderNos))
      : [];
    const outside = orderNos.length
      ? await tx
          .select()
          .from(employeeWorklog)
          .where(
            and(
              inArray(employeeWorklog.orderNo, orderNos),
              or(lt(employeeWorklog.workDate, startDate), gt(employeeWorklog.workDate, endDate)),
            ),
          )
      : [];

    const validator = new WorklogBatchValidator(lines, {
      quotaCheck: config.quotaCheckEnabled,
      offsetMinutes: offset,
      existingKeys: keysOwnedOutside(worklogs, outside, offset),
      consumed: bookedQuantities(lines, outside),
    });

    const now = new Date();
    const updated: EmployeeWorklog[] = [];
    let changed = 0;
    for (const w of worklogs) {
      const result = validator.validate(w);
      if (result.validationResult === w.validationResult && result.performanceAmount === w.performanceAmount) {
        updated.push(w);
        continue;
      }

      const patch = {
        performanceAmount: result.performanceAmount,
        validationResult: result.validationResult,
        updatedAt: now,
      };
      await tx.update(employeeWorklog).set(patch).where(eq(employeeWorklog.id, w.id));
      updated.push({ ...w, ...patch });
      changed++;
    }

    const { exceptions, normal } = groupValidationOutcome(updated);
    console.log(
      `🔎 Re-validated ${worklogs.length} worklogs against ${lines.length} production rows: ` +
        `${changed} updated, ${exceptions.length} exception groups, ${normal.length} normal orders`,
    );

    return {
      totalProductionRecords: lines.length,
      totalWorklogRecords: worklogs.length,
      exceptionCount: exceptions.length,
      normalCount: normal.length,
      exceptions,
      normal,
    };
  });
}
