// server/src/utils/worklogValidation.ts
// Matching of worklog rows against production order lines, and the validation_result they get.

import { businessDayKey, DEFAULT_UTC_OFFSET_MINUTES } from './businessDay';
import { computePerformanceAmount, normalizeFactor } from './performance';
import { ValidationError } from '../lib/errors';

export const ValidationResult = {
  UNVALIDATED: '未校验',
  PASSED: '通过',
  UNMATCHED: '未匹配',
  DUPLICATE: '重复',
  // only produced while the quota check is enabled
  EXCEEDS_QUOTA: '超出配额',
} as const;

export type ValidationResult = (typeof ValidationResult)[keyof typeof ValidationResult];

export const VALIDATION_RESULTS = [
  ValidationResult.UNVALIDATED,
  ValidationResult.PASSED,
  ValidationResult.UNMATCHED,
  ValidationResult.DUPLICATE,
  ValidationResult.EXCEEDS_QUOTA,
] as const;

export function isValidationResult(value: string): value is ValidationResult {
  return VALIDATION_RESULTS.some((r) => r === value);
}

export interface WorklogEntry {
  orderNo: string;
  model?: string | null;
  brandNo?: string | null;
  employeeId: string;
  jobType: string;
  quantity: number;
  performanceFactor: number | string;
  workDate: Date;
}

/** The fields of a production_info row the validator needs. */
export interface ProductionOrderLine {
  id: number;
  orderNo: string;
  model: string;
  brandNo: string;
  jobType: string;
  quantity: number;
  uploadDate: Date;
}

export interface ScoreOptions {
  /** A worklog with the same natural key already exists. */
  duplicate?: boolean;
  quotaCheck?: boolean;
  /** Quantity already booked against a line by passed worklogs. */
  consumedQuantity?: (line: ProductionOrderLine) => number;
}

export interface ScoredWorklog {
  performanceFactor: string;
  performanceAmount: string;
  validationResult: ValidationResult;
  match: ProductionOrderLine | null;
}

export function orderJobKey(orderNo: string, jobType: string): string {
  return `${orderNo}\u0000${jobType}`;
}

/** (order_no, employee_id, job_type, work day) */
export function worklogNaturalKey(
  entry: Pick<WorklogEntry, 'orderNo' | 'employeeId' | 'jobType' | 'workDate'>,
  offsetMinutes = DEFAULT_UTC_OFFSET_MINUTES,
): string {
  return [entry.orderNo, entry.employeeId, entry.jobType, businessDayKey(entry.workDate, offsetMinutes)].join('\u0000');
}

/** Production lines grouped by (order_no, job_type). Built per batch, never shared. */
export function buildOrderLookup<T extends ProductionOrderLine>(lines: Iterable<T>): Map<string, T[]> {
  const lookup = new Map<string, T[]>();
  for (const line of lines) {
    const key = orderJobKey(line.orderNo, line.jobType);
    const bucket = lookup.get(key);
    if (bucket) bucket.push(line);
    else lookup.set(key, [line]);
  }
  return lookup;
}

const hasText = (v: string | null | undefined): v is string => typeof v === 'string' && v.trim() !== '';

function latestUpload<T extends ProductionOrderLine>(lines: T[]): T {
  return lines.reduce((a, b) => (b.uploadDate.getTime() > a.uploadDate.getTime() ? b : a));
}

/**
 * Picks the production line a worklog entry books against.
 *
 * Lines must share the entry's order_no and job_type. Lines that differ only
 * in upload date are one product; the newest upload wins. When the candidates
 * span several model/brand pairs, the entry's own model and brand_no narrow
 * them down; if more than one pair is left the entry is not matched.
 */
export function resolveMatch<T extends ProductionOrderLine>(entry: WorklogEntry, candidates: readonly T[]): T | null {
  const sameKey = candidates.filter((c) => c.orderNo === entry.orderNo && c.jobType === entry.jobType);
  if (sameKey.length === 0) return null;

  const groups = new Map<string, T[]>();
  for (const line of sameKey) {
    const k = `${line.model}\u0000${line.brandNo}`;
    const group = groups.get(k);
    if (group) group.push(line);
    else groups.set(k, [line]);
  }

  if (groups.size === 1) return latestUpload(sameKey);

  const narrowed = [...groups.values()].filter(([first]) =>
    (!hasText(entry.model) || first.model === entry.model.trim()) &&
    (!hasText(entry.brandNo) || first.brandNo === entry.brandNo.trim()),
  );
  return narrowed.length === 1 ? latestUpload(narrowed[0]) : null;
}

/**
 * Quantity per production line id already booked by stored worklogs that passed.
 * Rows tagged anything else book nothing.
 */
export function bookedQuantities(
  lines: Iterable<ProductionOrderLine>,
  stored: Iterable<WorklogEntry & { validationResult: string }>,
): Map<number, number> {
  const lookup = buildOrderLookup(lines);
  const booked = new Map<number, number>();
  for (const row of stored) {
    if (row.validationResult !== ValidationResult.PASSED) continue;
    const match = resolveMatch(row, lookup.get(orderJobKey(row.orderNo, row.jobType)) ?? []);
    if (match) booked.set(match.id, (booked.get(match.id) ?? 0) + row.quantity);
  }
  return booked;
}

/**
 * Derives performance_amount and validation_result for one worklog entry.
 *
 * Throws InvalidQuantityError / InvalidFactorError for non-positive input;
 * nothing is persisted here.
 */
export function validateAndScore(
  entry: WorklogEntry,
  matchingOrders: readonly ProductionOrderLine[],
  options: ScoreOptions = {},
): ScoredWorklog {
  const performanceAmount = computePerformanceAmount(entry.quantity, entry.performanceFactor);
  const performanceFactor = normalizeFactor(entry.performanceFactor);
  const match = resolveMatch(entry, matchingOrders);

  let validationResult: ValidationResult;
  if (options.duplicate) {
    validationResult = ValidationResult.DUPLICATE;
  } else if (!match) {
    validationResult = ValidationResult.UNMATCHED;
  } else if (options.quotaCheck && (options.consumedQuantity?.(match) ?? 0) + entry.quantity > match.quantity) {
    validationResult = ValidationResult.EXCEEDS_QUOTA;
  } else {
    validationResult = ValidationResult.PASSED;
  }

  return { performanceFactor, performanceAmount, validationResult, match };
}

export interface BatchValidatorOptions {
  quotaCheck?: boolean;
  offsetMinutes?: number;
  /** Natural keys of worklogs already stored. */
  existingKeys?: Iterable<string>;
  /** Quantity per production line id already booked by stored, passed worklogs. */
  consumed?: Iterable<[number, number]>;
}

export interface RejectedRow<T> {
  index: number;
  entry: T;
  error: ValidationError;
}

export interface ScoredRow<T> {
  index: number;
  entry: T;
  result: ScoredWorklog;
}

/**
 * Validates the rows of one import batch in order. Later rows see the keys and
 * quota consumption of earlier ones, so the second of two identical rows is a
 * duplicate.
 */
export class WorklogBatchValidator {
  private readonly lookup: Map<string, ProductionOrderLine[]>;
  private readonly seen: Set<string>;
  private readonly consumed: Map<number, number>;
  private readonly quotaCheck: boolean;
  private readonly offsetMinutes: number;

  constructor(lines: Iterable<ProductionOrderLine>, options: BatchValidatorOptions = {}) {
    this.lookup = buildOrderLookup(lines);
    this.seen = new Set(options.existingKeys ?? []);
    this.consumed = new Map(options.consumed ?? []);
    this.quotaCheck = options.quotaCheck ?? false;
    this.offsetMinutes = options.offsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
  }

  validate(entry: WorklogEntry): ScoredWorklog {
    const key = worklogNaturalKey(entry, this.offsetMinutes);
    const candidates = this.lookup.get(orderJobKey(entry.orderNo, entry.jobType)) ?? [];

    const result = validateAndScore(entry, candidates, {
      duplicate: this.seen.has(key),
      quotaCheck: this.quotaCheck,
      consumedQuantity: (line) => this.consumed.get(line.id) ?? 0,
    });

    this.seen.add(key);
    if (result.validationResult === ValidationResult.PASSED && result.match) {
      const id = result.match.id;
      this.consumed.set(id, (this.consumed.get(id) ?? 0) + entry.quantity);
    }
    return result;
  }

  /** Rows with bad numbers are collected in `rejected`; the rest of the batch carries on. */
  validateAll<T extends WorklogEntry>(entries: readonly T[]): { scored: ScoredRow<T>[]; rejected: RejectedRow<T>[] } {
    const scored: ScoredRow<T>[] = [];
    const rejected: RejectedRow<T>[] = [];

    entries.forEach((entry, index) => {
      try {
        scored.push({ index, entry, result: this.validate(entry) });
      } catch (error) {
        if (error instanceof ValidationError) {
          rejected.push({ index, entry, error });
          return;
        }
        throw error;
      }
    });

    return { scored, rejected };
  }
}
