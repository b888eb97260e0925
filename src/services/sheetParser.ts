// server/src/services/sheetParser.ts
import ExcelJS from 'exceljs';
import { FileUploadError } from '../lib/errors';
import { DEFAULT_UTC_OFFSET_MINUTES, parseMonthFilter, startOfBusinessDay, businessDayKey } from '../utils/businessDay';
import type { ProductionRowInput } from '../utils/productionDedup';
import type { WorklogImportRow } from './worklogImport';

type Cell = string | number | Date | null;

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;
// Excel's day zero
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);
const HEADER_SCAN_ROWS = 10;

const PRODUCTION_COLUMNS = {
  orderNo: '生产订单号',
  model: '产品名称',
  brandNo: '单据编号',
  docDate: '单据日期',
  jobType: '转出作业',
  quantity: '合格数量',
  worklogNo: '转出工序计划号',
  performanceFactor: '绩效系数',
} as const;

const PRODUCTION_REQUIRED = ['orderNo', 'model', 'brandNo', 'docDate', 'jobType', 'quantity'] as const;

const WORKLOG_HEADER_MARKER = '编号';
const WORKLOG_COLUMNS = {
  workDate: '日期',
  orderNo: '生产订单号',
  quantity: '数量',
  performanceFactor: '绩效系数',
  jobType: '工种',
  model: '型号',
  brandNo: '牌号',
  employeeName: '姓名',
} as const;

const UNKNOWN_JOB_TYPE = '未知';

type ColumnIndex<K extends string> = Partial<Record<K, number>>;

export function cellToPrimitive(value: ExcelJS.CellValue): Cell {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const text = value.trim();
    return text === '' ? null : text;
  }
  if (typeof value === 'boolean') return null;
  if ('richText' in value) return cellToPrimitive(value.richText.map((r) => r.text).join(''));
  if ('text' in value) return cellToPrimitive(value.text);
  if ('result' in value) return cellToPrimitive(value.result ?? null);
  return null; // error cells
}

/** Identifier cells (order numbers, brand numbers) as text; numeric cells print without a fraction. */
export function toOrderNo(value: Cell): string {
  if (value === null) return '';
  if (typeof value === 'number') return String(value);
  if (value instanceof Date) return '';
  return value.trim();
}

/** Number, numeric string, or NaN. Empty cells give `fallback`. */
export function toNumber(value: Cell, fallback = Number.NaN): number {
  if (value === null) return fallback;
  if (typeof value === 'number') return value;
  if (value instanceof Date) return Number.NaN;
  const n = Number(value.replace(/,/g, ''));
  return Number.isFinite(n) ? n : Number.NaN;
}

/**
 * Cell → instant. exceljs hands dates back as wall-clock time in UTC; they are
 * moved to the business offset so a sheet date of 2025-11-08 is that day locally.
 */
export function toInstant(value: Cell, offsetMinutes = DEFAULT_UTC_OFFSET_MINUTES): Date | null {
  if (value === null) return null;

  let wallClockMs: number;
  if (value instanceof Date) {
    wallClockMs = value.getTime();
  } else if (typeof value === 'number') {
    wallClockMs = EXCEL_EPOCH_MS + Math.round(value * DAY_MS);
  } else {
    const m = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/.exec(value.trim());
    if (!m) return null;
    const [, y, mo, d, h = '0', mi = '0', s = '0'] = m;
    wallClockMs = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s));
    const check = new Date(wallClockMs);
    if (check.getUTCMonth() !== Number(mo) - 1 || check.getUTCDate() !== Number(d)) return null;
  }

  if (!Number.isFinite(wallClockMs)) return null;
  return new Date(wallClockMs - offsetMinutes * MINUTE_MS);
}

function rowCells(row: ExcelJS.Row): Cell[] {
  // row.values is 1-based; index 0 is unused
  const values = Array.isArray(row.values) ? row.values.slice(1) : [];
  return values.map((v) => cellToPrimitive(v));
}

function indexHeader<K extends string>(cells: Cell[], titles: Record<K, string>): ColumnIndex<K> {
  const index: ColumnIndex<K> = {};
  const keys = Object.keys(titles).filter((k): k is K => k in titles);
  cells.forEach((cell, i) => {
    if (typeof cell !== 'string') return;
    const key = keys.find((k) => titles[k] === cell.trim());
    if (key !== undefined && index[key] === undefined) index[key] = i;
  });
  return index;
}

const pick = <K extends string>(cells: Cell[], index: ColumnIndex<K>, key: K): Cell => {
  const i = index[key];
  return i === undefined ? null : (cells[i] ?? null);
};

const isBlank = (cells: Cell[]) => cells.every((c) => c === null);

function toArrayBuffer(buffer: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(copy).set(buffer);
  return copy;
}

async function loadWorkbook(buffer: Buffer): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(toArrayBuffer(buffer));
  } catch (err) {
    throw new FileUploadError('File is not a readable .xlsx workbook', {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return workbook;
}

export interface ProductionParseOptions {
  /** `yyyyMM`; keeps only rows whose document date falls in that month. */
  filterMonth?: string;
  offsetMinutes?: number;
  now?: Date;
}

export interface WorklogParseOptions {
  offsetMinutes?: number;
}

export class SheetParser {
  /**
   * Reads an order sheet (first worksheet). The header row is found among the
   * first rows by its column titles; every later non-blank row is one order line.
   */
  async parseProductionSheet(buffer: Buffer, options: ProductionParseOptions = {}): Promise<ProductionRowInput[]> {
    const offset = options.offsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
    let month: { year: number; month: number } | null = null;
    if (options.filterMonth) {
      try {
        month = parseMonthFilter(options.filterMonth);
      } catch (err) {
        throw new FileUploadError(err instanceof Error ? err.message : String(err));
      }
    }

    const workbook = await loadWorkbook(buffer);
    const sheet = workbook.worksheets[0];
    if (!sheet) throw new FileUploadError('Workbook has no worksheets');

    const rows: Cell[][] = [];
    sheet.eachRow({ includeEmpty: false }, (row) => rows.push(rowCells(row)));

    const headerAt = rows
      .slice(0, HEADER_SCAN_ROWS)
      .findIndex((cells) => {
        const idx = indexHeader(cells, PRODUCTION_COLUMNS);
        return PRODUCTION_REQUIRED.every((k) => idx[k] !== undefined);
      });

    if (headerAt === -1) {
      const seen: ColumnIndex<keyof typeof PRODUCTION_COLUMNS> = rows[0] ? indexHeader(rows[0], PRODUCTION_COLUMNS) : {};
      const missing = PRODUCTION_REQUIRED.filter((k) => seen[k] === undefined).map((k) => PRODUCTION_COLUMNS[k]);
      throw new FileUploadError(`Order sheet is missing required columns: ${missing.join(', ')}`, { missing });
    }

    const index = indexHeader(rows[headerAt], PRODUCTION_COLUMNS);
    const uploadDate = startOfBusinessDay(options.now ?? new Date(), offset);
    const result: ProductionRowInput[] = [];

    for (const cells of rows.slice(headerAt + 1)) {
      if (isBlank(cells)) continue;

      const orderNo = toOrderNo(pick(cells, index, 'orderNo'));
      if (!orderNo) continue;

      const docDate = toInstant(pick(cells, index, 'docDate'), offset);
      if (month) {
        if (!docDate) continue;
        const [y, m] = businessDayKey(docDate, offset).split('-').map(Number);
        if (y !== month.year || m !== month.month) continue;
      }

      result.push({
        orderNo,
        model: String(pick(cells, index, 'model') ?? ''),
        brandNo: toOrderNo(pick(cells, index, 'brandNo')),
        jobType: String(pick(cells, index, 'jobType') ?? ''),
        quantity: toNumber(pick(cells, index, 'quantity')),
        worklogNo: toOrderNo(pick(cells, index, 'worklogNo')),
        performanceFactor: toNumber(pick(cells, index, 'performanceFactor'), 1),
        uploadDate,
        docDate,
      });
    }

    return result;
  }

  /**
   * Reads a worklog workbook: one worksheet per employee, named by employee id.
   * Rows before a `编号` header, blank rows, total rows (no order number) and
   * rows without a date are skipped.
   */
  async parseWorklogWorkbook(buffer: Buffer, options: WorklogParseOptions = {}): Promise<WorklogImportRow[]> {
    const offset = options.offsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
    const workbook = await loadWorkbook(buffer);
    const result: WorklogImportRow[] = [];

    for (const sheet of workbook.worksheets) {
      const employeeId = sheet.name.trim();
      let index: ColumnIndex<keyof typeof WORKLOG_COLUMNS> | null = null;

      sheet.eachRow({ includeEmpty: false }, (row) => {
        const cells = rowCells(row);
        const first = cells[0];

        if (typeof first === 'string' && first.trim() === WORKLOG_HEADER_MARKER) {
          index = indexHeader(cells, WORKLOG_COLUMNS);
          return;
        }
        if (!index || isBlank(cells)) return;

        const orderNo = toOrderNo(pick(cells, index, 'orderNo'));
        if (!orderNo) return;

        const workDate = toInstant(pick(cells, index, 'workDate'), offset);
        if (!workDate) return;

        const jobType = pick(cells, index, 'jobType');
        const model = pick(cells, index, 'model');
        const brandNo = pick(cells, index, 'brandNo');
        const employeeName = pick(cells, index, 'employeeName');

        result.push({
          orderNo,
          employeeId,
          employeeName: employeeName === null ? null : String(employeeName),
          jobType: jobType === null ? UNKNOWN_JOB_TYPE : String(jobType),
          model: model === null ? null : String(model),
          brandNo: brandNo === null ? null : toOrderNo(brandNo),
          quantity: toNumber(pick(cells, index, 'quantity')),
          performanceFactor: toNumber(pick(cells, index, 'performanceFactor'), 1),
          workDate,
        });
      });
    }

    return result;
  }
}
