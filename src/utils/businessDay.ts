// server/src/utils/businessDay.ts
// Timestamps are compared by calendar day at a fixed UTC offset (UTC+8 unless configured).

export const DEFAULT_UTC_OFFSET_MINUTES = 480;

const MINUTE_MS = 60 * 1000;

/** `YYYY-MM-DD` of the instant as seen at the given offset. */
export function businessDayKey(date: Date, offsetMinutes = DEFAULT_UTC_OFFSET_MINUTES): string {
  return new Date(date.getTime() + offsetMinutes * MINUTE_MS).toISOString().slice(0, 10);
}

/** The instant at which the business day containing `date` starts. */
export function startOfBusinessDay(date: Date, offsetMinutes = DEFAULT_UTC_OFFSET_MINUTES): Date {
  const [y, m, d] = businessDayKey(date, offsetMinutes).split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d) - offsetMinutes * MINUTE_MS);
}

/** `yyyyMM` → { year, month }, or throws on anything else. */
export function parseMonthFilter(value: string): { year: number; month: number } {
  if (!/^\d{6}$/.test(value)) {
    throw new Error(`filterMonth must be yyyyMM (6 digits), got "${value}"`);
  }
  const year = Number(value.slice(0, 4));
  const month = Number(value.slice(4, 6));
  if (month < 1 || month > 12) {
    throw new Error(`filterMonth month must be 01-12, got "${value.slice(4, 6)}"`);
  }
  return { year, month };
}
