export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Spreadsheet day serials count from 1899-12-30; 2958465 is 9999-12-31.
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
const MAX_SERIAL_DAY = 2958465;

const DATE_PATTERN =
  /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const SERIAL_PATTERN = /^\d+(?:\.\d+)?$/;
const MONTH_KEY_PATTERN = /^(\d{4})-(\d{2})(?:-\d{2})?$/;

export type CellValue = string | number | Date | null | undefined;

export type DateCellResult =
  | { status: 'empty' }
  | { status: 'parsed'; at: Date }
  | { status: 'invalid'; raw: string };

/** A calendar month in `YYYY-MM` form; sorts lexicographically in time order. */
export type MonthKey = string;

const pad2 = (value: number): string => String(value).padStart(2, '0');

function parseCalendarText(text: string): Date | null {
  const match = DATE_PATTERN.exec(text);
  if (!match) return null;
  const [, year, month, day, hour, minute, second, millis] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = hour ? Number(hour) : 0;
  const mi = minute ? Number(minute) : 0;
  const s = second ? Number(second) : 0;
  const ms = millis ? Number(millis.padEnd(3, '0')) : 0;
  if (h > 23 || mi > 59 || s > 59) return null;

  const at = new Date(Date.UTC(y, mo - 1, d, h, mi, s, ms));
  // Date.UTC rolls 2023-02-30 over into March; reject instead.
  if (at.getUTCFullYear() !== y || at.getUTCMonth() !== mo - 1 || at.getUTCDate() !== d) {
    return null;
  }
  return at;
}

function fromSerialDay(serial: number): Date | null {
  if (!Number.isFinite(serial) || serial < 1 || serial > MAX_SERIAL_DAY) return null;
  return new Date(SERIAL_EPOCH_MS + Math.round(serial * MS_PER_DAY));
}

/**
 * Reads a date cell as a wall-clock stamp held in UTC. A trailing `Z` or
 * offset is accepted and dropped, so `2023-02-01T08:00+09:00` stays on
 * 2023-02-01 and buckets into the month it names.
 */
export function parseDateCell(value: CellValue): DateCellResult {
  if (value === null || value === undefined) {
    return { status: 'empty' };
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? { status: 'invalid', raw: 'Invalid Date' }
      : { status: 'parsed', at: new Date(value.getTime()) };
  }
  if (typeof value === 'number') {
    const at = fromSerialDay(value);
    return at ? { status: 'parsed', at } : { status: 'invalid', raw: String(value) };
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return { status: 'empty' };
  }
  const at = SERIAL_PATTERN.test(trimmed) ? fromSerialDay(Number(trimmed)) : parseCalendarText(trimmed);
  return at ? { status: 'parsed', at } : { status: 'invalid', raw: trimmed };
}

export function toMonthKey(date: Date): MonthKey {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}`;
}

export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

/**
 * Accepts `YYYY-MM` or `YYYY-MM-DD` and returns the month key, or null when the
 * input is not a real month.
 */
export function parseMonthKey(value: string): MonthKey | null {
  const match = MONTH_KEY_PATTERN.exec(value.trim());
  if (!match) return null;
  const month = Number(match[2]);
  if (month < 1 || month > 12) return null;
  return `${match[1]}-${match[2]}`;
}

export function enumerateMonths(start: MonthKey, end: MonthKey): MonthKey[] {
  const months: MonthKey[] = [];
  let year = Number(start.slice(0, 4));
  let month = Number(start.slice(5, 7));
  const endYear = Number(end.slice(0, 4));
  const endMonth = Number(end.slice(5, 7));
  while (year < endYear || (year === endYear && month <= endMonth)) {
    months.push(`${year}-${pad2(month)}`);
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }
  return months;
}

/** Whole days from `earlier` to `later`, floored like a timedelta's day count. */
export function diffInDays(later: Date, earlier: Date): number {
  return Math.floor((later.getTime() - earlier.getTime()) / MS_PER_DAY);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}
