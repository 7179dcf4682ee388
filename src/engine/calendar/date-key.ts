import { ValidationError } from '../../lib/errors.js';

/** Calendar date, "YYYY-MM-DD". Lexical order equals chronological order. */
export type DateKey = string;

/** Inclusive date interval. */
export interface DateRange {
  readonly start: DateKey;
  readonly end: DateKey;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isDateKey(value: string): boolean {
  if (!DATE_KEY_PATTERN.test(value)) return false;
  const { y, m, d } = parseDateKey(value);
  const dt = new Date(Date.UTC(y, m - 1, d));
  return dt.getUTCFullYear() === y && dt.getUTCMonth() === m - 1 && dt.getUTCDate() === d;
}

export function assertDateKey(value: string, label = 'date'): DateKey {
  if (!isDateKey(value)) {
    throw new ValidationError(`Invalid ${label} '${value}', expected YYYY-MM-DD`);
  }
  return value;
}

export function parseDateKey(date: DateKey): { y: number; m: number; d: number } {
  const [ys, ms, ds] = date.split('-');
  return { y: Number(ys), m: Number(ms), d: Number(ds) };
}

export function formatDateKey(y: number, m: number, d: number): DateKey {
  return `${String(y).padStart(4, '0')}-${String(m).padStart(2, '0')}-${String(d).padStart(2, '0')}`;
}

/** Midnight UTC of the date, in epoch milliseconds. */
export function dateKeyToEpoch(date: DateKey): number {
  const { y, m, d } = parseDateKey(date);
  return Date.UTC(y, m - 1, d);
}

export function addDays(date: DateKey, days: number): DateKey {
  const dt = new Date(dateKeyToEpoch(date) + days * MS_PER_DAY);
  return formatDateKey(dt.getUTCFullYear(), dt.getUTCMonth() + 1, dt.getUTCDate());
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function diffDays(from: DateKey, to: DateKey): number {
  return Math.round((dateKeyToEpoch(to) - dateKeyToEpoch(from)) / MS_PER_DAY);
}

/** 0=Sun..6=Sat */
export function weekdayOf(date: DateKey): number {
  return new Date(dateKeyToEpoch(date)).getUTCDay();
}

export function inRange(date: DateKey, range: DateRange): boolean {
  return range.start <= date && date <= range.end;
}

export function makeRange(start: DateKey, end: DateKey): DateRange {
  assertDateKey(start, 'range start');
  assertDateKey(end, 'range end');
  if (end < start) {
    throw new ValidationError(`Date range ends (${end}) before it starts (${start})`);
  }
  return Object.freeze({ start, end });
}

/** Every date in [start, end], in order. */
export function* eachDay(start: DateKey, end: DateKey): Generator<DateKey> {
  for (let cur = start; cur <= end; cur = addDays(cur, 1)) {
    yield cur;
  }
}

export { MS_PER_DAY };
