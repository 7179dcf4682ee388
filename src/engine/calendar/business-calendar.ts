import { ConfigurationError } from '../../lib/errors.js';
import {
  type DateKey,
  type DateRange,
  addDays,
  assertDateKey,
  eachDay,
  inRange,
  makeRange,
  weekdayOf,
} from './date-key.js';

/** 0=Sun..6=Sat */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const MONDAY_TO_FRIDAY: readonly Weekday[] = [1, 2, 3, 4, 5];
const ALL_WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

/** Forward scans give up after this many days. */
export const DEFAULT_SCAN_LIMIT_DAYS = 3660;

export interface BusinessCalendarOptions {
  workDays?: readonly Weekday[];
  holidays?: readonly DateKey[];
  vacations?: readonly DateRange[];
  scanLimitDays?: number;
}

/**
 * Studio working-day calendar.
 *
 * A date is a workday iff its weekday is a work day, it is not a holiday and
 * it lies outside every vacation interval. Shared by reference between the
 * pool and its resources; only mutated during setup.
 */
export class BusinessCalendar {
  readonly name: string;
  readonly scanLimitDays: number;
  private readonly workDays: ReadonlySet<number>;
  private readonly holidays: Set<DateKey>;
  private readonly vacations: DateRange[];

  constructor(name: string, options: BusinessCalendarOptions = {}) {
    this.name = name;
    this.workDays = new Set(options.workDays ?? MONDAY_TO_FRIDAY);
    this.holidays = new Set((options.holidays ?? []).map((h) => assertDateKey(h, 'holiday')));
    this.vacations = (options.vacations ?? []).map((v) => makeRange(v.start, v.end));
    this.scanLimitDays = options.scanLimitDays ?? DEFAULT_SCAN_LIMIT_DAYS;
  }

  getWorkDays(): Weekday[] {
    return ALL_WEEKDAYS.filter((d) => this.workDays.has(d));
  }

  getHolidays(): DateKey[] {
    return [...this.holidays].sort();
  }

  getVacations(): DateRange[] {
    return [...this.vacations];
  }

  addHoliday(date: DateKey): void {
    this.holidays.add(assertDateKey(date, 'holiday'));
  }

  addVacation(start: DateKey, end: DateKey): void {
    this.vacations.push(makeRange(start, end));
  }

  isWorkday(date: DateKey): boolean {
    return (
      this.workDays.has(weekdayOf(date)) &&
      !this.holidays.has(date) &&
      !this.vacations.some((v) => inRange(date, v))
    );
  }

  /**
   * First workday strictly after `date`.
   * Throws ConfigurationError when none exists within the scan limit.
   */
  nextWorkday(date: DateKey): DateKey {
    let cur = addDays(date, 1);
    for (let scanned = 1; scanned <= this.scanLimitDays; scanned++) {
      if (this.isWorkday(cur)) return cur;
      cur = addDays(cur, 1);
    }
    throw new ConfigurationError(
      `Calendar '${this.name}' has no working day within ${this.scanLimitDays} days after ${date}`,
      { calendar: this.name, date },
    );
  }

  /** Workdays in [start, end]. */
  workdaysBetween(start: DateKey, end: DateKey): DateKey[] {
    const days: DateKey[] = [];
    for (const day of eachDay(start, end)) {
      if (this.isWorkday(day)) days.push(day);
    }
    return days;
  }
}
