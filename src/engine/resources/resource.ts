import { AvailabilityError, ValidationError } from '../../lib/errors.js';
import type { BusinessCalendar } from '../calendar/business-calendar.js';
import { type DateKey, type DateRange, inRange, makeRange } from '../calendar/date-key.js';
import type { ResourceType } from '../registry.js';

/** Hours one resource can commit on a single day. */
export const DAILY_CAPACITY_HOURS = 8;

/**
 * A single artist or technician.
 *
 * Invariant: for every date, assigned hours never exceed DAILY_CAPACITY_HOURS.
 * Hours are only ever added, through `assignWork`.
 */
export class Resource {
  readonly id: string;
  readonly name: string;
  readonly type: ResourceType;
  /** Shared with the pool, not owned. */
  readonly calendar: BusinessCalendar;
  private readonly assignedHours = new Map<DateKey, number>();
  private readonly vacations: DateRange[] = [];

  constructor(id: string, name: string, type: ResourceType, calendar: BusinessCalendar) {
    this.id = id;
    this.name = name;
    this.type = type;
    this.calendar = calendar;
  }

  addVacation(start: DateKey, end: DateKey): void {
    this.vacations.push(makeRange(start, end));
  }

  getVacations(): DateRange[] {
    return [...this.vacations];
  }

  /** Calendar workday and not on personal vacation. */
  isWorking(date: DateKey): boolean {
    if (!this.calendar.isWorkday(date)) return false;
    return !this.vacations.some((v) => inRange(date, v));
  }

  hoursOn(date: DateKey): number {
    return this.assignedHours.get(date) ?? 0;
  }

  /** Uncommitted hours on a working date, 0 otherwise. */
  freeHoursOn(date: DateKey): number {
    if (!this.isWorking(date)) return 0;
    return Math.max(0, DAILY_CAPACITY_HOURS - this.hoursOn(date));
  }

  isAvailable(date: DateKey, requiredHours: number = DAILY_CAPACITY_HOURS): boolean {
    if (!this.isWorking(date)) return false;
    return this.hoursOn(date) + requiredHours <= DAILY_CAPACITY_HOURS;
  }

  assignWork(date: DateKey, hours: number): void {
    if (!Number.isFinite(hours) || hours <= 0) {
      throw new ValidationError(`Assigned hours must be a positive number, got ${hours}`, {
        resourceId: this.id,
      });
    }
    if (!this.isAvailable(date, hours)) {
      throw new AvailabilityError(this.id, date, hours);
    }
    this.assignedHours.set(date, this.hoursOn(date) + hours);
  }

  /** Booked dates with their hours, in date order. */
  getAssignments(): Array<{ date: DateKey; hours: number }> {
    return [...this.assignedHours.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([date, hours]) => ({ date, hours }));
  }
}
