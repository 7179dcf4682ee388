import { ConfigurationError } from '../../lib/errors.js';
import { type DateKey, addDays, diffDays } from '../calendar/date-key.js';
import { DAILY_CAPACITY_HOURS, type Resource } from '../resources/resource.js';
import type { SimulationClock } from './simulation-clock.js';

export type EffortMode = 'WORKDAY' | 'LEGACY';

export interface BookedDay {
  readonly date: DateKey;
  readonly hours: number;
}

/** Hours one stage holds on one resource, and when the stage ends. */
export interface StageBooking {
  readonly resource: Resource;
  readonly days: readonly BookedDay[];
  readonly startDay: number;
  /** Simulated time at which the stage completes. */
  readonly endDay: number;
  readonly hours: number;
}

/**
 * Maps a stage's bid hours onto resource bookings and elapsed time.
 */
export interface EffortModel {
  readonly mode: EffortMode;
  /** Hours first-fit allocation must place on the start day. */
  startHours(bidHours: number): number;
  /**
   * Hours the conflict resolver may book on a start day where the resource
   * has `freeHours` left, or null when the stage cannot start there.
   */
  grantHours(bidHours: number, freeHours: number): number | null;
  /**
   * Whether the rest of the bid after `firstDayHours` on `startDate` can be
   * booked on `resource`. Reads bookings only; callers check this before
   * committing the first day.
   */
  canComplete(resource: Resource, startDate: DateKey, bidHours: number, firstDayHours: number): boolean;
  /** Books the remainder after `firstDayHours` landed on `startDay`. */
  completeBooking(
    resource: Resource,
    clock: SimulationClock,
    startDay: number,
    bidHours: number,
    firstDayHours: number,
  ): StageBooking;
}

const EPSILON = 1e-9;

/**
 * Effort fills the resource's free hours day by day, at most a working day
 * at a time; non-working and fully booked days are skipped. The stage ends
 * at the start of the day after the last booked one.
 */
export class WorkdayEffortModel implements EffortModel {
  readonly mode = 'WORKDAY' as const;

  startHours(bidHours: number): number {
    return Math.min(bidHours, DAILY_CAPACITY_HOURS);
  }

  grantHours(bidHours: number, freeHours: number): number | null {
    if (freeHours <= EPSILON) return null;
    return Math.min(freeHours, this.startHours(bidHours));
  }

  canComplete(resource: Resource, startDate: DateKey, bidHours: number, firstDayHours: number): boolean {
    return this.planRemainder(resource, startDate, bidHours - firstDayHours) !== null;
  }

  completeBooking(
    resource: Resource,
    clock: SimulationClock,
    startDay: number,
    bidHours: number,
    firstDayHours: number,
  ): StageBooking {
    const firstDay = Math.floor(startDay);
    const startDate = clock.dateAt(firstDay);
    const remainder = this.planRemainder(resource, startDate, bidHours - firstDayHours);
    if (remainder === null) {
      throw new ConfigurationError(
        `Resource '${resource.id}' has no free working day within ${resource.calendar.scanLimitDays} days of ${startDate}`,
        { resourceId: resource.id },
      );
    }

    for (const day of remainder) {
      resource.assignWork(day.date, day.hours);
    }
    const lastDay =
      remainder.length > 0 ? firstDay + diffDays(startDate, remainder[remainder.length - 1].date) : firstDay;

    return {
      resource,
      days: [{ date: startDate, hours: firstDayHours }, ...remainder],
      startDay,
      endDay: lastDay + 1,
      hours: bidHours,
    };
  }

  /**
   * Days after `startDate` that would take `remaining` hours, filling each
   * working day's free hours in turn. null when the calendar scan limit runs
   * out first.
   */
  private planRemainder(resource: Resource, startDate: DateKey, remaining: number): BookedDay[] | null {
    const days: BookedDay[] = [];
    const limit = resource.calendar.scanLimitDays;
    let left = remaining;

    for (let offset = 1; left > EPSILON; offset++) {
      if (offset > limit) return null;
      const date = addDays(startDate, offset);
      const free = resource.freeHoursOn(date);
      if (free <= EPSILON) continue;

      const hours = Math.min(left, free);
      days.push({ date, hours });
      left -= hours;
    }
    return days;
  }
}

/**
 * The whole bid is booked on the start day and the stage holds for one
 * simulated day per bid hour. Bids above a working day never fit.
 */
export class LegacyEffortModel implements EffortModel {
  readonly mode = 'LEGACY' as const;

  startHours(bidHours: number): number {
    return bidHours;
  }

  grantHours(bidHours: number, freeHours: number): number | null {
    return freeHours + EPSILON >= bidHours ? bidHours : null;
  }

  canComplete(_resource: Resource, _startDate: DateKey, _bidHours: number, _firstDayHours: number): boolean {
    return true;
  }

  completeBooking(
    resource: Resource,
    clock: SimulationClock,
    startDay: number,
    bidHours: number,
    firstDayHours: number,
  ): StageBooking {
    return {
      resource,
      days: [{ date: clock.dateAt(startDay), hours: firstDayHours }],
      startDay,
      endDay: startDay + bidHours,
      hours: firstDayHours,
    };
  }
}

export function createEffortModel(mode: EffortMode): EffortModel {
  return mode === 'LEGACY' ? new LegacyEffortModel() : new WorkdayEffortModel();
}
