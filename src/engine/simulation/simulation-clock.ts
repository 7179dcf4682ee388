import {
  type DateKey,
  MS_PER_DAY,
  addDays,
  dateKeyToEpoch,
  diffDays,
} from '../calendar/date-key.js';

/**
 * Simulated time, in days since `startDate` (day 0 starts at midnight UTC).
 * Only moves forward.
 */
export class SimulationClock {
  readonly startDate: DateKey;
  private current = 0;

  constructor(startDate: DateKey) {
    this.startDate = startDate;
  }

  get now(): number {
    return this.current;
  }

  advanceTo(time: number): void {
    if (time < this.current) {
      throw new Error(`Clock cannot move backwards from day ${this.current} to day ${time}`);
    }
    this.current = time;
  }

  /** Calendar date containing simulated time `time`. */
  dateAt(time: number = this.current): DateKey {
    return addDays(this.startDate, Math.floor(time));
  }

  /** Simulated day on which `date` starts. */
  dayOf(date: DateKey): number {
    return diffDays(this.startDate, date);
  }

  /** ISO-8601 UTC instant of simulated time `time`. */
  timestampAt(time: number = this.current): string {
    return new Date(dateKeyToEpoch(this.startDate) + Math.round(time * MS_PER_DAY)).toISOString();
  }
}
