import { describe, it, expect } from 'vitest';
import { BusinessCalendar } from '../engine/calendar/business-calendar.js';
import { addDays, diffDays, isDateKey, makeRange, weekdayOf } from '../engine/calendar/date-key.js';
import { ConfigurationError, ValidationError } from '../lib/errors.js';

describe('date keys', () => {
  it('accepts real calendar dates only', () => {
    expect(isDateKey('2026-03-02')).toBe(true);
    expect(isDateKey('2028-02-29')).toBe(true);
    expect(isDateKey('2026-02-29')).toBe(false);
    expect(isDateKey('2026-3-2')).toBe(false);
    expect(isDateKey('not-a-date')).toBe(false);
  });

  it('adds and diffs days across month and year ends', () => {
    expect(addDays('2026-02-27', 2)).toBe('2026-03-01');
    expect(addDays('2025-12-31', 1)).toBe('2026-01-01');
    expect(addDays('2026-03-02', -1)).toBe('2026-03-01');
    expect(diffDays('2026-03-02', '2026-03-09')).toBe(7);
    expect(diffDays('2026-03-09', '2026-03-02')).toBe(-7);
  });

  it('reports weekdays with Sunday as 0', () => {
    expect(weekdayOf('2026-03-01')).toBe(0);
    expect(weekdayOf('2026-03-02')).toBe(1);
    expect(weekdayOf('2026-03-07')).toBe(6);
  });

  it('rejects ranges that end before they start', () => {
    expect(() => makeRange('2026-03-05', '2026-03-04')).toThrow(ValidationError);
    expect(makeRange('2026-03-05', '2026-03-05')).toEqual({ start: '2026-03-05', end: '2026-03-05' });
  });
});

describe('BusinessCalendar', () => {
  describe('isWorkday', () => {
    it('follows the Monday to Friday week by default', () => {
      const calendar = new BusinessCalendar('studio');

      expect(calendar.isWorkday('2026-03-02')).toBe(true);
      expect(calendar.isWorkday('2026-03-06')).toBe(true);
      expect(calendar.isWorkday('2026-03-07')).toBe(false);
      expect(calendar.isWorkday('2026-03-08')).toBe(false);
    });

    it('excludes holidays and vacation intervals inclusively', () => {
      const calendar = new BusinessCalendar('studio', {
        holidays: ['2026-03-03'],
        vacations: [{ start: '2026-03-10', end: '2026-03-11' }],
      });

      expect(calendar.isWorkday('2026-03-03')).toBe(false);
      expect(calendar.isWorkday('2026-03-09')).toBe(true);
      expect(calendar.isWorkday('2026-03-10')).toBe(false);
      expect(calendar.isWorkday('2026-03-11')).toBe(false);
      expect(calendar.isWorkday('2026-03-12')).toBe(true);
    });

    it('honours a custom working week', () => {
      const calendar = new BusinessCalendar('weekend crew', { workDays: [0, 6] });

      expect(calendar.getWorkDays()).toEqual([0, 6]);
      expect(calendar.isWorkday('2026-03-07')).toBe(true);
      expect(calendar.isWorkday('2026-03-02')).toBe(false);
    });

    it('picks up holidays and vacations added after construction', () => {
      const calendar = new BusinessCalendar('studio');
      calendar.addHoliday('2026-03-04');
      calendar.addHoliday('2026-03-02');
      calendar.addVacation('2026-03-05', '2026-03-05');

      expect(calendar.getHolidays()).toEqual(['2026-03-02', '2026-03-04']);
      expect(calendar.getVacations()).toEqual([{ start: '2026-03-05', end: '2026-03-05' }]);
      expect(calendar.isWorkday('2026-03-05')).toBe(false);
    });

    it('rejects malformed holiday dates', () => {
      const calendar = new BusinessCalendar('studio');
      expect(() => calendar.addHoliday('03/04/2026')).toThrow(ValidationError);
    });
  });

  describe('nextWorkday', () => {
    it('returns a strictly later date even when the input is a workday', () => {
      const calendar = new BusinessCalendar('studio');

      expect(calendar.nextWorkday('2026-03-02')).toBe('2026-03-03');
    });

    it('skips the weekend and holidays', () => {
      const calendar = new BusinessCalendar('studio', { holidays: ['2026-03-09'] });

      expect(calendar.nextWorkday('2026-03-06')).toBe('2026-03-10');
    });

    it('raises a configuration error when no workday exists within the scan limit', () => {
      const calendar = new BusinessCalendar('never', { workDays: [], scanLimitDays: 30 });

      expect(() => calendar.nextWorkday('2026-03-02')).toThrow(ConfigurationError);
      expect(() => calendar.nextWorkday('2026-03-02')).toThrow(
        "Calendar 'never' has no working day within 30 days after 2026-03-02",
      );
    });
  });

  describe('workdaysBetween', () => {
    it('lists workdays in an inclusive range', () => {
      const calendar = new BusinessCalendar('studio');

      expect(calendar.workdaysBetween('2026-03-05', '2026-03-10')).toEqual([
        '2026-03-05',
        '2026-03-06',
        '2026-03-09',
        '2026-03-10',
      ]);
    });

    it('is empty for a weekend-only range', () => {
      const calendar = new BusinessCalendar('studio');

      expect(calendar.workdaysBetween('2026-03-07', '2026-03-08')).toEqual([]);
    });
  });
});
