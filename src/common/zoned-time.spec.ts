import {
  addDays,
  compareLocalDates,
  daysBetween,
  endOfLocalDay,
  formatClock,
  formatDateTime,
  formatDayHeading,
  formatSlotLabel,
  lastDayOfMonth,
  parseLocalDate,
  startOfLocalDay,
  toLocalDate,
  toZonedIso,
  weekdayOf,
  zonedDateTime,
  zonedParts,
} from './zoned-time';

const KOLKATA = 'Asia/Kolkata';
const NEW_YORK = 'America/New_York';

describe('zoned-time', () => {
  describe('zonedDateTime', () => {
    it('should convert a wall-clock time in a fixed-offset zone', () => {
      const instant = zonedDateTime({ year: 2026, month: 10, day: 20 }, 14, 0, KOLKATA);
      expect(instant.toISOString()).toBe('2026-10-20T08:30:00.000Z');
    });

    it('should follow daylight saving changes', () => {
      expect(zonedDateTime({ year: 2026, month: 1, day: 15 }, 9, 0, NEW_YORK).toISOString()).toBe(
        '2026-01-15T14:00:00.000Z',
      );
      expect(zonedDateTime({ year: 2026, month: 3, day: 9 }, 9, 0, NEW_YORK).toISOString()).toBe(
        '2026-03-09T13:00:00.000Z',
      );
    });

    it('should be the inverse of zonedParts', () => {
      const parts = zonedParts(new Date('2026-10-20T08:30:00Z'), KOLKATA);
      expect(parts).toEqual({ year: 2026, month: 10, day: 20, hour: 14, minute: 0, second: 0 });
    });
  });

  describe('day boundaries', () => {
    it('should give the first and last millisecond of a local day', () => {
      const day = { year: 2026, month: 10, day: 20 };
      expect(startOfLocalDay(day, 'UTC').toISOString()).toBe('2026-10-20T00:00:00.000Z');
      expect(endOfLocalDay(day, 'UTC').toISOString()).toBe('2026-10-20T23:59:59.999Z');
      expect(startOfLocalDay(day, KOLKATA).toISOString()).toBe('2026-10-19T18:30:00.000Z');
    });

    it('should read the local date of an instant', () => {
      expect(toLocalDate(new Date('2026-10-19T20:00:00Z'), KOLKATA)).toEqual({ year: 2026, month: 10, day: 20 });
      expect(toLocalDate(new Date('2026-10-19T20:00:00Z'), 'UTC')).toEqual({ year: 2026, month: 10, day: 19 });
    });
  });

  describe('date arithmetic', () => {
    it('should roll over months and years', () => {
      expect(addDays({ year: 2026, month: 10, day: 31 }, 1)).toEqual({ year: 2026, month: 11, day: 1 });
      expect(addDays({ year: 2026, month: 12, day: 31 }, 1)).toEqual({ year: 2027, month: 1, day: 1 });
      expect(addDays({ year: 2026, month: 3, day: 1 }, -1)).toEqual({ year: 2026, month: 2, day: 28 });
    });

    it('should count whole days between dates', () => {
      const monday = { year: 2026, month: 10, day: 19 };
      expect(daysBetween(monday, { year: 2026, month: 10, day: 26 })).toBe(7);
      expect(daysBetween(monday, { year: 2026, month: 10, day: 18 })).toBe(-1);
      expect(compareLocalDates(monday, monday)).toBe(0);
      expect(compareLocalDates({ year: 2026, month: 11, day: 1 }, monday)).toBeGreaterThan(0);
    });

    it('should number weekdays from Monday', () => {
      expect(weekdayOf({ year: 2026, month: 10, day: 19 })).toBe(0);
      expect(weekdayOf({ year: 2026, month: 10, day: 25 })).toBe(6);
      expect(weekdayOf({ year: 2027, month: 1, day: 1 })).toBe(4);
    });

    it('should find the last day of a month', () => {
      expect(lastDayOfMonth({ year: 2028, month: 2, day: 10 })).toEqual({ year: 2028, month: 2, day: 29 });
      expect(lastDayOfMonth({ year: 2026, month: 12, day: 5 })).toEqual({ year: 2026, month: 12, day: 31 });
    });
  });

  describe('parseLocalDate', () => {
    it('should accept real calendar dates', () => {
      expect(parseLocalDate('2026-10-20')).toEqual({ year: 2026, month: 10, day: 20 });
    });

    it('should reject impossible or malformed dates', () => {
      expect(parseLocalDate('2026-02-30')).toBeUndefined();
      expect(parseLocalDate('2026-13-01')).toBeUndefined();
      expect(parseLocalDate('2026-2-3')).toBeUndefined();
    });
  });

  describe('formatting', () => {
    const twoPm = new Date('2026-10-20T08:30:00Z');

    it('should format clock times on a 12-hour dial', () => {
      expect(formatClock(twoPm, KOLKATA)).toBe('02:00 PM');
      expect(formatClock(new Date('2026-10-20T00:00:00Z'), 'UTC')).toBe('12:00 AM');
      expect(formatClock(new Date('2026-10-20T12:05:00Z'), 'UTC')).toBe('12:05 PM');
    });

    it('should format labels for people', () => {
      expect(formatDateTime(twoPm, KOLKATA)).toBe('2026-10-20 02:00 PM');
      expect(formatSlotLabel(twoPm, KOLKATA)).toBe('Tuesday, Oct 20 at 02:00 PM');
      expect(formatDayHeading({ year: 2026, month: 10, day: 20 })).toBe('Tuesday, October 20');
    });

    it('should render ISO strings with the zone offset', () => {
      expect(toZonedIso(twoPm, KOLKATA)).toBe('2026-10-20T14:00:00+05:30');
      expect(toZonedIso(new Date('2026-01-15T14:00:00Z'), NEW_YORK)).toBe('2026-01-15T09:00:00-05:00');
      expect(toZonedIso(twoPm, 'UTC')).toBe('2026-10-20T08:30:00+00:00');
    });
  });
});
