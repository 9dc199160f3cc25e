/**
 * Wall-clock helpers for a single IANA time zone.
 *
 * Hours and weekdays used for scheduling are always those of the configured
 * zone, never the host's. Weekdays are numbered Monday=0 … Sunday=6.
 */

export interface LocalDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface ZonedParts extends LocalDate {
  hour: number;
  minute: number;
  second: number;
}

export const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const;

const MONTH_SHORT_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;
const MONTH_LONG_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

const DAY_MS = 24 * 60 * 60 * 1000;

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

export function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const values: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== 'literal') {
      values[part.type] = Number(part.value);
    }
  }
  return {
    year: values.year,
    month: values.month,
    day: values.day,
    hour: values.hour === 24 ? 0 : values.hour,
    minute: values.minute,
    second: values.second,
  };
}

/** Milliseconds the zone is ahead of UTC at the given instant. */
function zoneOffsetMs(instant: Date, timeZone: string): number {
  const parts = zonedParts(instant, timeZone);
  const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
  return asUtc - wholeSeconds;
}

/** The instant at which the zone's wall clock reads `date hour:minute`. */
export function zonedDateTime(date: LocalDate, hour: number, minute: number, timeZone: string): Date {
  const wallClock = Date.UTC(date.year, date.month - 1, date.day, hour, minute, 0);
  const firstGuess = wallClock - zoneOffsetMs(new Date(wallClock), timeZone);
  const offset = zoneOffsetMs(new Date(firstGuess), timeZone);
  return new Date(wallClock - offset);
}

export function startOfLocalDay(date: LocalDate, timeZone: string): Date {
  return zonedDateTime(date, 0, 0, timeZone);
}

export function endOfLocalDay(date: LocalDate, timeZone: string): Date {
  return new Date(startOfLocalDay(addDays(date, 1), timeZone).getTime() - 1);
}

export function toLocalDate(instant: Date, timeZone: string): LocalDate {
  const { year, month, day } = zonedParts(instant, timeZone);
  return { year, month, day };
}

export function addDays(date: LocalDate, days: number): LocalDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day) + days * DAY_MS);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: LocalDate, to: LocalDate): number {
  const start = Date.UTC(from.year, from.month - 1, from.day);
  const end = Date.UTC(to.year, to.month - 1, to.day);
  return Math.round((end - start) / DAY_MS);
}

export function compareLocalDates(a: LocalDate, b: LocalDate): number {
  return daysBetween(b, a);
}

export function weekdayOf(date: LocalDate): number {
  const sundayBased = new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
  return (sundayBased + 6) % 7;
}

export function lastDayOfMonth(date: LocalDate): LocalDate {
  const firstOfNext = date.month === 12
    ? { year: date.year + 1, month: 1, day: 1 }
    : { year: date.year, month: date.month + 1, day: 1 };
  return addDays(firstOfNext, -1);
}

export function parseLocalDate(value: string): LocalDate | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return undefined;
  }
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  const roundTrip = addDays(date, 0);
  if (roundTrip.year !== date.year || roundTrip.month !== date.month || roundTrip.day !== date.day) {
    return undefined;
  }
  return date;
}

const pad = (value: number) => value.toString().padStart(2, '0');

export function formatLocalDate(date: LocalDate): string {
  return `${date.year}-${pad(date.month)}-${pad(date.day)}`;
}

/** `02:00 PM` */
export function formatClock(instant: Date, timeZone: string): string {
  const { hour, minute } = zonedParts(instant, timeZone);
  const period = hour < 12 ? 'AM' : 'PM';
  const twelveHour = hour % 12 === 0 ? 12 : hour % 12;
  return `${pad(twelveHour)}:${pad(minute)} ${period}`;
}

/** `2026-10-20 02:00 PM` */
export function formatDateTime(instant: Date, timeZone: string): string {
  return `${formatLocalDate(toLocalDate(instant, timeZone))} ${formatClock(instant, timeZone)}`;
}

/** `Tuesday, Oct 20 at 02:00 PM` */
export function formatSlotLabel(instant: Date, timeZone: string): string {
  const date = toLocalDate(instant, timeZone);
  return `${WEEKDAY_NAMES[weekdayOf(date)]}, ${MONTH_SHORT_NAMES[date.month - 1]} ${pad(date.day)} at ${formatClock(instant, timeZone)}`;
}

/** `Tuesday, October 20` */
export function formatDayHeading(date: LocalDate): string {
  return `${WEEKDAY_NAMES[weekdayOf(date)]}, ${MONTH_LONG_NAMES[date.month - 1]} ${pad(date.day)}`;
}

/** ISO-8601 with the zone's offset, e.g. `2026-10-20T14:00:00+05:30` */
export function toZonedIso(instant: Date, timeZone: string): string {
  const parts = zonedParts(instant, timeZone);
  const offsetMinutes = Math.round(zoneOffsetMs(instant, timeZone) / 60000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  const offset = `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
  return `${formatLocalDate(parts)}T${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}${offset}`;
}
