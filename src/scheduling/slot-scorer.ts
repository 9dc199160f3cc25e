import { BusyInterval, CandidateSlot, Preferences, TimeRange } from '../common/types';
import {
  LocalDate,
  addDays,
  compareLocalDates,
  daysBetween,
  toLocalDate,
  weekdayOf,
  zonedDateTime,
} from '../common/zoned-time';
import { WORK_HOURS } from './preference-learner';

export const PREFERRED_HOUR_BONUS = 10;
export const PREFERRED_DAY_BONUS = 5;
export const MAX_CANDIDATES = 3;

export interface SlotSearch {
  preferences: Preferences;
  rangeStart: LocalDate;
  rangeEnd: LocalDate;
  durationMinutes: number;
  busy: readonly BusyInterval[];
  now: Date;
  timeZone: string;
}

/** Half-open overlap: touching endpoints do not conflict. */
export function overlaps(a: TimeRange, b: TimeRange): boolean {
  return a.start < b.end && a.end > b.start;
}

export function overlapsAny(interval: TimeRange, busy: readonly BusyInterval[]): boolean {
  return busy.some((slot) => overlaps(interval, slot));
}

/**
 * Ranks hourly start times across the range. Days outside the preferred
 * weekdays and blackout hours are never proposed; candidates in the past or
 * clashing with a busy interval are dropped. Ties keep enumeration order
 * (day, then hour).
 */
export function findSlots(search: SlotSearch): CandidateSlot[] {
  const { preferences, durationMinutes, busy, now, timeZone } = search;
  const today = toLocalDate(now, timeZone);
  const candidates: CandidateSlot[] = [];

  for (let day = search.rangeStart; compareLocalDates(day, search.rangeEnd) <= 0; day = addDays(day, 1)) {
    const weekday = weekdayOf(day);
    const preferredDay = preferences.preferredDays.includes(weekday);
    if (preferences.preferredDays.length > 0 && !preferredDay) {
      continue;
    }

    for (const hour of WORK_HOURS) {
      if (preferences.blackoutHours.includes(hour)) {
        continue;
      }

      const start = zonedDateTime(day, hour, 0, timeZone);
      const end = new Date(start.getTime() + durationMinutes * 60000);
      if (start <= now || overlapsAny({ start, end }, busy)) {
        continue;
      }

      let score = 0;
      if (preferences.preferredHours.includes(hour)) score += PREFERRED_HOUR_BONUS;
      if (preferredDay) score += PREFERRED_DAY_BONUS;
      score -= daysBetween(today, day);

      candidates.push({ start, end, score });
    }
  }

  return candidates.sort((a, b) => b.score - a.score).slice(0, MAX_CANDIDATES);
}
