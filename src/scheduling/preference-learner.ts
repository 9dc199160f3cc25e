import { HistoricalEvent, Preferences } from '../common/types';
import { toLocalDate, weekdayOf, zonedParts } from '../common/zoned-time';

/** Hours 9..17, the start hours a meeting may be proposed at. */
export const WORK_HOURS: readonly number[] = Object.freeze([9, 10, 11, 12, 13, 14, 15, 16, 17]);

export const DEFAULT_PREFERENCES: Preferences = Object.freeze({
  preferredDays: Object.freeze([]),
  preferredHours: Object.freeze([]),
  averageDurationMinutes: 60,
  blackoutHours: Object.freeze([]),
  frequentContacts: Object.freeze([]),
});

const MEETING_KEYWORD = 'meeting';

export function isMeeting(event: HistoricalEvent): boolean {
  return event.attendees.length > 0 || event.title.toLowerCase().includes(MEETING_KEYWORD);
}

/**
 * Contacts named by an event: attendees who did not decline, plus whatever
 * follows the last "with" in the title.
 */
export function contactsOf(event: HistoricalEvent): string[] {
  const contacts = event.attendees
    .filter((attendee) => attendee.email && attendee.responseStatus !== 'declined')
    .map((attendee) => attendee.email ?? '');

  const title = event.title.toLowerCase();
  const withAt = title.lastIndexOf('with');
  if (withAt !== -1) {
    const name = title.slice(withAt + 'with'.length).trim();
    if (name) {
      contacts.push(name);
    }
  }
  return contacts;
}

class FrequencyCounter<T> {
  // Map iteration follows insertion order, which settles ties
  private readonly counts = new Map<T, number>();

  add(value: T): void {
    this.counts.set(value, (this.counts.get(value) ?? 0) + 1);
  }

  mostCommon(limit: number): T[] {
    return [...this.counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, limit)
      .map(([value]) => value);
  }
}

export function learnPreferences(events: readonly HistoricalEvent[], timeZone: string): Preferences {
  const days = new FrequencyCounter<number>();
  const hours = new FrequencyCounter<number>();
  const contacts = new FrequencyCounter<string>();
  let totalMinutes = 0;
  let meetings = 0;

  for (const event of events) {
    if (!isMeeting(event)) {
      continue;
    }

    days.add(weekdayOf(toLocalDate(event.start, timeZone)));
    hours.add(zonedParts(event.start, timeZone).hour);
    totalMinutes += (event.end.getTime() - event.start.getTime()) / 60000;
    meetings += 1;
    contactsOf(event).forEach((contact) => contacts.add(contact));
  }

  if (meetings === 0) {
    return DEFAULT_PREFERENCES;
  }

  const preferredHours = hours.mostCommon(3);
  return Object.freeze({
    preferredDays: Object.freeze(days.mostCommon(3)),
    preferredHours: Object.freeze(preferredHours),
    averageDurationMinutes: Math.trunc(totalMinutes / meetings),
    blackoutHours: Object.freeze(WORK_HOURS.filter((hour) => !preferredHours.includes(hour))),
    frequentContacts: Object.freeze(contacts.mostCommon(10)),
  });
}
