import { LocalDate } from './zoned-time';

export interface TimeRange {
  start: Date;
  end: Date;
}

/** Half-open `[start, end)` interval the calendar reports as unavailable. */
export type BusyInterval = TimeRange;

export interface Attendee {
  email?: string;
  responseStatus?: string;
}

export interface HistoricalEvent {
  start: Date;
  end: Date;
  attendees: Attendee[];
  title: string;
}

export interface Preferences {
  /** Monday=0 … Sunday=6, most frequent first, at most 3 */
  readonly preferredDays: readonly number[];
  /** Hours of day, most frequent first, at most 3 */
  readonly preferredHours: readonly number[];
  readonly averageDurationMinutes: number;
  /** Work hours outside the preferred set, ascending */
  readonly blackoutHours: readonly number[];
  readonly frequentContacts: readonly string[];
}

export interface CandidateSlot {
  start: Date;
  end: Date;
  score: number;
}

export type EventTime =
  | { kind: 'timed'; instant: Date }
  | { kind: 'allDay'; date: string };

export interface CalendarEventRecord {
  id: string;
  title: string;
  start: EventTime;
  end: EventTime;
  attendees: Attendee[];
  htmlLink: string;
  description?: string;
}

export interface EventDraft {
  title: string;
  start: Date;
  end: Date;
  description?: string;
}

export interface EventListQuery {
  timeMin: Date;
  timeMax?: Date;
  /** Free-text filter passed to the provider */
  text?: string;
  maxResults?: number;
}

export interface LocalDateRange {
  start: LocalDate;
  end: LocalDate;
}
