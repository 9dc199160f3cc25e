import {
  BusyInterval,
  CalendarEventRecord,
  EventDraft,
  EventListQuery,
  TimeRange,
} from '../common/types';

/**
 * Operations the assistant needs from a calendar provider. Every method may
 * reject with a {@link CalendarBackendError}; callers decide how to report it.
 */
export abstract class CalendarBackend {
  abstract listEvents(query: EventListQuery): Promise<CalendarEventRecord[]>;

  abstract queryFreeBusy(range: TimeRange): Promise<BusyInterval[]>;

  abstract insertEvent(draft: EventDraft): Promise<CalendarEventRecord>;

  abstract updateEventTime(eventId: string, start: Date, end: Date): Promise<CalendarEventRecord>;

  abstract deleteEvent(eventId: string): Promise<void>;
}

export type CalendarErrorKind =
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'rate_limited'
  | 'network'
  | 'unknown';

export class CalendarBackendError extends Error {
  constructor(
    message: string,
    readonly kind: CalendarErrorKind,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'CalendarBackendError';
  }
}
