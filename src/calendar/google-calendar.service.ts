import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { calendar_v3, google } from 'googleapis';
import { z } from 'zod';
import { AppConfig } from '../config/env.validation';
import {
  BusyInterval,
  CalendarEventRecord,
  EventDraft,
  EventListQuery,
  EventTime,
  TimeRange,
} from '../common/types';
import { describeError } from '../common/result';
import { toZonedIso } from '../common/zoned-time';
import { CalendarBackend, CalendarBackendError, CalendarErrorKind } from './calendar-backend';
import { GoogleAuthService } from './google-auth.service';

const HttpFailureSchema = z.object({ response: z.object({ status: z.number() }) });
const SystemFailureSchema = z.object({ code: z.union([z.string(), z.number()]) });

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN']);

export function classifyGoogleError(error: unknown): CalendarErrorKind {
  const http = HttpFailureSchema.safeParse(error);
  const status = http.success ? http.data.response.status : undefined;

  const system = SystemFailureSchema.safeParse(error);
  const code = system.success ? system.data.code : undefined;

  if (status === 401 || code === 401) return 'unauthorized';
  if (status === 403 || code === 403) return 'forbidden';
  if (status === 404 || status === 410 || code === 404) return 'not_found';
  if (status === 429 || code === 429) return 'rate_limited';
  if (typeof code === 'string' && NETWORK_CODES.has(code)) return 'network';
  return 'unknown';
}

export function toEventTime(time: calendar_v3.Schema$EventDateTime | undefined): EventTime | undefined {
  if (time?.dateTime) {
    return { kind: 'timed', instant: new Date(time.dateTime) };
  }
  if (time?.date) {
    return { kind: 'allDay', date: time.date };
  }
  return undefined;
}

export function toEventRecord(event: calendar_v3.Schema$Event): CalendarEventRecord | undefined {
  const start = toEventTime(event.start);
  const end = toEventTime(event.end);
  if (!event.id || !start || !end) {
    return undefined;
  }

  return {
    id: event.id,
    title: event.summary ?? '',
    start,
    end,
    attendees: (event.attendees ?? []).map((attendee) => ({
      email: attendee.email ?? undefined,
      responseStatus: attendee.responseStatus ?? undefined,
    })),
    htmlLink: event.htmlLink ?? '',
    description: event.description ?? undefined,
  };
}

@Injectable()
export class GoogleCalendarService extends CalendarBackend {
  private readonly logger = new Logger(GoogleCalendarService.name);
  private readonly calendar: calendar_v3.Calendar;
  private readonly calendarId: string;
  private readonly timeZone: string;

  constructor(
    configService: ConfigService<AppConfig, true>,
    authService: GoogleAuthService,
  ) {
    super();
    this.calendar = google.calendar({ version: 'v3', auth: authService.client });
    this.calendarId = configService.get('GOOGLE_CALENDAR_DEFAULT_ID', { infer: true });
    this.timeZone = configService.get('DEFAULT_TIMEZONE', { infer: true });
  }

  async listEvents(query: EventListQuery): Promise<CalendarEventRecord[]> {
    const params: calendar_v3.Params$Resource$Events$List = {
      calendarId: this.calendarId,
      timeMin: query.timeMin.toISOString(),
      timeMax: query.timeMax?.toISOString(),
      q: query.text,
      maxResults: query.maxResults ?? 250,
      singleEvents: true,
      orderBy: 'startTime',
      timeZone: this.timeZone,
    };

    const response = await this.call('list events', () => this.calendar.events.list(params));
    const items = response.data.items ?? [];
    return items
      .map(toEventRecord)
      .filter((event): event is CalendarEventRecord => event !== undefined);
  }

  async queryFreeBusy(range: TimeRange): Promise<BusyInterval[]> {
    const response = await this.call('query free/busy', () =>
      this.calendar.freebusy.query({
        requestBody: {
          timeMin: range.start.toISOString(),
          timeMax: range.end.toISOString(),
          timeZone: this.timeZone,
          items: [{ id: this.calendarId }],
        },
      }),
    );

    const entry = response.data.calendars?.[this.calendarId];
    const reported = entry?.errors ?? [];
    if (reported.length > 0) {
      const reason = reported.map((e) => e.reason ?? 'unknown').join(', ');
      throw new CalendarBackendError(`Free/busy unavailable for ${this.calendarId}: ${reason}`, 'unknown');
    }

    return (entry?.busy ?? []).flatMap((period) =>
      period.start && period.end ? [{ start: new Date(period.start), end: new Date(period.end) }] : [],
    );
  }

  async insertEvent(draft: EventDraft): Promise<CalendarEventRecord> {
    const response = await this.call('create event', () =>
      this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: draft.title,
          description: draft.description,
          start: { dateTime: toZonedIso(draft.start, this.timeZone), timeZone: this.timeZone },
          end: { dateTime: toZonedIso(draft.end, this.timeZone), timeZone: this.timeZone },
          extendedProperties: { private: { source: 'meeting-agent' } },
        },
      }),
    );
    return this.requireRecord(response.data, 'create event');
  }

  async updateEventTime(eventId: string, start: Date, end: Date): Promise<CalendarEventRecord> {
    const response = await this.call('reschedule event', () =>
      this.calendar.events.patch({
        calendarId: this.calendarId,
        eventId,
        requestBody: {
          start: { dateTime: toZonedIso(start, this.timeZone), timeZone: this.timeZone },
          end: { dateTime: toZonedIso(end, this.timeZone), timeZone: this.timeZone },
        },
      }),
    );
    return this.requireRecord(response.data, 'reschedule event');
  }

  async deleteEvent(eventId: string): Promise<void> {
    await this.call('remove event', () =>
      this.calendar.events.delete({ calendarId: this.calendarId, eventId }),
    );
  }

  private requireRecord(event: calendar_v3.Schema$Event, action: string): CalendarEventRecord {
    const record = toEventRecord(event);
    if (!record) {
      throw new CalendarBackendError(`Calendar returned an incomplete event after ${action}`, 'unknown');
    }
    return record;
  }

  private async call<T>(action: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      const kind = classifyGoogleError(error);
      this.logger.error(`Google Calendar failed to ${action} (${kind}): ${describeError(error)}`);
      throw new CalendarBackendError(`Failed to ${action}: ${describeError(error)}`, kind, error);
    }
  }
}
