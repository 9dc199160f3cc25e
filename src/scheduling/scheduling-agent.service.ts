import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/env.validation';
import { CalendarBackend } from '../calendar/calendar-backend';
import { Clock } from '../common/clock';
import { Result, describeError, err, ok, toError } from '../common/result';
import {
  BusyInterval,
  CalendarEventRecord,
  CandidateSlot,
  EventTime,
  LocalDateRange,
  TimeRange,
} from '../common/types';
import {
  LocalDate,
  addDays,
  compareLocalDates,
  endOfLocalDay,
  formatClock,
  formatDateTime,
  formatDayHeading,
  formatLocalDate,
  formatSlotLabel,
  startOfLocalDay,
  toLocalDate,
  toZonedIso,
  zonedDateTime,
} from '../common/zoned-time';
import { AgentResult, HourAvailability, MeetingView, SlotView, errorResult } from './agent-result';
import { PreferenceService } from './preference.service';
import { WORK_HOURS } from './preference-learner';
import { findSlots, overlapsAny } from './slot-scorer';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Same-day fallback search when a requested time is taken. */
export const MAX_SAME_DAY_ATTEMPTS = 8;

const AVAILABILITY_START_HOUR = 9;
const AVAILABILITY_END_HOUR = 17;

export interface OptimalTimeOptions {
  rangeStart?: LocalDate;
  rangeEnd?: LocalDate;
  durationMinutes?: number;
}

export interface ScheduleRequest {
  person: string;
  requestedStart?: Date;
  durationMinutes?: number;
}

@Injectable()
export class SchedulingAgentService {
  private readonly logger = new Logger(SchedulingAgentService.name);
  private readonly timeZone: string;

  constructor(
    private readonly calendar: CalendarBackend,
    private readonly preferenceService: PreferenceService,
    private readonly clock: Clock,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.timeZone = configService.get('DEFAULT_TIMEZONE', { infer: true });
  }

  async findOptimalMeetingTime(options: OptimalTimeOptions = {}): Promise<Result<CandidateSlot[]>> {
    const preferences = await this.preferenceService.getPreferences();
    const now = this.clock.now();
    const durationMinutes = options.durationMinutes ?? preferences.averageDurationMinutes;
    const rangeStart = options.rangeStart ?? addDays(toLocalDate(now, this.timeZone), 1);
    const rangeEnd = options.rangeEnd ?? addDays(rangeStart, 7);

    // The last candidate (17:00 on the final day) may run past midnight
    const lastCandidateEnd = zonedDateTime(rangeEnd, 17, 0, this.timeZone).getTime() + durationMinutes * 60000;
    const window: TimeRange = {
      start: startOfLocalDay(rangeStart, this.timeZone),
      end: new Date(Math.max(endOfLocalDay(rangeEnd, this.timeZone).getTime(), lastCandidateEnd)),
    };

    let busy: BusyInterval[];
    try {
      busy = await this.calendar.queryFreeBusy(window);
    } catch (error) {
      this.logger.error(`Error fetching busy times: ${describeError(error)}`);
      return err(toError(error));
    }

    const slots = findSlots({
      preferences,
      rangeStart,
      rangeEnd,
      durationMinutes,
      busy,
      now,
      timeZone: this.timeZone,
    });
    this.logger.log(
      `Scored ${formatLocalDate(rangeStart)}..${formatLocalDate(rangeEnd)} against ${busy.length} busy interval(s): ${slots.length} candidate(s)`,
    );
    return ok(slots);
  }

  /**
   * Looks for a free slot of the same length later on the requested day,
   * one hour apart, giving up after {@link MAX_SAME_DAY_ATTEMPTS} tries or
   * when a candidate would leave the day.
   */
  async findNextAvailableSlot(
    requestedStart: Date,
    durationMinutes: number,
    maxAttempts = MAX_SAME_DAY_ATTEMPTS,
  ): Promise<TimeRange | undefined> {
    const day = toLocalDate(requestedStart, this.timeZone);
    const dayEnd = new Date(zonedDateTime(day, 23, 59, this.timeZone).getTime() + 59 * 1000);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const start = new Date(requestedStart.getTime() + attempt * HOUR_MS);
      const end = new Date(start.getTime() + durationMinutes * 60000);
      if (compareLocalDates(toLocalDate(start, this.timeZone), day) !== 0 || end > dayEnd) {
        break;
      }

      const busy = await this.calendar.queryFreeBusy({ start, end });
      if (!overlapsAny({ start, end }, busy)) {
        return { start, end };
      }
    }
    return undefined;
  }

  async scheduleMeeting(request: ScheduleRequest): Promise<AgentResult> {
    // Non-positive durations count as absent
    const durationMinutes =
      request.durationMinutes !== undefined && request.durationMinutes > 0 ? request.durationMinutes : undefined;
    if (request.requestedStart) {
      return this.scheduleAtRequestedTime(request.person, request.requestedStart, durationMinutes);
    }
    return this.scheduleAtOptimalTime(request.person, durationMinutes);
  }

  async suggestTimes(person?: string): Promise<AgentResult> {
    const outcome = await this.findOptimalMeetingTime();
    if (!outcome.ok) {
      return errorResult(`Error finding meeting times: ${outcome.error.message}`);
    }
    if (outcome.value.length === 0) {
      return { status: 'no_slot', message: 'No suitable meeting times found in the next week.' };
    }

    return {
      status: 'suggestions',
      message: person ? `Here are the best times to meet with ${person}:` : 'Here are the best times for a meeting:',
      slots: outcome.value.map((slot) => this.toSlotView(slot)),
    };
  }

  async findMeetingsWithPerson(person: string, range?: LocalDateRange): Promise<AgentResult> {
    const now = this.clock.now();
    const timeMin = range ? startOfLocalDay(range.start, this.timeZone) : now;
    const timeMax = range ? endOfLocalDay(range.end, this.timeZone) : new Date(now.getTime() + 30 * DAY_MS);

    let events: CalendarEventRecord[];
    try {
      events = await this.calendar.listEvents({ timeMin, timeMax, text: person });
    } catch (error) {
      return errorResult(`Error finding meetings: ${describeError(error)}`);
    }

    const needle = person.toLowerCase();
    const meetings = events
      .filter((event) => event.title.toLowerCase().includes(needle))
      .map((event) => this.toMeetingView(event, (instant) => formatSlotLabel(instant, this.timeZone)));

    return {
      status: 'meetings',
      person,
      meetings,
      message:
        meetings.length > 0
          ? `I found ${meetings.length} meeting${meetings.length === 1 ? '' : 's'} with ${person}`
          : `I couldn't find any meetings with ${person} in the specified time range.`,
    };
  }

  async viewDay(date: LocalDate): Promise<AgentResult> {
    let events: CalendarEventRecord[];
    try {
      events = await this.calendar.listEvents({
        timeMin: startOfLocalDay(date, this.timeZone),
        timeMax: endOfLocalDay(date, this.timeZone),
      });
    } catch (error) {
      return errorResult(`Error fetching events: ${describeError(error)}`);
    }

    const heading = formatDayHeading(date);
    return {
      status: 'agenda',
      date: formatLocalDate(date),
      events: events.map((event) => this.toMeetingView(event, (instant) => formatClock(instant, this.timeZone))),
      message:
        events.length > 0 ? `Here's your schedule for ${heading}:` : `You have no events scheduled for ${heading}.`,
    };
  }

  async checkAvailability(date: LocalDate): Promise<AgentResult> {
    const window: TimeRange = {
      start: zonedDateTime(date, AVAILABILITY_START_HOUR, 0, this.timeZone),
      end: zonedDateTime(date, AVAILABILITY_END_HOUR, 0, this.timeZone),
    };

    // Fetch through the end of the last hour row
    const lastRowEnd = zonedDateTime(date, WORK_HOURS[WORK_HOURS.length - 1] + 1, 0, this.timeZone);

    let busy: BusyInterval[];
    try {
      busy = await this.calendar.queryFreeBusy({ start: window.start, end: lastRowEnd });
    } catch (error) {
      return errorResult(`Error checking availability: ${describeError(error)}`);
    }

    const hours: HourAvailability[] = WORK_HOURS.map((hour) => {
      const start = zonedDateTime(date, hour, 0, this.timeZone);
      return {
        hour,
        label: formatClock(start, this.timeZone),
        busy: overlapsAny({ start, end: new Date(start.getTime() + HOUR_MS) }, busy),
      };
    });

    const heading = formatDayHeading(date);
    const fullyFree = !overlapsAny(window, busy);
    return {
      status: 'availability',
      date: formatLocalDate(date),
      fullyFree,
      hours,
      message: fullyFree
        ? `You're completely free on ${heading} from ${AVAILABILITY_START_HOUR}:00 to ${AVAILABILITY_END_HOUR}:00!`
        : `Here's your availability for ${heading}:`,
    };
  }

  async removeEvent(eventId: string): Promise<AgentResult> {
    try {
      await this.calendar.deleteEvent(eventId);
      this.logger.log(`Removed event ${eventId}`);
      return { status: 'removed', eventId, message: 'Event removed successfully.' };
    } catch (error) {
      return errorResult(`Error removing event: ${describeError(error)}`);
    }
  }

  async rescheduleEvent(eventId: string, newStart: Date, durationMinutes = 60): Promise<AgentResult> {
    const newEnd = new Date(newStart.getTime() + durationMinutes * 60000);
    try {
      const updated = await this.calendar.updateEventTime(eventId, newStart, newEnd);
      return {
        status: 'moved',
        eventLink: updated.htmlLink,
        scheduledTime: toZonedIso(newStart, this.timeZone),
        message: `Event rescheduled: ${updated.htmlLink}`,
      };
    } catch (error) {
      return errorResult(`Error rescheduling event: ${describeError(error)}`);
    }
  }

  private async scheduleAtRequestedTime(
    person: string,
    requestedStart: Date,
    durationMinutes?: number,
  ): Promise<AgentResult> {
    const duration = durationMinutes ?? (await this.preferenceService.getPreferences()).averageDurationMinutes;
    const requested: TimeRange = {
      start: requestedStart,
      end: new Date(requestedStart.getTime() + duration * 60000),
    };
    const requestedLabel = formatDateTime(requestedStart, this.timeZone);

    try {
      const busy = await this.calendar.queryFreeBusy(requested);
      if (!overlapsAny(requested, busy)) {
        const event = await this.calendar.insertEvent({
          title: `Meeting with ${person}`,
          start: requested.start,
          end: requested.end,
        });
        this.logger.log(`Created "${event.title}" at ${requestedLabel}`);
        return {
          status: 'created',
          message: `Meeting scheduled for ${requestedLabel}`,
          eventLink: event.htmlLink,
          scheduledTime: toZonedIso(requested.start, this.timeZone),
          alternatives: [],
        };
      }

      const next = await this.findNextAvailableSlot(requestedStart, duration);
      if (!next) {
        return {
          status: 'no_slot',
          message: `No available slots found on ${formatLocalDate(toLocalDate(requestedStart, this.timeZone))} after ${formatClock(requestedStart, this.timeZone)}.`,
          originalTime: requestedLabel,
        };
      }

      const event = await this.calendar.insertEvent({
        title: `Meeting with ${person} (Rescheduled)`,
        description: `Originally requested for ${requestedLabel}`,
        start: next.start,
        end: next.end,
      });
      const rescheduledLabel = formatDateTime(next.start, this.timeZone);
      this.logger.log(`Requested ${requestedLabel} was busy, booked ${rescheduledLabel} instead`);
      return {
        status: 'rescheduled',
        message: `Requested time slot unavailable on ${requestedLabel}. Meeting rescheduled to ${rescheduledLabel}`,
        eventLink: event.htmlLink,
        scheduledTime: toZonedIso(next.start, this.timeZone),
        originalTime: requestedLabel,
      };
    } catch (error) {
      return errorResult(`Error scheduling meeting: ${describeError(error)}`);
    }
  }

  private async scheduleAtOptimalTime(person: string, durationMinutes?: number): Promise<AgentResult> {
    const now = this.clock.now();
    const outcome = await this.findOptimalMeetingTime({
      rangeStart: toLocalDate(new Date(now.getTime() + DAY_MS), this.timeZone),
      rangeEnd: toLocalDate(new Date(now.getTime() + 14 * DAY_MS), this.timeZone),
      durationMinutes,
    });

    if (!outcome.ok) {
      return errorResult(`Error finding optimal meeting time: ${outcome.error.message}`);
    }
    const [best, ...alternatives] = outcome.value;
    if (!best) {
      return errorResult('No suitable meeting times found in the next 2 weeks.');
    }

    try {
      const event = await this.calendar.insertEvent({
        title: `Meeting with ${person}`,
        description: 'Automatically scheduled by Meeting Agent',
        start: best.start,
        end: best.end,
      });
      const label = formatDateTime(best.start, this.timeZone);
      this.logger.log(`Booked optimal slot ${label} (score ${best.score}) for "${event.title}"`);
      return {
        status: 'created',
        message: `Optimal meeting time found and scheduled: ${label}`,
        eventLink: event.htmlLink,
        scheduledTime: toZonedIso(best.start, this.timeZone),
        alternatives: alternatives.map((slot) => this.toSlotView(slot)),
      };
    } catch (error) {
      return errorResult(`Error creating event: ${describeError(error)}`);
    }
  }

  private toSlotView(slot: CandidateSlot): SlotView {
    return {
      start: toZonedIso(slot.start, this.timeZone),
      end: toZonedIso(slot.end, this.timeZone),
      label: formatSlotLabel(slot.start, this.timeZone),
      score: slot.score,
    };
  }

  private toMeetingView(event: CalendarEventRecord, label: (instant: Date) => string): MeetingView {
    return {
      id: event.id,
      title: event.title || 'No Title',
      start: this.eventTimeToString(event.start),
      end: this.eventTimeToString(event.end),
      label: event.start.kind === 'timed' ? label(event.start.instant) : 'All day',
      htmlLink: event.htmlLink,
    };
  }

  private eventTimeToString(time: EventTime): string {
    return time.kind === 'timed' ? toZonedIso(time.instant, this.timeZone) : time.date;
  }
}
