import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/env.validation';
import { CalendarBackend } from '../calendar/calendar-backend';
import { Clock } from '../common/clock';
import { Result, describeError, err, ok, toError } from '../common/result';
import { CalendarEventRecord, HistoricalEvent, Preferences } from '../common/types';
import { DEFAULT_PREFERENCES, learnPreferences } from './preference-learner';

export function toHistoricalEvent(event: CalendarEventRecord): HistoricalEvent | undefined {
  if (event.start.kind !== 'timed' || event.end.kind !== 'timed') {
    return undefined;
  }
  return {
    start: event.start.instant,
    end: event.end.instant,
    attendees: event.attendees,
    title: event.title,
  };
}

/**
 * Learns preferences once per session. A failed history read never blocks
 * scheduling: the session carries on with {@link DEFAULT_PREFERENCES}.
 */
@Injectable()
export class PreferenceService {
  private readonly logger = new Logger(PreferenceService.name);
  private session?: Promise<Preferences>;

  constructor(
    private readonly calendar: CalendarBackend,
    private readonly clock: Clock,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  async loadPreferences(): Promise<Result<Preferences>> {
    const now = this.clock.now();
    const lookbackDays = this.configService.get('HISTORY_LOOKBACK_DAYS', { infer: true });

    try {
      const history = await this.calendar.listEvents({
        timeMin: new Date(now.getTime() - lookbackDays * 24 * 60 * 60 * 1000),
        timeMax: now,
        maxResults: this.configService.get('HISTORY_MAX_EVENTS', { infer: true }),
      });

      const events = history
        .map(toHistoricalEvent)
        .filter((event): event is HistoricalEvent => event !== undefined);

      return ok(learnPreferences(events, this.configService.get('DEFAULT_TIMEZONE', { infer: true })));
    } catch (error) {
      return err(toError(error));
    }
  }

  getPreferences(): Promise<Preferences> {
    if (!this.session) {
      this.session = this.loadPreferences().then((result) => {
        if (result.ok) {
          this.logger.log(
            `Learned preferences: days=[${result.value.preferredDays.join(', ')}] ` +
              `hours=[${result.value.preferredHours.join(', ')}] ` +
              `duration=${result.value.averageDurationMinutes}m`,
          );
          return result.value;
        }
        this.logger.warn(`Error analyzing past meetings, using defaults: ${describeError(result.error)}`);
        return DEFAULT_PREFERENCES;
      });
    }
    return this.session;
  }

  resetSession(): void {
    this.session = undefined;
  }
}
