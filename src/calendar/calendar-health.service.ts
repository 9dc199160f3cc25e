import { Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { describeError } from '../common/result';
import { CalendarBackend, CalendarBackendError, CalendarErrorKind } from './calendar-backend';
import { GoogleAuthService } from './google-auth.service';

export interface ConnectionStatus {
  connected: boolean;
  checkedAt: Date;
  error?: string;
  errorKind?: CalendarErrorKind | 'not_authenticated';
}

const HEALTH_CHECK_INTERVAL_MS = 5 * 60 * 1000;

@Injectable()
export class CalendarHealthService {
  private readonly logger = new Logger(CalendarHealthService.name);

  constructor(
    private readonly authService: GoogleAuthService,
    private readonly calendar: CalendarBackend,
  ) {}

  async checkConnection(): Promise<ConnectionStatus> {
    const checkedAt = new Date();
    if (!this.authService.isAuthorized()) {
      return {
        connected: false,
        checkedAt,
        error: 'Not connected to Google Calendar',
        errorKind: 'not_authenticated',
      };
    }

    try {
      await this.calendar.listEvents({ timeMin: checkedAt, maxResults: 1 });
      return { connected: true, checkedAt };
    } catch (error) {
      return {
        connected: false,
        checkedAt,
        error: describeError(error),
        errorKind: error instanceof CalendarBackendError ? error.kind : 'unknown',
      };
    }
  }

  @Interval(HEALTH_CHECK_INTERVAL_MS)
  async runHealthCheck(): Promise<void> {
    const status = await this.checkConnection();
    if (status.connected) {
      this.logger.log('Calendar connection healthy');
    } else {
      this.logger.warn(`Calendar connection issue (${status.errorKind}): ${status.error}`);
    }
  }
}
