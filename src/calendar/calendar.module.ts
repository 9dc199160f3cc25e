import { Module } from '@nestjs/common';
import { CalendarBackend } from './calendar-backend';
import { CalendarController } from './calendar.controller';
import { CalendarHealthService } from './calendar-health.service';
import { GoogleAuthService } from './google-auth.service';
import { GoogleCalendarService } from './google-calendar.service';

@Module({
  providers: [
    GoogleAuthService,
    GoogleCalendarService,
    { provide: CalendarBackend, useExisting: GoogleCalendarService },
    CalendarHealthService,
  ],
  controllers: [CalendarController],
  exports: [CalendarBackend, GoogleAuthService, CalendarHealthService],
})
export class CalendarModule {}
