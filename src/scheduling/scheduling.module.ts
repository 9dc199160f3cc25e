import { Module } from '@nestjs/common';
import { CalendarModule } from '../calendar/calendar.module';
import { GoogleAuthService } from '../calendar/google-auth.service';
import { Clock, SystemClock } from '../common/clock';
import { PreferenceService } from './preference.service';
import { SchedulingAgentService } from './scheduling-agent.service';

@Module({
  imports: [CalendarModule],
  providers: [{ provide: Clock, useClass: SystemClock }, PreferenceService, SchedulingAgentService],
  exports: [Clock, PreferenceService, SchedulingAgentService],
})
export class SchedulingModule {
  constructor(authService: GoogleAuthService, preferenceService: PreferenceService) {
    // A new grant may point at a different calendar, so learn again
    authService.onGrant(() => preferenceService.resetSession());
  }
}
