import { FixedClock, InMemoryCalendarBackend } from '../../test/fakes/in-memory-calendar.backend';
import { testConfig } from '../../test/fakes/test-config';
import { CalendarHealthService } from '../calendar/calendar-health.service';
import { GoogleAuthService } from '../calendar/google-auth.service';
import { CommandService } from '../commands/command.service';
import { PreferenceService } from '../scheduling/preference.service';
import { SchedulingAgentService } from '../scheduling/scheduling-agent.service';
import { TelegramService } from './telegram.service';

describe('TelegramService', () => {
  let calendar: InMemoryCalendarBackend;
  let authService: GoogleAuthService;
  let service: TelegramService;

  beforeEach(() => {
    const clock = new FixedClock(new Date('2026-10-19T08:00:00Z'));
    const config = testConfig({ GOOGLE_TOKENS_PATH: 'data/test-tokens.json' });
    calendar = new InMemoryCalendarBackend();
    authService = new GoogleAuthService(config);
    const preferences = new PreferenceService(calendar, clock, config);
    const agent = new SchedulingAgentService(calendar, preferences, clock, config);

    service = new TelegramService(
      config,
      new CommandService(agent, clock, config),
      agent,
      preferences,
      authService,
      new CalendarHealthService(authService, calendar),
    );
  });

  it('should stay idle without a bot token', () => {
    expect(() => service.onModuleInit()).not.toThrow();
    expect(() => service.onModuleDestroy()).not.toThrow();
  });

  it('should ask for authorization before running commands', async () => {
    expect(await service.handleText('find meetings with Alex')).toEqual({
      text: '⚠️ Google Calendar is not connected.\n\nUse /auth to connect it, then try again.',
      buttons: [],
    });
    expect(calendar.listQueries).toEqual([]);
  });

  it('should reply with listed meetings and cancel buttons', async () => {
    jest.spyOn(authService, 'isAuthorized').mockReturnValue(true);
    calendar.seed('Meeting with Alex', new Date('2026-10-21T10:00:00Z'), new Date('2026-10-21T11:00:00Z'));

    expect(await service.handleText('find meetings with Alex')).toEqual({
      text: '📅 I found 1 meeting with Alex\n1. Meeting with Alex - Wednesday, Oct 21 at 10:00 AM',
      buttons: [{ label: 'Cancel #1', data: 'cancel:seed-1' }],
    });
    expect(await service.handleCancel('seed-1')).toBe('🗑️ Event removed successfully.');
    expect(calendar.deleted).toEqual(['seed-1']);
  });

  it('should describe the calendar connection', async () => {
    expect(await service.describeStatus()).toBe(
      '❌ Calendar connection problem\n\n' +
        'Problem: Not connected to Google Calendar\n' +
        'Error type: not_authenticated\n\n' +
        'Use /auth to connect your calendar.',
    );

    jest.spyOn(authService, 'isAuthorized').mockReturnValue(true);
    expect(await service.describeStatus()).toBe('✅ Google Calendar connected\n\nYour calendar is working normally.');
  });

  it('should show learned preferences', async () => {
    expect((await service.describePreferences()).split('\n')[2]).toBe('Preferred meeting days: Not enough data');
  });
});
