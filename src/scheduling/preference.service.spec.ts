import { FixedClock, InMemoryCalendarBackend } from '../../test/fakes/in-memory-calendar.backend';
import { testConfig } from '../../test/fakes/test-config';
import { CalendarEventRecord } from '../common/types';
import { DEFAULT_PREFERENCES } from './preference-learner';
import { PreferenceService, toHistoricalEvent } from './preference.service';

const NOW = new Date('2026-10-19T08:00:00Z');

describe('PreferenceService', () => {
  let calendar: InMemoryCalendarBackend;
  let service: PreferenceService;

  beforeEach(() => {
    calendar = new InMemoryCalendarBackend();
    service = new PreferenceService(calendar, new FixedClock(NOW), testConfig({ HISTORY_LOOKBACK_DAYS: '30' }));
  });

  it('should learn from the lookback window ending now', async () => {
    calendar.seed('Meeting with Alex', new Date('2026-10-13T10:00:00Z'), new Date('2026-10-13T11:00:00Z'));

    const result = await service.loadPreferences();

    expect(result.ok && result.value.preferredDays).toEqual([1]);
    expect(result.ok && result.value.preferredHours).toEqual([10]);
    expect(calendar.listQueries).toEqual([
      { timeMin: new Date('2026-09-19T08:00:00Z'), timeMax: NOW, maxResults: 1000 },
    ]);
  });

  it('should ignore all-day events', async () => {
    const allDay: CalendarEventRecord = {
      id: 'holiday',
      title: 'Offsite meeting',
      start: { kind: 'allDay', date: '2026-10-14' },
      end: { kind: 'allDay', date: '2026-10-15' },
      attendees: [],
      htmlLink: 'https://calendar.example.test/event/holiday',
    };
    expect(toHistoricalEvent(allDay)).toBeUndefined();

    calendar.events.push(allDay);
    expect(await service.getPreferences()).toBe(DEFAULT_PREFERENCES);
  });

  it('should report a failed history read and fall back to defaults', async () => {
    calendar.failOn('listEvents');

    const result = await service.loadPreferences();
    expect(result.ok).toBe(false);
    expect(await service.getPreferences()).toBe(DEFAULT_PREFERENCES);
  });

  it('should read history once per session', async () => {
    await service.getPreferences();
    await service.getPreferences();
    expect(calendar.listQueries).toHaveLength(1);

    service.resetSession();
    await service.getPreferences();
    expect(calendar.listQueries).toHaveLength(2);
  });
});
