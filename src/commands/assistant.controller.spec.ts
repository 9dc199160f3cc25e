import { BadRequestException } from '@nestjs/common';
import { FixedClock, InMemoryCalendarBackend } from '../../test/fakes/in-memory-calendar.backend';
import { testConfig } from '../../test/fakes/test-config';
import { PreferenceService } from '../scheduling/preference.service';
import { SchedulingAgentService } from '../scheduling/scheduling-agent.service';
import { AssistantController } from './assistant.controller';
import { CommandService } from './command.service';

describe('AssistantController', () => {
  let calendar: InMemoryCalendarBackend;
  let controller: AssistantController;

  beforeEach(() => {
    const clock = new FixedClock(new Date('2026-10-19T08:00:00Z'));
    const config = testConfig();
    calendar = new InMemoryCalendarBackend();
    const preferences = new PreferenceService(calendar, clock, config);
    const agent = new SchedulingAgentService(calendar, preferences, clock, config);
    controller = new AssistantController(new CommandService(agent, clock, config), agent, preferences);
  });

  it('should reject a missing or blank command', async () => {
    await expect(controller.runCommand({})).rejects.toBeInstanceOf(BadRequestException);
    await expect(controller.runCommand({ text: '   ' })).rejects.toBeInstanceOf(BadRequestException);
  });

  it('should run a command', async () => {
    expect(await controller.runCommand({ text: 'check my availability' })).toMatchObject({
      status: 'availability',
      date: '2026-10-20',
      fullyFree: true,
    });
  });

  it('should reschedule with an offset timestamp only', async () => {
    const seeded = calendar.seed('Standup', new Date('2026-10-21T09:00:00Z'), new Date('2026-10-21T09:15:00Z'));

    await expect(controller.rescheduleEvent(seeded.id, { start: '2026-10-22 15:00' })).rejects.toBeInstanceOf(
      BadRequestException,
    );
    expect(
      await controller.rescheduleEvent(seeded.id, { start: '2026-10-22T15:00:00+00:00', durationMinutes: 15 }),
    ).toMatchObject({ status: 'moved', scheduledTime: '2026-10-22T15:00:00+00:00' });
  });
});
