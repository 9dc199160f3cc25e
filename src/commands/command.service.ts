import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/env.validation';
import { Clock } from '../common/clock';
import { toLocalDate, zonedDateTime } from '../common/zoned-time';
import { AgentResult, errorResult } from '../scheduling/agent-result';
import { SchedulingAgentService } from '../scheduling/scheduling-agent.service';
import { Intent, UNRECOGNIZED_COMMAND_MESSAGE, interpretCommand } from './command-interpreter';

export const UNCLEAR_DATE_MESSAGE =
  "I couldn't understand the date in your request. Please try again with a clearer date specification.";

@Injectable()
export class CommandService {
  private readonly logger = new Logger(CommandService.name);
  private readonly timeZone: string;

  constructor(
    private readonly agent: SchedulingAgentService,
    private readonly clock: Clock,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.timeZone = configService.get('DEFAULT_TIMEZONE', { infer: true });
  }

  interpret(text: string): Intent {
    return interpretCommand(text, toLocalDate(this.clock.now(), this.timeZone));
  }

  async execute(text: string): Promise<AgentResult> {
    if (!text.trim()) {
      return errorResult('Please enter a command first.');
    }

    const intent = this.interpret(text);
    this.logger.log(`Interpreted "${text}" as ${intent.kind}`);
    return this.dispatch(intent);
  }

  private async dispatch(intent: Intent): Promise<AgentResult> {
    switch (intent.kind) {
      case 'find':
        return this.agent.findMeetingsWithPerson(intent.person, intent.range);

      case 'view_day':
        return intent.date ? this.agent.viewDay(intent.date) : errorResult(UNCLEAR_DATE_MESSAGE);

      case 'check_availability':
        return this.agent.checkAvailability(intent.date);

      case 'schedule': {
        if (intent.invalidDateTime) {
          return errorResult(`Could not understand the date/time: ${intent.invalidDateTime}`);
        }
        const requestedStart = intent.when
          ? zonedDateTime(intent.when.date, intent.when.hour, intent.when.minute, this.timeZone)
          : undefined;
        return this.agent.scheduleMeeting({
          person: intent.person,
          requestedStart,
          durationMinutes: intent.durationMinutes,
        });
      }

      case 'suggest':
        return this.agent.suggestTimes(intent.person);

      case 'unknown':
        return errorResult(UNRECOGNIZED_COMMAND_MESSAGE);
    }
  }
}
