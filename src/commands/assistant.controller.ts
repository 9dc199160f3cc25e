import { BadRequestException, Body, Controller, Delete, Get, HttpCode, Param, Patch, Post } from '@nestjs/common';
import { z } from 'zod';
import { AgentResult } from '../scheduling/agent-result';
import { PreferenceService } from '../scheduling/preference.service';
import { SchedulingAgentService } from '../scheduling/scheduling-agent.service';
import { Preferences } from '../common/types';
import { CommandService } from './command.service';

const CommandSchema = z.object({
  text: z.string().trim().min(1).max(500),
});

const RescheduleSchema = z.object({
  start: z.string().datetime({ offset: true }),
  durationMinutes: z.number().int().positive().max(24 * 60).optional(),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BadRequestException(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}

@Controller('assistant')
export class AssistantController {
  constructor(
    private readonly commandService: CommandService,
    private readonly agent: SchedulingAgentService,
    private readonly preferenceService: PreferenceService,
  ) {}

  @Post('commands')
  @HttpCode(200)
  async runCommand(@Body() body: unknown): Promise<AgentResult> {
    const { text } = parseBody(CommandSchema, body);
    return this.commandService.execute(text);
  }

  @Get('preferences')
  async getPreferences(): Promise<Preferences> {
    return this.preferenceService.getPreferences();
  }

  @Delete('events/:id')
  async removeEvent(@Param('id') id: string): Promise<AgentResult> {
    return this.agent.removeEvent(id);
  }

  @Patch('events/:id')
  async rescheduleEvent(@Param('id') id: string, @Body() body: unknown): Promise<AgentResult> {
    const { start, durationMinutes } = parseBody(RescheduleSchema, body);
    return this.agent.rescheduleEvent(id, new Date(start), durationMinutes);
  }
}
