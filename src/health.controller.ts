import { Controller, Get } from '@nestjs/common';

@Controller()
export class HealthController {
  @Get('health')
  health() {
    return { status: 'ok', service: 'meeting-agent', timestamp: new Date().toISOString() };
  }
}
