import { Controller, Get, Logger, Query, Res } from '@nestjs/common';
import { Response } from 'express';
import { describeError } from '../common/result';
import { CalendarHealthService, ConnectionStatus } from './calendar-health.service';
import { GoogleAuthService } from './google-auth.service';

@Controller('oauth/google')
export class CalendarController {
  private readonly logger = new Logger(CalendarController.name);

  constructor(
    private readonly authService: GoogleAuthService,
    private readonly healthService: CalendarHealthService,
  ) {}

  @Get('start')
  startAuth(@Res() res: Response) {
    res.redirect(this.authService.generateAuthUrl());
  }

  @Get('callback')
  async handleCallback(@Query('code') code: string | undefined, @Res() res: Response) {
    if (!code) {
      res.status(400).send('Authorization code not provided');
      return;
    }

    try {
      await this.authService.exchangeCodeForTokens(code);
      res.send(`
        <html>
          <body>
            <h2>Google Calendar connected</h2>
            <p>You can close this window and go back to the chat.</p>
            <p>Try sending: "schedule a meeting with Alex tomorrow at 2pm"</p>
          </body>
        </html>
      `);
    } catch (error) {
      this.logger.error(`OAuth callback failed: ${describeError(error)}`);
      res.status(500).send('Failed to authenticate with Google Calendar');
    }
  }

  @Get('status')
  async getAuthStatus(): Promise<ConnectionStatus & { message?: string }> {
    const status = await this.healthService.checkConnection();
    return status.connected
      ? status
      : { ...status, message: 'Go to /oauth/google/start to connect your Google Calendar' };
  }
}
