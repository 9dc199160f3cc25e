import { Controller, Get, Post, Req, Res } from '@nestjs/common';
import type { Request, Response } from 'express';
import { TelegramService } from './telegram.service';

@Controller('telegram')
export class TelegramController {
  constructor(private readonly telegramService: TelegramService) {}

  @Get('health')
  health() {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }

  // Telegraf checks the secret token header and answers the request itself
  @Post('webhook')
  async webhook(@Req() req: Request, @Res() res: Response): Promise<void> {
    await this.telegramService.handleWebhook(req, res);
  }
}
