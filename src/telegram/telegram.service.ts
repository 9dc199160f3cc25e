import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request, Response } from 'express';
import { Markup, Telegraf } from 'telegraf';
import { AppConfig } from '../config/env.validation';
import { CalendarHealthService } from '../calendar/calendar-health.service';
import { GoogleAuthService } from '../calendar/google-auth.service';
import { CommandService } from '../commands/command.service';
import { describeError } from '../common/result';
import { PreferenceService } from '../scheduling/preference.service';
import { SchedulingAgentService } from '../scheduling/scheduling-agent.service';
import { CANCEL_ACTION_PREFIX, FormattedReply, formatPreferences, formatResult } from './reply-formatter';

export const WEBHOOK_PATH = '/telegram/webhook';

const WELCOME_TEXT =
  '🤖 Welcome to your meeting assistant!\n\n' +
  'Tell me what you need in plain words:\n' +
  '• "schedule a meeting with Alex tomorrow at 2pm"\n' +
  '• "suggest times for meeting with Taylor"\n' +
  '• "find all meetings with Morgan this month"\n\n' +
  'Type /help for more information.';

const HELP_TEXT =
  '📝 Available commands:\n\n' +
  '/start - Get started\n' +
  '/help - Show this help message\n' +
  '/auth - Connect Google Calendar\n' +
  '/status - Check calendar connection status\n' +
  '/preferences - Show what I learned from your past meetings\n\n' +
  '💬 Examples:\n' +
  '• "schedule a meeting with Alex tomorrow at 2pm for 30 minutes"\n' +
  '• "set up a meeting with Sam" (I pick the best time)\n' +
  '• "suggest times for meeting with Taylor"\n' +
  '• "find meetings with Morgan this week"\n' +
  '• "show my calendar for friday"\n' +
  '• "when am I free tomorrow?"';

const NOT_CONNECTED_TEXT = '⚠️ Google Calendar is not connected.\n\nUse /auth to connect it, then try again.';

@Injectable()
export class TelegramService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TelegramService.name);
  private readonly bot?: Telegraf;
  private readonly useWebhook: boolean;
  private readonly webhookSecret: string;
  private launched = false;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private readonly commandService: CommandService,
    private readonly agent: SchedulingAgentService,
    private readonly preferenceService: PreferenceService,
    private readonly authService: GoogleAuthService,
    private readonly healthService: CalendarHealthService,
  ) {
    this.useWebhook = configService.get('TELEGRAM_USE_WEBHOOK', { infer: true });
    this.webhookSecret = configService.get('TELEGRAM_WEBHOOK_SECRET', { infer: true });

    const token = configService.get('TELEGRAM_BOT_TOKEN', { infer: true });
    if (!token) {
      this.logger.error('TELEGRAM_BOT_TOKEN is not provided, chat front-end disabled');
      return;
    }
    this.bot = new Telegraf(token);
    this.setupHandlers(this.bot);
  }

  onModuleInit() {
    if (!this.bot || this.useWebhook) {
      return;
    }
    // launch() settles only when polling stops, so it must not block startup
    this.bot
      .launch(() => {
        this.launched = true;
        this.logger.log('Telegram bot launched (long polling)');
      })
      .catch((error) => {
        this.launched = false;
        this.logger.warn(`Failed to launch Telegram bot: ${describeError(error)}`);
      });
  }

  onModuleDestroy() {
    if (this.bot && this.launched) {
      this.bot.stop('shutdown');
      this.launched = false;
    }
  }

  async handleWebhook(req: Request, res: Response): Promise<void> {
    if (!this.bot) {
      res.status(503).send('Telegram bot is not configured');
      return;
    }
    const callback = this.bot.webhookCallback(WEBHOOK_PATH, {
      secretToken: this.webhookSecret || undefined,
    });
    await callback(req, res);
  }

  /** Turns one chat message into the reply the bot sends back. */
  async handleText(text: string): Promise<FormattedReply> {
    if (!this.authService.isAuthorized()) {
      return { text: NOT_CONNECTED_TEXT, buttons: [] };
    }
    const result = await this.commandService.execute(text);
    this.logger.log(`Command "${text}" finished with status ${result.status}`);
    return formatResult(result);
  }

  async handleCancel(eventId: string): Promise<string> {
    const result = await this.agent.removeEvent(eventId);
    return formatResult(result).text;
  }

  async describePreferences(): Promise<string> {
    return formatPreferences(await this.preferenceService.getPreferences());
  }

  async describeStatus(): Promise<string> {
    const status = await this.healthService.checkConnection();
    if (status.connected) {
      return '✅ Google Calendar connected\n\nYour calendar is working normally.';
    }
    return (
      '❌ Calendar connection problem\n\n' +
      `Problem: ${status.error ?? 'Not connected to Google Calendar'}\n` +
      `Error type: ${status.errorKind ?? 'unknown'}\n\n` +
      'Use /auth to connect your calendar.'
    );
  }

  private setupHandlers(bot: Telegraf) {
    bot.start((ctx) => ctx.reply(WELCOME_TEXT));
    bot.help((ctx) => ctx.reply(HELP_TEXT));

    bot.command('auth', async (ctx) => {
      await ctx.reply(
        '🔐 Connect Google Calendar\n\n' +
          `Open this link and grant access:\n${this.authService.generateAuthUrl()}\n\n` +
          'Come back here once you see the confirmation page.',
        { link_preview_options: { is_disabled: true } },
      );
      this.logger.log(`Auth URL sent to user ${ctx.from?.id}`);
    });

    bot.command('status', async (ctx) => {
      await ctx.reply(await this.describeStatus());
    });

    bot.command('preferences', async (ctx) => {
      await ctx.reply(await this.describePreferences());
    });

    bot.action(new RegExp(`^${CANCEL_ACTION_PREFIX}(.+)$`), async (ctx) => {
      const eventId = ctx.match[1];
      await ctx.answerCbQuery();
      await ctx.reply(await this.handleCancel(eventId));
    });

    bot.on('text', async (ctx) => {
      const text = ctx.message.text;
      if (text.startsWith('/')) {
        return;
      }

      this.logger.log(`New message from user ${ctx.from?.id ?? 'unknown'}: "${text}"`);
      const reply = await this.handleText(text);
      if (reply.buttons.length > 0) {
        await ctx.reply(
          reply.text,
          Markup.inlineKeyboard(reply.buttons.map((button) => [Markup.button.callback(button.label, button.data)])),
        );
      } else {
        await ctx.reply(reply.text);
      }
    });

    bot.catch(async (error, ctx) => {
      this.logger.error(`Error processing update ${ctx.update.update_id}: ${describeError(error)}`);
      await ctx.reply(`❌ Something went wrong: ${describeError(error)}\n\nTry /status to check your connection.`);
    });
  }
}
