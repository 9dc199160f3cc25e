import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Auth, google } from 'googleapis';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { AppConfig } from '../config/env.validation';
import { describeError } from '../common/result';

const CALENDAR_SCOPES = [
  'https://www.googleapis.com/auth/calendar',
  'https://www.googleapis.com/auth/calendar.events',
];

const StoredTokensSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z.string().optional(),
});

type GrantListener = () => void;

/**
 * Owns the OAuth2 client every Google API call goes through, and keeps the
 * granted tokens on disk so a restart does not need a new consent.
 */
@Injectable()
export class GoogleAuthService implements OnModuleInit {
  private readonly logger = new Logger(GoogleAuthService.name);
  private readonly oauth2Client: Auth.OAuth2Client;
  private readonly tokensFilePath: string;
  private readonly grantListeners: GrantListener[] = [];

  constructor(private readonly configService: ConfigService<AppConfig, true>) {
    this.oauth2Client = new google.auth.OAuth2(
      this.configService.get('GOOGLE_OAUTH_CLIENT_ID', { infer: true }),
      this.configService.get('GOOGLE_OAUTH_CLIENT_SECRET', { infer: true }),
      this.configService.get('GOOGLE_OAUTH_REDIRECT_URL', { infer: true }),
    );
    this.tokensFilePath = path.resolve(process.cwd(), this.configService.get('GOOGLE_TOKENS_PATH', { infer: true }));

    this.oauth2Client.on('tokens', (refreshed) => {
      const merged = { ...this.oauth2Client.credentials, ...refreshed };
      this.saveTokens(merged).catch((error) => {
        this.logger.error(`Error saving refreshed tokens: ${describeError(error)}`);
      });
    });
  }

  async onModuleInit() {
    await this.loadSavedTokens();
  }

  get client(): Auth.OAuth2Client {
    return this.oauth2Client;
  }

  generateAuthUrl(): string {
    return this.oauth2Client.generateAuthUrl({
      access_type: 'offline',
      scope: CALENDAR_SCOPES,
      prompt: 'consent',
    });
  }

  async exchangeCodeForTokens(code: string): Promise<Auth.Credentials> {
    this.logger.log('Exchanging authorization code for tokens');
    try {
      const { tokens } = await this.oauth2Client.getToken(code);
      this.oauth2Client.setCredentials(tokens);
      await this.saveTokens(tokens);
      this.grantListeners.forEach((listener) => listener());
      this.logger.log('Google Calendar access granted');
      return tokens;
    } catch (error) {
      this.logger.error(`Token exchange failed: ${describeError(error)}`);
      throw new Error(`Failed to exchange authorization code: ${describeError(error)}`);
    }
  }

  /** Registers a callback fired whenever a new grant replaces the session. */
  onGrant(listener: GrantListener): void {
    this.grantListeners.push(listener);
  }

  isAuthorized(): boolean {
    const { access_token, refresh_token, expiry_date } = this.oauth2Client.credentials;
    if (refresh_token) {
      return true;
    }
    return Boolean(access_token) && (expiry_date ?? 0) > Date.now();
  }

  private async loadSavedTokens(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.tokensFilePath, 'utf-8');
    } catch {
      this.logger.log('No saved tokens found, will need authentication');
      return;
    }

    const parsed = StoredTokensSchema.safeParse(safeJsonParse(raw));
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed token file at ${this.tokensFilePath}`);
      return;
    }

    const tokens = parsed.data;
    const stillValid = (tokens.expiry_date ?? 0) > Date.now();
    if (!tokens.refresh_token && !stillValid) {
      this.logger.log('Saved tokens are expired, will need re-authentication');
      return;
    }

    this.oauth2Client.setCredentials(tokens);
    this.logger.log('Google Calendar tokens loaded from storage');
  }

  private async saveTokens(tokens: Auth.Credentials): Promise<void> {
    await fs.mkdir(path.dirname(this.tokensFilePath), { recursive: true });
    await fs.writeFile(this.tokensFilePath, JSON.stringify(tokens, null, 2));
    this.logger.log('Tokens saved to persistent storage');
  }
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
