import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const EnvironmentSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DEFAULT_TIMEZONE: z.string().min(1).default('Asia/Kolkata'),

  GOOGLE_OAUTH_CLIENT_ID: z.string().default(''),
  GOOGLE_OAUTH_CLIENT_SECRET: z.string().default(''),
  GOOGLE_OAUTH_REDIRECT_URL: z.string().default('http://localhost:3000/oauth/google/callback'),
  GOOGLE_CALENDAR_DEFAULT_ID: z.string().min(1).default('primary'),
  GOOGLE_TOKENS_PATH: z.string().min(1).default('data/google-tokens.json'),

  // Bot is disabled when the token is empty
  TELEGRAM_BOT_TOKEN: z.string().default(''),
  TELEGRAM_USE_WEBHOOK: booleanFlag,
  TELEGRAM_WEBHOOK_SECRET: z.string().default(''),

  HISTORY_LOOKBACK_DAYS: z.coerce.number().int().positive().default(90),
  HISTORY_MAX_EVENTS: z.coerce.number().int().positive().max(2500).default(1000),
});

export type AppConfig = z.infer<typeof EnvironmentSchema>;

export function validateEnvironment(config: Record<string, unknown>): AppConfig {
  const parsed = EnvironmentSchema.safeParse(config);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  if (!isKnownTimeZone(parsed.data.DEFAULT_TIMEZONE)) {
    throw new Error(`Invalid environment configuration: unknown time zone ${parsed.data.DEFAULT_TIMEZONE}`);
  }

  return parsed.data;
}

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
