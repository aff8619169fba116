import { ConfigService } from '@nestjs/config';
import { z } from 'zod';

export const TRACKER_CONFIG = 'trackerConfig';

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === '') return fallback;
      return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
    });

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : null));

const TimezoneSchema = z
  .string()
  .default('UTC')
  .refine((tz) => {
    try {
      new Intl.DateTimeFormat('en-US', { timeZone: tz });
      return true;
    } catch {
      return false;
    }
  }, 'Unknown IANA time zone');

const PostTimeSchema = z
  .string()
  .default('22:00')
  .transform((value, ctx) => {
    const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
    const hour = match ? Number(match[1]) : NaN;
    const minute = match ? Number(match[2]) : NaN;
    if (!(hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected HH:MM' });
      return z.NEVER;
    }
    return { hour, minute };
  });

/**
 * Environment variables consumed by the tracker. Parsed once at startup;
 * anything invalid fails the boot with the zod issues listed.
 */
export const TrackerEnvSchema = z.object({
  TRACKER_TIMEZONE: TimezoneSchema,
  QUALIFY_MIN_SECONDS: positiveInt(300),
  CHECKPOINT_INTERVAL_SECONDS: positiveInt(600),
  ROSTER_POLL_SECONDS: positiveInt(30),
  DAILY_POST_TIME: PostTimeSchema,
  BOARD_DISPLAY_LIMIT: positiveInt(10),
  COMPLIMENTS_ENABLED: booleanFlag(true),
  QUOTE_OF_THE_DAY_ENABLED: booleanFlag(true),
  MIN_DAILY_SECONDS: z.coerce.number().int().min(0).default(0),
  TRACK_BOTS: booleanFlag(false),
  ALIAS_GROUPS: z.string().default('{}'),
  DISCORD_BOT_TOKEN: optionalString,
  DISCORD_GUILD_ID: optionalString,
  DISCORD_VOICE_CHANNEL_ID: optionalString,
  DISCORD_POST_CHANNEL_ID: optionalString,
  LEADERBOARD_WEB_EXPORT_ENABLED: booleanFlag(false),
  LEADERBOARD_INGEST_URL: optionalString,
  LEADERBOARD_INGEST_SECRET: optionalString,
  LEADERBOARD_EXPORT_TIMEOUT_MS: z.string().optional(),
  ADMIN_API_TOKEN: optionalString,
});

export interface TrackerConfig {
  timezone: string;
  qualifyMinSeconds: number;
  checkpointIntervalSeconds: number;
  rosterPollSeconds: number;
  dailyPostTime: { hour: number; minute: number };
  boardDisplayLimit: number;
  complimentsEnabled: boolean;
  quoteOfTheDayEnabled: boolean;
  /** A user's day counts toward boards only at or above this; 0 = every day */
  minDailySeconds: number;
  trackBots: boolean;
  /** Raw JSON; parsed leniently by AliasResolver */
  aliasGroupsJson: string;
  discord: {
    token: string | null;
    guildId: string | null;
    voiceChannelId: string | null;
    postChannelId: string | null;
  };
  export: {
    enabled: boolean;
    url: string | null;
    secret: string | null;
    timeoutMs: number;
  };
  adminApiToken: string | null;
}

/** Export timeout: unparsable → 1500ms, negative → 0. */
export function parseExportTimeout(raw: string | undefined): number {
  const parsed = Number.parseInt((raw ?? '1500').trim(), 10);
  if (Number.isNaN(parsed)) return 1500;
  return Math.max(0, parsed);
}

export function loadTrackerConfig(
  read: (key: string) => string | undefined,
): TrackerConfig {
  const raw = Object.fromEntries(
    Object.keys(TrackerEnvSchema.shape).map((key) => [key, read(key)]),
  );
  const parsed = TrackerEnvSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid tracker configuration: ${issues}`);
  }

  const env = parsed.data;
  return {
    timezone: env.TRACKER_TIMEZONE,
    qualifyMinSeconds: env.QUALIFY_MIN_SECONDS,
    checkpointIntervalSeconds: env.CHECKPOINT_INTERVAL_SECONDS,
    rosterPollSeconds: env.ROSTER_POLL_SECONDS,
    dailyPostTime: env.DAILY_POST_TIME,
    boardDisplayLimit: env.BOARD_DISPLAY_LIMIT,
    complimentsEnabled: env.COMPLIMENTS_ENABLED,
    quoteOfTheDayEnabled: env.QUOTE_OF_THE_DAY_ENABLED,
    minDailySeconds: env.MIN_DAILY_SECONDS,
    trackBots: env.TRACK_BOTS,
    aliasGroupsJson: env.ALIAS_GROUPS,
    discord: {
      token: env.DISCORD_BOT_TOKEN,
      guildId: env.DISCORD_GUILD_ID,
      voiceChannelId: env.DISCORD_VOICE_CHANNEL_ID,
      postChannelId: env.DISCORD_POST_CHANNEL_ID,
    },
    export: {
      enabled: env.LEADERBOARD_WEB_EXPORT_ENABLED,
      url: env.LEADERBOARD_INGEST_URL,
      secret: env.LEADERBOARD_INGEST_SECRET,
      timeoutMs: parseExportTimeout(env.LEADERBOARD_EXPORT_TIMEOUT_MS),
    },
    adminApiToken: env.ADMIN_API_TOKEN,
  };
}

export const trackerConfigProvider = {
  provide: TRACKER_CONFIG,
  inject: [ConfigService],
  useFactory: (configService: ConfigService): TrackerConfig =>
    loadTrackerConfig((key) => configService.get<string>(key)),
};
