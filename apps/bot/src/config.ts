import dotenv from 'dotenv';
import * as cron from 'node-cron';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isValidTimeZone } from './utils/time.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Load .env from the bot app root
dotenv.config({ path: path.join(__dirname, '..', '.env') });

export interface Config {
  discord: {
    token: string;
    guildId: string;
    announceChannelId: string;
    privilegedRoleId: string;
    nickname: string;
  };
  schedule: {
    url: string;
    fetchTimeoutMs: number;
  };
  club: {
    name: string;
    timeZone: string;
    eventDurationMinutes: number;
  };
  scheduler: {
    syncCron: string;
    syncOnStartup: boolean;
  };
  database: {
    url: string | null;
  };
}

const requiredId = z.string().min(1, 'Required');

const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, 'Required'),
  DISCORD_GUILD_ID: requiredId,
  DISCORD_ANNOUNCE_CHANNEL_ID: requiredId,
  DISCORD_PRIVILEGED_ROLE_ID: requiredId,
  BOT_NICKNAME: z.string().default('Fourth Official'),
  SCHEDULE_URL: z.string().url().default('https://www.midlakesunited.com/schedule/'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CLUB_NAME: z.string().default('Midlakes United'),
  CLUB_TIMEZONE: z
    .string()
    .refine(isValidTimeZone, 'Unknown time zone')
    .default('America/Los_Angeles'),
  EVENT_DURATION_MINUTES: z.coerce.number().int().positive().default(120),
  SYNC_CRON: z
    .string()
    .refine((value) => cron.validate(value), 'Invalid cron expression')
    .default('0 9 * * *'),
  SYNC_ON_STARTUP: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  DATABASE_URL: z.string().optional(),
});

/**
 * Reads and validates the environment. Blank variables count as unset so an
 * empty line in .env falls back to the default.
 *
 * @throws ConfigError naming every missing or invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[name] = value.trim();
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const variables = result.error.issues.map((issue) => issue.path.join('.'));
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${details}`, variables);
  }

  const parsed = result.data;
  return {
    discord: {
      token: parsed.DISCORD_TOKEN,
      guildId: parsed.DISCORD_GUILD_ID,
      announceChannelId: parsed.DISCORD_ANNOUNCE_CHANNEL_ID,
      privilegedRoleId: parsed.DISCORD_PRIVILEGED_ROLE_ID,
      nickname: parsed.BOT_NICKNAME,
    },
    schedule: {
      url: parsed.SCHEDULE_URL,
      fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    },
    club: {
      name: parsed.CLUB_NAME,
      timeZone: parsed.CLUB_TIMEZONE,
      eventDurationMinutes: parsed.EVENT_DURATION_MINUTES,
    },
    scheduler: {
      syncCron: parsed.SYNC_CRON,
      syncOnStartup: parsed.SYNC_ON_STARTUP,
    },
    database: {
      url: parsed.DATABASE_URL ?? null,
    },
  };
}
