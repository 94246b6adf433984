// src/core/config/settings.ts
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import path from 'node:path';
import { BoostError, ErrorCode } from '../errors.js';
import { getScratchDir } from './app-dirs.js';
import {
  DEFAULT_CHECK_INTERVAL_SECONDS,
  DEFAULT_EPISODE_TIMEOUT_SECONDS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_SECONDS,
  DEFAULT_SCRAPER_TIMEOUT_SECONDS,
  RETRY_LIMITS,
  SCRAPER_TIMEOUT_LIMITS,
} from './constants.js';

export interface BoostSettings {
  finalGoal: number;
  satoshisPerMinute: number;
  maxReductionHours: number;
  earliestTime: number;  // hour of day, fractional hours allowed
  startTime: number;     // nominal publish hour before any boost
}

export interface PodcastHostSettings {
  apiKey: string;
  episodesUrl: string;
  scheduleUrl: string;
}

export interface TelegramSettings {
  botToken: string;
  chatId: string;
  topicId?: string;
  silent: boolean;  // deliver without a notification sound
  notificationThreshold: number;
}

export interface CompanionSettings {
  baseUrl: string;
  webhookToken: string;
}

export interface MonitorSettings {
  pageUrl: string;
  checkIntervalMs: number;
  maxRetries: number;
  retryDelayMs: number;
  scraperTimeoutMs: number;
  useBrowser: boolean;
  debug: boolean;
  dryRun: boolean;
  scratchDir: string;
  podcastHost: PodcastHostSettings;
  boost: BoostSettings;
  telegram?: TelegramSettings;
  companion?: CompanionSettings;
}

export interface BatchSettings {
  generatorCommand?: string;
  episodeTimeoutMs: number;
}

const flag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((v) => ['true', '1', 'yes'].includes(v.trim().toLowerCase()));

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const monitorSchema = z
  .object({
    SCRATCH_DIR: optionalText,
    BOOST_PAGE_URL: z.string().url(),
    CHECK_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(DEFAULT_CHECK_INTERVAL_SECONDS),
    MAX_RETRIES: z.coerce.number().int().min(RETRY_LIMITS.min).max(RETRY_LIMITS.max).default(DEFAULT_MAX_RETRIES),
    RETRY_DELAY_SECONDS: z.coerce.number().min(0).default(DEFAULT_RETRY_DELAY_SECONDS),
    SCRAPER_TIMEOUT_SECONDS: z.coerce
      .number()
      .int()
      .min(SCRAPER_TIMEOUT_LIMITS.min)
      .max(SCRAPER_TIMEOUT_LIMITS.max)
      .default(DEFAULT_SCRAPER_TIMEOUT_SECONDS),
    USE_BROWSER: flag('true'),
    DEBUG: flag('false'),
    DRY_RUN: flag('false'),

    PODHOME_API_KEY: z.string().min(1),
    PODHOME_EPISODES_URL: z.string().url().default('https://serve.podhome.fm/api/episodes'),
    PODHOME_SCHEDULE_URL: z.string().url(),

    FINAL_GOAL: z.coerce.number().int().positive(),
    SATOSHIS_PER_MINUTE: z.coerce.number().int().positive().default(21),
    MAX_REDUCTION_HOURS: z.coerce.number().int().min(0).default(12),
    EARLIEST_TIME: z.coerce.number().min(0).max(48).default(10),
    START_TIME: z.coerce.number().min(0).max(48).default(22),

    TELEGRAM_ENABLED: flag('false'),
    TELEGRAM_BOT_TOKEN: optionalText,
    TELEGRAM_CHAT_ID: optionalText,
    TELEGRAM_TOPIC_ID: optionalText,
    TELEGRAM_SILENT: flag('false'),
    NOTIFICATION_THRESHOLD: z.coerce.number().int().min(0).default(0),

    COMPANION_ENABLED: flag('false'),
    COMPANION_BASE_URL: optionalText.pipe(z.string().url().optional()),
    COMPANION_WEBHOOK_TOKEN: optionalText,
  })
  .superRefine((env, ctx) => {
    if (env.EARLIEST_TIME > env.START_TIME) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['EARLIEST_TIME'], message: 'must not be later than START_TIME' });
    }
    if (env.TELEGRAM_ENABLED) {
      if (!env.TELEGRAM_BOT_TOKEN) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['TELEGRAM_BOT_TOKEN'], message: 'required when TELEGRAM_ENABLED=true' });
      }
      if (!env.TELEGRAM_CHAT_ID) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['TELEGRAM_CHAT_ID'], message: 'required when TELEGRAM_ENABLED=true' });
      }
    }
    if (env.COMPANION_ENABLED) {
      if (!env.COMPANION_BASE_URL) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['COMPANION_BASE_URL'], message: 'required when COMPANION_ENABLED=true' });
      }
      if (!env.COMPANION_WEBHOOK_TOKEN) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['COMPANION_WEBHOOK_TOKEN'], message: 'required when COMPANION_ENABLED=true' });
      }
    }
  });

const batchSchema = z.object({
  EPISODE_GENERATOR_COMMAND: optionalText,
  EPISODE_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(DEFAULT_EPISODE_TIMEOUT_SECONDS),
});

let envLoaded = false;

/** Read a .env file into process.env once; variables already set win. */
export function loadEnvironment(envFile?: string): void {
  if (envLoaded) return;
  loadDotenv(envFile ? { path: envFile } : undefined);
  envLoaded = true;
}

function formatIssues(error: z.ZodError): string {
  // Paths only: values may be secrets
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
}

export function loadMonitorSettings(env: NodeJS.ProcessEnv = process.env): MonitorSettings {
  const parsed = monitorSchema.safeParse(env);
  if (!parsed.success) {
    throw new BoostError(
      ErrorCode.CONFIG_INVALID,
      `Invalid configuration: ${formatIssues(parsed.error)}`,
      false,
      'Check your environment or .env file (see .env.example)'
    );
  }

  const e = parsed.data;
  const telegram: TelegramSettings | undefined =
    e.TELEGRAM_ENABLED && e.TELEGRAM_BOT_TOKEN && e.TELEGRAM_CHAT_ID
      ? {
          botToken: e.TELEGRAM_BOT_TOKEN,
          chatId: e.TELEGRAM_CHAT_ID,
          topicId: e.TELEGRAM_TOPIC_ID,
          silent: e.TELEGRAM_SILENT,
          notificationThreshold: e.NOTIFICATION_THRESHOLD,
        }
      : undefined;
  const companion: CompanionSettings | undefined =
    e.COMPANION_ENABLED && e.COMPANION_BASE_URL && e.COMPANION_WEBHOOK_TOKEN
      ? { baseUrl: e.COMPANION_BASE_URL, webhookToken: e.COMPANION_WEBHOOK_TOKEN }
      : undefined;

  return {
    pageUrl: e.BOOST_PAGE_URL,
    checkIntervalMs: e.CHECK_INTERVAL_SECONDS * 1000,
    maxRetries: e.MAX_RETRIES,
    retryDelayMs: e.RETRY_DELAY_SECONDS * 1000,
    scraperTimeoutMs: e.SCRAPER_TIMEOUT_SECONDS * 1000,
    useBrowser: e.USE_BROWSER,
    debug: e.DEBUG,
    dryRun: e.DRY_RUN,
    scratchDir: e.SCRATCH_DIR ? path.resolve(e.SCRATCH_DIR) : getScratchDir('boostwatch'),
    podcastHost: {
      apiKey: e.PODHOME_API_KEY,
      episodesUrl: e.PODHOME_EPISODES_URL,
      scheduleUrl: e.PODHOME_SCHEDULE_URL,
    },
    boost: {
      finalGoal: e.FINAL_GOAL,
      satoshisPerMinute: e.SATOSHIS_PER_MINUTE,
      maxReductionHours: e.MAX_REDUCTION_HOURS,
      earliestTime: e.EARLIEST_TIME,
      startTime: e.START_TIME,
    },
    telegram,
    companion,
  };
}

export function loadBatchSettings(env: NodeJS.ProcessEnv = process.env): BatchSettings {
  const parsed = batchSchema.safeParse(env);
  if (!parsed.success) {
    throw new BoostError(ErrorCode.CONFIG_INVALID, `Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  return {
    generatorCommand: parsed.data.EPISODE_GENERATOR_COMMAND,
    episodeTimeoutMs: parsed.data.EPISODE_TIMEOUT_SECONDS * 1000,
  };
}
