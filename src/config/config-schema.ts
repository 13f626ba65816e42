import { z } from 'zod';

export const CONFIG_FILE_VERSION = 1;

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Bot configuration file schema.
 *
 * This is what gets loaded from data/config/bot.json.
 * All fields are optional - defaults are used for missing values.
 * Secrets belong in the environment, not in this file.
 */
export const botConfigFileSchema = z.object({
  /** Schema version for migrations */
  version: z.number().int().positive(),

  news: z
    .object({
      /** Provider ids, highest priority first */
      providerPriority: z.array(z.string()).optional(),
      language: z.string().min(1).optional(),
      country: z.string().min(1).optional(),
      /** GNews results per request */
      maxResults: z.number().int().positive().max(100).optional(),
      /** NewsAPI page size */
      newsApiPageSize: z.number().int().positive().max(100).optional(),
      requestTimeoutMs: z.number().int().positive().optional(),
    })
    .strict()
    .optional(),

  scheduler: z
    .object({
      tickIntervalMs: z.number().int().positive().optional(),
      maxConcurrentUsers: z.number().int().positive().optional(),
    })
    .strict()
    .optional(),

  delivery: z
    .object({
      forceTimeoutMs: z.number().int().positive().optional(),
      stalenessDays: z.number().positive().optional(),
      defaultLimit: z.number().int().positive().optional(),
      defaultIntervalMinutes: z.number().int().positive().optional(),
      seenCacheMaxPerUser: z.number().int().positive().optional(),
    })
    .strict()
    .optional(),

  telegram: z
    .object({
      timeoutMs: z.number().int().positive().optional(),
      maxRetries: z.number().int().nonnegative().optional(),
      /** IANA zone for dates in messages */
      timezone: z.string().min(1).optional(),
    })
    .strict()
    .optional(),

  logging: z
    .object({
      level: z.enum(LOG_LEVELS).optional(),
      pretty: z.boolean().optional(),
      maxFiles: z.number().int().positive().optional(),
    })
    .strict()
    .optional(),
});

export type BotConfigFile = z.infer<typeof botConfigFileSchema>;

/**
 * Merged application configuration.
 *
 * This is the final config after merging:
 * 1. Hardcoded defaults (lowest priority)
 * 2. Config file values
 * 3. Environment variables (highest priority for secrets)
 */
export interface MergedConfig {
  /** Telegram bot token (from env) */
  telegramBotToken: string | undefined;

  news: {
    gnewsApiKey: string | undefined;
    newsApiKey: string | undefined;
    providerPriority: string[];
    language: string;
    country: string;
    maxResults: number;
    newsApiPageSize: number;
    requestTimeoutMs: number;
  };

  scheduler: {
    tickIntervalMs: number;
    maxConcurrentUsers: number;
  };

  delivery: {
    /** Upper bound on an on-demand "get news now" cycle */
    forceTimeoutMs: number;
    stalenessDays: number;
    defaultLimit: number;
    defaultIntervalMinutes: number;
    seenCacheMaxPerUser: number;
  };

  telegram: {
    timeoutMs: number;
    maxRetries: number;
    timezone: string;
  };

  logging: {
    level: LogLevel;
    pretty: boolean;
    logDir: string;
    maxFiles: number;
  };

  paths: {
    data: string;
    config: string;
    state: string;
    logs: string;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  telegramBotToken: undefined,

  news: {
    gnewsApiKey: undefined,
    newsApiKey: undefined,
    providerPriority: ['gnews', 'newsapi'],
    language: 'ru',
    country: 'ru',
    maxResults: 20,
    newsApiPageSize: 10,
    requestTimeoutMs: 10_000,
  },

  scheduler: {
    tickIntervalMs: 60_000,
    maxConcurrentUsers: 8,
  },

  delivery: {
    forceTimeoutMs: 120_000,
    stalenessDays: 183,
    defaultLimit: 5,
    defaultIntervalMinutes: 60,
    seenCacheMaxPerUser: 100,
  },

  telegram: {
    timeoutMs: 10_000,
    maxRetries: 2,
    timezone: 'utc',
  },

  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    logDir: 'data/logs',
    maxFiles: 10,
  },

  paths: {
    data: 'data',
    config: 'data/config',
    state: 'data/state',
    logs: 'data/logs',
  },
};
