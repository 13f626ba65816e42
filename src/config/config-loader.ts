import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError, errorMessage, isErrnoError } from '../core/errors.js';
import type { BotConfigFile, LogLevel, MergedConfig } from './config-schema.js';
import {
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  LOG_LEVELS,
  botConfigFileSchema,
} from './config-schema.js';

export const CONFIG_FILE_NAME = 'bot.json';

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables (secrets and overrides)
 * 2. Config file (data/config/bot.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: BotConfigFile | null = null;
  private warnings: string[] = [];

  /**
   * @param configPath - directory holding bot.json (default: `<DATA_PATH>/config`)
   * @param env - environment to read overrides from
   */
  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load and merge configuration from all sources.
   */
  async load(): Promise<MergedConfig> {
    this.warnings = [];
    const config = structuredClone(DEFAULT_CONFIG);

    // Data paths first: they decide where the config file lives
    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths = {
        data: dataPath,
        config: join(dataPath, 'config'),
        state: join(dataPath, 'state'),
        logs: join(dataPath, 'logs'),
      };
      config.logging.logDir = config.paths.logs;
    }

    this.loadedConfig = await this.loadConfigFile(this.configPath ?? config.paths.config);
    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): BotConfigFile | null {
    return this.loadedConfig;
  }

  /**
   * Non-fatal problems found during the last load (logged once a logger exists).
   */
  getWarnings(): string[] {
    return [...this.warnings];
  }

  private async loadConfigFile(dir: string): Promise<BotConfigFile | null> {
    const filePath = join(dir, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoError(error, 'ENOENT')) {
        // File doesn't exist - use defaults
        return null;
      }
      throw new ConfigError(`Failed to read config file ${filePath}: ${errorMessage(error)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = botConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config file ${filePath}: ${issues}`);
    }

    if (parsed.data.version > CONFIG_FILE_VERSION) {
      this.warnings.push(
        `Config file version (${String(parsed.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return parsed.data;
  }

  /**
   * Merge config file values into the config object.
   */
  private mergeConfigFile(config: MergedConfig, file: BotConfigFile): void {
    // News
    if (file.news) {
      const news = file.news;
      if (news.providerPriority) {
        config.news.providerPriority = normalizePriority(news.providerPriority);
      }
      if (news.language !== undefined) {
        config.news.language = news.language;
      }
      if (news.country !== undefined) {
        config.news.country = news.country;
      }
      if (news.maxResults !== undefined) {
        config.news.maxResults = news.maxResults;
      }
      if (news.newsApiPageSize !== undefined) {
        config.news.newsApiPageSize = news.newsApiPageSize;
      }
      if (news.requestTimeoutMs !== undefined) {
        config.news.requestTimeoutMs = news.requestTimeoutMs;
      }
    }

    // Scheduler
    if (file.scheduler) {
      if (file.scheduler.tickIntervalMs !== undefined) {
        config.scheduler.tickIntervalMs = file.scheduler.tickIntervalMs;
      }
      if (file.scheduler.maxConcurrentUsers !== undefined) {
        config.scheduler.maxConcurrentUsers = file.scheduler.maxConcurrentUsers;
      }
    }

    // Delivery
    if (file.delivery) {
      const delivery = file.delivery;
      if (delivery.forceTimeoutMs !== undefined) {
        config.delivery.forceTimeoutMs = delivery.forceTimeoutMs;
      }
      if (delivery.stalenessDays !== undefined) {
        config.delivery.stalenessDays = delivery.stalenessDays;
      }
      if (delivery.defaultLimit !== undefined) {
        config.delivery.defaultLimit = delivery.defaultLimit;
      }
      if (delivery.defaultIntervalMinutes !== undefined) {
        config.delivery.defaultIntervalMinutes = delivery.defaultIntervalMinutes;
      }
      if (delivery.seenCacheMaxPerUser !== undefined) {
        config.delivery.seenCacheMaxPerUser = delivery.seenCacheMaxPerUser;
      }
    }

    // Telegram
    if (file.telegram) {
      if (file.telegram.timeoutMs !== undefined) {
        config.telegram.timeoutMs = file.telegram.timeoutMs;
      }
      if (file.telegram.maxRetries !== undefined) {
        config.telegram.maxRetries = file.telegram.maxRetries;
      }
      if (file.telegram.timezone !== undefined) {
        config.telegram.timezone = file.telegram.timezone;
      }
    }

    // Logging
    if (file.logging) {
      if (file.logging.level) {
        config.logging.level = file.logging.level;
      }
      if (file.logging.pretty !== undefined) {
        config.logging.pretty = file.logging.pretty;
      }
      if (file.logging.maxFiles !== undefined) {
        config.logging.maxFiles = file.logging.maxFiles;
      }
    }
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    // Secrets (always from env)
    const telegramToken = this.env['TELEGRAM_BOT_TOKEN'];
    if (telegramToken) {
      config.telegramBotToken = telegramToken;
    }

    const gnewsKey = this.env['GNEWS_API_KEY'];
    if (gnewsKey) {
      config.news.gnewsApiKey = gnewsKey;
    }

    const newsApiKey = this.env['NEWS_API_KEY'];
    if (newsApiKey) {
      config.news.newsApiKey = newsApiKey;
    }

    const priority = this.env['NEWS_PROVIDER_PRIORITY'];
    if (priority) {
      config.news.providerPriority = normalizePriority(priority.split(','));
    }

    const tickMs = this.env['SCHEDULER_TICK_MS'];
    if (tickMs) {
      const parsed = Number(tickMs);
      if (Number.isInteger(parsed) && parsed > 0) {
        config.scheduler.tickIntervalMs = parsed;
      } else {
        this.warnings.push(`Ignoring invalid SCHEDULER_TICK_MS "${tickMs}"`);
      }
    }

    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel) {
      if (isLogLevel(logLevel)) {
        config.logging.level = logLevel;
      } else {
        this.warnings.push(`Ignoring unknown LOG_LEVEL "${logLevel}"`);
      }
    }
  }
}

function normalizePriority(ids: string[]): string[] {
  return ids.map((id) => id.trim().toLowerCase()).filter((id) => id.length > 0);
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 * Convenience function for quick setup.
 */
export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  const loader = createConfigLoader(configPath);
  return loader.load();
}
