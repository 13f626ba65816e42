import { Bot, GrammyError, HttpError } from 'grammy';
import type { InlineKeyboard } from 'grammy';
import type { Logger } from '../types/logger.js';
import type { Article } from '../types/article.js';
import type { DeliverySink, DeliveryTarget, FavoriteStore } from '../ports/index.js';
import {
  createCircuitBreaker,
  type CircuitBreaker,
  type CircuitStats,
} from '../core/circuit-breaker.js';
import { errorMessage } from '../core/errors.js';
import { formatArticleMessage } from './article-format.js';
import { favoriteKeyboard } from './keyboards.js';
import type { RecentArticleIndex } from './recent-article-index.js';
import { createShortId } from './short-id.js';

/**
 * Telegram channel configuration.
 */
export interface TelegramConfig {
  /** Bot token from BotFather (required) */
  botToken: string;
  /** API request timeout in ms (default: 10000) */
  timeout?: number;
  /** Max retries for retryable errors (default: 2) */
  maxRetries?: number;
  /** Base retry delay in ms (default: 1000) */
  retryDelay?: number;
  /** Longest server-requested wait honored before a retry, in ms (default: 30000) */
  maxRetryAfterMs?: number;
  /** IANA zone used for dates in messages (default: UTC) */
  timezone?: string;
}

const DEFAULT_CONFIG = {
  timeout: 10_000,
  maxRetries: 2,
  retryDelay: 1000,
  maxRetryAfterMs: 30_000,
  timezone: 'utc',
};

/**
 * Telegram channel error.
 */
export class TelegramError extends Error {
  readonly channelName = 'telegram';
  readonly retryable: boolean;
  readonly statusCode: number | undefined;
  /** Wait requested by a 429 response */
  readonly retryAfterMs: number | undefined;

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      statusCode?: number;
      retryAfterMs?: number;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TelegramError';
    this.retryable = options?.retryable ?? false;
    this.statusCode = options?.statusCode;
    this.retryAfterMs = options?.retryAfterMs;
  }

  /**
   * Rejections tied to one chat (blocked bot, unknown chat). They say nothing
   * about Telegram's health.
   */
  isChatError(): boolean {
    return (
      this.statusCode !== undefined &&
      this.statusCode >= 400 &&
      this.statusCode < 500 &&
      this.statusCode !== 429
    );
  }
}

export interface OutgoingMessage {
  text: string;
  parseMode?: 'HTML';
  replyMarkup?: InlineKeyboard;
}

/**
 * Telegram channel using grammY.
 *
 * - Inbound: long polling; command handlers are registered on `bot`
 * - Outbound: article delivery for the engine (DeliverySink)
 *
 * Features:
 * - Circuit breaker for resilience (3 failures → open, 60s reset);
 *   per-chat 4xx rejections do not count against it
 * - Retry logic (linear backoff, or retry_after on 429) for 429, 5xx and network errors
 * - Graceful start/stop
 */
export class TelegramChannel implements DeliverySink {
  readonly name = 'telegram';
  readonly bot: Bot;

  private readonly config: Required<TelegramConfig>;
  private readonly logger: Logger;
  private readonly favorites: FavoriteStore;
  private readonly recentArticles: RecentArticleIndex;
  private readonly circuitBreaker: CircuitBreaker;
  private running = false;

  constructor(
    config: TelegramConfig,
    deps: { favorites: FavoriteStore; recentArticles: RecentArticleIndex; logger: Logger },
    bot?: Bot
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.favorites = deps.favorites;
    this.recentArticles = deps.recentArticles;
    this.logger = deps.logger.child({ component: 'telegram' });
    this.bot = bot ?? new Bot(this.config.botToken);

    this.circuitBreaker = createCircuitBreaker({
      name: 'telegram',
      maxFailures: 3,
      resetTimeout: 60_000, // 1 minute
      // Covers every retry attempt and its longest wait
      timeout:
        (this.config.timeout +
          Math.max(this.config.retryDelay * (this.config.maxRetries + 1), this.config.maxRetryAfterMs)) *
        (this.config.maxRetries + 1),
      logger: this.logger,
    });
  }

  /**
   * Start long polling. Resolves once polling has been launched.
   */
  start(): Promise<void> {
    if (this.running) {
      this.logger.warn('Telegram channel already running');
      return Promise.resolve();
    }

    this.bot.catch((err) => {
      this.logger.error(
        { error: errorMessage(err.error), updateId: err.ctx.update.update_id },
        'Telegram update handler failed'
      );
    });

    this.running = true;
    void this.bot
      .start({
        onStart: (info) => {
          this.logger.info({ username: info.username }, 'Telegram channel started');
        },
      })
      .catch((error: unknown) => {
        this.running = false;
        this.logger.error({ error: errorMessage(error) }, 'Telegram polling stopped with error');
      });

    return Promise.resolve();
  }

  /**
   * Stop polling. Safe to call when not running.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    await this.bot.stop();
    this.logger.info('Telegram channel stopped');
  }

  /**
   * Send one article with its favorite button. Throws when delivery fails.
   */
  async deliver(target: DeliveryTarget, article: Article): Promise<void> {
    const shortId = createShortId(article.url);
    this.recentArticles.remember(shortId, article);

    let isFavorite = false;
    try {
      isFavorite = await this.favorites.isFavorite(target.userId, article.url);
    } catch (error) {
      this.logger.warn(
        { userId: target.userId, error: errorMessage(error) },
        'Favorite lookup failed, showing add button'
      );
    }

    await this.send(target.chatId, {
      text: formatArticleMessage(article, this.config.timezone),
      parseMode: 'HTML',
      replyMarkup: favoriteKeyboard(shortId, isFavorite),
    });

    this.logger.debug({ userId: target.userId, url: article.url }, 'Article delivered');
  }

  /**
   * Send a message through the breaker and retry loop. Throws on failure.
   */
  async send(chatId: number, message: OutgoingMessage): Promise<void> {
    const chatError = await this.circuitBreaker.execute(async () => {
      try {
        await this.executeWithRetry(() => this.doSendMessage(chatId, message));
        return null;
      } catch (error) {
        if (error instanceof TelegramError && error.isChatError()) {
          return error;
        }
        throw error;
      }
    });

    if (chatError) {
      throw chatError;
    }
  }

  /**
   * Get circuit breaker statistics.
   */
  getCircuitStats(): CircuitStats {
    return this.circuitBreaker.getStats();
  }

  /**
   * Execute with retry logic.
   */
  private async executeWithRetry<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        if (error instanceof TelegramError && !error.retryable) {
          throw error;
        }

        const retryAfterMs = error instanceof TelegramError ? error.retryAfterMs : undefined;
        if (retryAfterMs !== undefined && retryAfterMs > this.config.maxRetryAfterMs) {
          this.logger.warn(
            { retryAfterMs, maxRetryAfterMs: this.config.maxRetryAfterMs },
            'Rate limit wait too long, giving up'
          );
          throw error;
        }

        if (attempt < this.config.maxRetries) {
          const delay = retryAfterMs ?? this.config.retryDelay * (attempt + 1);
          this.logger.warn(
            {
              attempt: attempt + 1,
              maxRetries: this.config.maxRetries,
              delay,
              error: errorMessage(error),
            },
            'Retrying after error'
          );
          await this.sleep(delay);
        }
      }
    }

    throw lastError instanceof Error ? lastError : new Error(errorMessage(lastError));
  }

  /**
   * Perform the actual send message request.
   */
  private async doSendMessage(chatId: number, message: OutgoingMessage): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.config.timeout);

    try {
      // Build options object conditionally to avoid undefined values
      const sendOptions: Parameters<typeof this.bot.api.sendMessage>[2] = {};
      if (message.parseMode) {
        sendOptions.parse_mode = message.parseMode;
      }
      if (message.replyMarkup) {
        sendOptions.reply_markup = message.replyMarkup;
      }

      await this.bot.api.sendMessage(chatId, message.text, sendOptions, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TelegramError('Request timed out', { retryable: true, cause: error });
      }
      throw toTelegramError(error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Sleep for the specified duration.
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Classify a grammY failure: rate limits, server errors and network errors
 * are retryable; other API errors (blocked bot, bad chat) are not.
 */
export function toTelegramError(error: unknown): TelegramError {
  if (error instanceof GrammyError) {
    const retryAfter = error.parameters.retry_after;
    return new TelegramError(`Telegram API error: ${error.description}`, {
      retryable: error.error_code === 429 || error.error_code >= 500,
      statusCode: error.error_code,
      ...(retryAfter !== undefined && { retryAfterMs: retryAfter * 1000 }),
      cause: error,
    });
  }
  if (error instanceof HttpError) {
    return new TelegramError(`Telegram network error: ${error.message}`, {
      retryable: true,
      cause: error,
    });
  }
  return new TelegramError(`Telegram send failed: ${errorMessage(error)}`, {
    retryable: false,
    cause: error,
  });
}

/**
 * Factory function.
 */
export function createTelegramChannel(
  config: TelegramConfig,
  deps: { favorites: FavoriteStore; recentArticles: RecentArticleIndex; logger: Logger },
  bot?: Bot
): TelegramChannel {
  return new TelegramChannel(config, deps, bot);
}
