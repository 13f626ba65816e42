import type { Bot } from 'grammy';
import type { Logger } from '../types/logger.js';
import { createLogger } from './logger.js';
import { ConfigError } from './errors.js';
import { type SeenCache, createSeenCache } from './seen-cache.js';
import { type DeliveryEngine, createDeliveryEngine } from './delivery-engine.js';
import { type FleetScheduler, createFleetScheduler } from './fleet-scheduler.js';
import { type NewsService, createNewsService } from './news-service.js';
import { type MergedConfig, createConfigLoader } from '../config/index.js';
import {
  type Storage,
  DocumentStore,
  FavoriteRepository,
  SentArticleRepository,
  SubscriptionRepository,
  UserRepository,
  createJSONStorage,
} from '../storage/index.js';
import {
  type NewsFetcher,
  type NewsProvider,
  createNewsFetcher,
  createProviders,
  getProviderHealthInfo,
} from '../news/index.js';
import {
  RecentArticleIndex,
  type TelegramChannel,
  createTelegramChannel,
} from '../channels/index.js';
import { type BotHandlers, createBotHandlers, registerBotHandlers } from '../bot/index.js';

/**
 * Container holding all application dependencies.
 */
export interface Container {
  /** Loaded configuration */
  config: MergedConfig;
  /** Application logger */
  logger: Logger;
  /** Storage backend */
  storage: Storage;
  users: UserRepository;
  subscriptions: SubscriptionRepository;
  sentArticles: SentArticleRepository;
  favorites: FavoriteRepository;
  /** News providers in priority order */
  providers: NewsProvider[];
  fetcher: NewsFetcher;
  seenCache: SeenCache;
  recentArticles: RecentArticleIndex;
  telegramChannel: TelegramChannel;
  engine: DeliveryEngine;
  scheduler: FleetScheduler;
  newsService: NewsService;
  handlers: BotHandlers;
  /** Stop scheduler and polling; safe to call more than once */
  shutdown: () => Promise<void>;
}

export interface ContainerOptions {
  /** Use this configuration instead of loading it */
  config?: MergedConfig;
  /** Use this logger instead of creating one */
  logger?: Logger;
  /** Storage backend (default: JSON files under paths.state) */
  storage?: Storage;
  /** Pre-built grammY bot (tests) */
  bot?: Bot;
}

/**
 * Load configuration, build every component and wire them together.
 * Nothing is started: call `newsService.start()` and
 * `telegramChannel.start()` when ready.
 */
export async function createContainer(options: ContainerOptions = {}): Promise<Container> {
  const loader = createConfigLoader();
  const config = options.config ?? (await loader.load());

  const logger: Logger =
    options.logger ??
    createLogger({
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
      level: config.logging.level,
      pretty: config.logging.pretty,
    });

  for (const warning of loader.getWarnings()) {
    logger.warn(warning);
  }

  const botToken = config.telegramBotToken;
  if (!botToken) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN is not set');
  }

  // Storage
  const storage = options.storage ?? createJSONStorage(config.paths.state, logger);
  const documents = new DocumentStore(storage);
  const users = new UserRepository(documents);
  const subscriptions = new SubscriptionRepository(documents);
  const sentArticles = new SentArticleRepository(documents);
  const favorites = new FavoriteRepository(documents);

  const migrated = await subscriptions.normalizeStoredTopics();
  if (migrated > 0) {
    logger.info({ users: migrated }, 'Normalized stored subscription topics');
  }

  // News
  const providers = createProviders(config.news, logger);
  const health = getProviderHealthInfo(providers);
  if (health.available.length === 0) {
    logger.warn({ unavailable: health.unavailable }, 'No news provider API key configured');
  } else {
    logger.info(health, 'News providers');
  }
  const fetcher = createNewsFetcher(providers, logger, {
    language: config.news.language,
    country: config.news.country,
    breaker: {
      maxFailures: 3,
      resetTimeout: 60_000,
      timeout: config.news.requestTimeoutMs * 2,
    },
  });

  // Telegram
  const recentArticles = new RecentArticleIndex();
  const telegramChannel = createTelegramChannel(
    {
      botToken,
      timeout: config.telegram.timeoutMs,
      maxRetries: config.telegram.maxRetries,
      timezone: config.telegram.timezone,
    },
    { favorites, recentArticles, logger },
    options.bot
  );

  // Core
  const seenCache = createSeenCache({ maxEntriesPerUser: config.delivery.seenCacheMaxPerUser });
  const engine = createDeliveryEngine(
    {
      users,
      subscriptions,
      source: fetcher,
      ledger: sentArticles,
      sink: telegramChannel,
      seenCache,
      logger,
    },
    {
      stalenessDays: config.delivery.stalenessDays,
      defaultLimit: config.delivery.defaultLimit,
      defaultIntervalMinutes: config.delivery.defaultIntervalMinutes,
    }
  );
  const scheduler = createFleetScheduler(users, engine, logger, {
    tickIntervalMs: config.scheduler.tickIntervalMs,
    maxConcurrentUsers: config.scheduler.maxConcurrentUsers,
  });
  const newsService = createNewsService({ engine, scheduler, source: fetcher, favorites, logger });

  // Commands
  const handlers = createBotHandlers(
    { core: newsService, users, subscriptions, recentArticles, logger },
    {
      forceTimeoutMs: config.delivery.forceTimeoutMs,
      timezone: config.telegram.timezone,
      defaultLimit: config.delivery.defaultLimit,
    }
  );
  registerBotHandlers(telegramChannel.bot, handlers);

  let shutdownPromise: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    shutdownPromise ??= (async () => {
      logger.info('Shutting down...');
      await newsService.stop();
      await telegramChannel.stop();
      logger.info('Shutdown complete');
    })();
    return shutdownPromise;
  };

  return {
    config,
    logger,
    storage,
    users,
    subscriptions,
    sentArticles,
    favorites,
    providers,
    fetcher,
    seenCache,
    recentArticles,
    telegramChannel,
    engine,
    scheduler,
    newsService,
    handlers,
    shutdown,
  };
}
