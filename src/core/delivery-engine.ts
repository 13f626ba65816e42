/**
 * Per-User Delivery Engine
 *
 * One delivery cycle for one user: interval gate, topic lookup, per-topic
 * fetch, staleness and dedup filters, cap, delivery and bookkeeping.
 *
 * Failures of a single topic, article or storage call are logged and the
 * cycle carries on with whatever work remains. processUser never rejects.
 */

import type { Article } from '../types/article.js';
import type { Logger } from '../types/logger.js';
import type { User } from '../types/user.js';
import type {
  ArticleSource,
  DeliverySink,
  SeenArticleLedger,
  SubscriptionRegistry,
  UserDirectory,
} from '../ports/index.js';
import { CircuitOpenError } from './circuit-breaker.js';
import { KeyedMutex } from './concurrency.js';
import { errorMessage } from './errors.js';
import type { SeenCache } from './seen-cache.js';
import { createUserCycleContext, withTraceContext } from './trace-context.js';

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export interface DeliveryEngineConfig {
  /** Articles published longer ago than this are never delivered */
  stalenessDays: number;
  /** Used when a user's limit is unset or non-positive */
  defaultLimit: number;
  /** Used when a user's interval is unset or non-positive */
  defaultIntervalMinutes: number;
}

const DEFAULT_CONFIG: DeliveryEngineConfig = {
  stalenessDays: 183,
  defaultLimit: 5,
  defaultIntervalMinutes: 60,
};

export interface DeliveryEngineDeps {
  users: UserDirectory;
  subscriptions: SubscriptionRegistry;
  source: ArticleSource;
  ledger: SeenArticleLedger;
  sink: DeliverySink;
  seenCache: SeenCache;
  logger: Logger;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export class DeliveryEngine {
  private readonly deps: DeliveryEngineDeps;
  private readonly config: DeliveryEngineConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  /** Cycles for the same user run one after another */
  private readonly userLocks = new KeyedMutex<number>();

  constructor(deps: DeliveryEngineDeps, config: Partial<DeliveryEngineConfig> = {}) {
    this.deps = deps;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = deps.logger.child({ component: 'delivery-engine' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run one delivery cycle.
   *
   * @param force - skip the interval gate (on-demand request)
   * @returns number of fresh articles found, before the per-user cap
   */
  async processUser(user: User, force: boolean): Promise<number> {
    if (!force && !this.isDue(user, this.now())) {
      return 0;
    }

    return withTraceContext(createUserCycleContext(user.id), () =>
      this.userLocks.runExclusive(user.id, () => this.runCycle(user, force))
    );
  }

  /**
   * Whether the user's interval has elapsed since the last cycle.
   */
  isDue(user: User, now: Date): boolean {
    if (!user.lastDeliveryAt) {
      return true;
    }
    const elapsed = now.getTime() - user.lastDeliveryAt.getTime();
    return elapsed >= this.effectiveIntervalMinutes(user) * MINUTE_MS;
  }

  effectiveLimit(user: User): number {
    return Number.isInteger(user.newsLimit) && user.newsLimit > 0
      ? user.newsLimit
      : this.config.defaultLimit;
  }

  effectiveIntervalMinutes(user: User): number {
    return user.intervalMinutes > 0 ? user.intervalMinutes : this.config.defaultIntervalMinutes;
  }

  /**
   * Ledger membership test, falling back to the degradation cache when the
   * ledger is unreachable.
   */
  async isAlreadySent(userId: number, url: string): Promise<boolean> {
    try {
      return await this.deps.ledger.isSent(userId, url);
    } catch (error) {
      this.logger.warn(
        { userId, url, error: errorMessage(error) },
        'Ledger read failed, using in-memory cache'
      );
      return this.deps.seenCache.has(userId, url);
    }
  }

  /**
   * Record delivery in the ledger; propagates ledger errors.
   */
  async markSent(userId: number, url: string): Promise<void> {
    await this.deps.ledger.markSent(userId, url);
  }

  /**
   * Forget every delivered article for a user, durable and in-memory.
   */
  async resetHistory(userId: number): Promise<void> {
    this.deps.seenCache.clearUser(userId);
    await this.deps.ledger.resetHistory(userId);
    this.logger.info({ userId }, 'Delivery history reset');
  }

  private async runCycle(user: User, force: boolean): Promise<number> {
    const now = this.now();
    this.logger.debug({ userId: user.id, force }, 'Processing user');

    let topics: string[];
    try {
      topics = await this.deps.subscriptions.listTopics(user.id);
    } catch (error) {
      this.logger.error(
        { userId: user.id, error: errorMessage(error) },
        'Failed to load subscriptions'
      );
      return 0;
    }

    if (topics.length === 0) {
      return 0;
    }

    const fresh = await this.collectFresh(user, topics, now);
    const limit = this.effectiveLimit(user);
    const selected = fresh.slice(0, limit);

    let delivered = 0;
    for (const article of selected) {
      try {
        await this.deps.sink.deliver({ userId: user.id, chatId: user.telegramId }, article);
        delivered++;
      } catch (error) {
        if (error instanceof CircuitOpenError) {
          // Nothing was sent; this article and the rest stay unseen.
          this.logger.warn(
            { userId: user.id, url: article.url, circuit: error.circuit },
            'Sink circuit open, pausing delivery'
          );
          break;
        }
        this.logger.warn(
          { userId: user.id, url: article.url, error: errorMessage(error) },
          'Failed to deliver article'
        );
      }
      // An attempted send counts as seen, so a failed one is not retried next cycle.
      await this.recordSent(user.id, article.url);
    }

    try {
      await this.deps.users.updateLastDelivery(user.id, now);
    } catch (error) {
      this.logger.error(
        { userId: user.id, error: errorMessage(error) },
        'Failed to update last delivery time'
      );
    }

    if (fresh.length === 0) {
      this.logger.debug({ userId: user.id, topics: topics.length }, 'No fresh articles');
    } else {
      this.logger.info(
        { userId: user.id, fresh: fresh.length, selected: selected.length, delivered, limit },
        'Delivery cycle complete'
      );
    }

    return fresh.length;
  }

  /**
   * Fetch every topic and keep articles that are recent, not yet delivered
   * and not already picked from an earlier topic in this pass. Order follows
   * topic order, then provider order.
   */
  private async collectFresh(user: User, topics: string[], now: Date): Promise<Article[]> {
    const horizonMs = this.config.stalenessDays * DAY_MS;
    const seenThisPass = new Set<string>();
    const fresh: Article[] = [];

    for (const topic of topics) {
      let articles: Article[];
      try {
        articles = await this.deps.source.fetchArticles(topic);
      } catch (error) {
        this.logger.warn(
          { userId: user.id, topic, error: errorMessage(error) },
          'Failed to fetch topic, skipping'
        );
        continue;
      }

      for (const article of articles) {
        if (!article.url || seenThisPass.has(article.url)) {
          continue;
        }
        const age = now.getTime() - article.publishedAt.getTime();
        if (!(age < horizonMs)) {
          continue;
        }
        seenThisPass.add(article.url);
        if (await this.isAlreadySent(user.id, article.url)) {
          continue;
        }
        fresh.push(article);
      }
    }

    return fresh;
  }

  /**
   * Ledger write, falling back to the degradation cache on failure.
   */
  private async recordSent(userId: number, url: string): Promise<void> {
    try {
      await this.deps.ledger.markSent(userId, url);
    } catch (error) {
      this.logger.warn(
        { userId, url, error: errorMessage(error) },
        'Ledger write failed, recording in memory'
      );
      this.deps.seenCache.add(userId, url);
    }
  }
}

export function createDeliveryEngine(
  deps: DeliveryEngineDeps,
  config?: Partial<DeliveryEngineConfig>
): DeliveryEngine {
  return new DeliveryEngine(deps, config);
}
