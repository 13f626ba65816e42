/**
 * News Service
 *
 * Implements the NewsCore port: the single surface the command layer talks
 * to. Delivery cycles go through the engine, lifecycle through the
 * scheduler, browse/search straight to the article source.
 */

import type { Article, FavoriteArticle } from '../types/article.js';
import type { Logger } from '../types/logger.js';
import type { User } from '../types/user.js';
import type { ArticleSource, FavoriteStore, NewsCore } from '../ports/index.js';
import type { DeliveryEngine } from './delivery-engine.js';
import type { FleetScheduler } from './fleet-scheduler.js';

export interface NewsServiceDeps {
  engine: DeliveryEngine;
  scheduler: FleetScheduler;
  source: ArticleSource;
  favorites: FavoriteStore;
  logger: Logger;
}

export class NewsService implements NewsCore {
  private readonly engine: DeliveryEngine;
  private readonly scheduler: FleetScheduler;
  private readonly source: ArticleSource;
  private readonly favorites: FavoriteStore;
  private readonly logger: Logger;

  constructor(deps: NewsServiceDeps) {
    this.engine = deps.engine;
    this.scheduler = deps.scheduler;
    this.source = deps.source;
    this.favorites = deps.favorites;
    this.logger = deps.logger.child({ component: 'news-service' });
  }

  processUser(user: User, force: boolean): Promise<number> {
    return this.engine.processUser(user, force);
  }

  fetchForTopic(topic: string): Promise<Article[]> {
    return this.source.fetchArticles(topic);
  }

  search(query: string): Promise<Article[]> {
    return this.source.searchArticles(query);
  }

  isAlreadySent(userId: number, url: string): Promise<boolean> {
    return this.engine.isAlreadySent(userId, url);
  }

  markSent(userId: number, url: string): Promise<void> {
    return this.engine.markSent(userId, url);
  }

  resetHistory(userId: number): Promise<void> {
    return this.engine.resetHistory(userId);
  }

  async addFavorite(
    userId: number,
    article: Pick<Article, 'url' | 'title' | 'publishedAt' | 'source'>
  ): Promise<void> {
    await this.favorites.add(userId, article);
    this.logger.debug({ userId, url: article.url }, 'Favorite added');
  }

  async removeFavorite(userId: number, url: string): Promise<boolean> {
    const removed = await this.favorites.remove(userId, url);
    this.logger.debug({ userId, url, removed }, 'Favorite removal');
    return removed;
  }

  listFavorites(userId: number): Promise<FavoriteArticle[]> {
    return this.favorites.list(userId);
  }

  isFavorite(userId: number, url: string): Promise<boolean> {
    return this.favorites.isFavorite(userId, url);
  }

  start(): void {
    this.scheduler.start();
  }

  stop(): Promise<void> {
    return this.scheduler.stop();
  }
}

export function createNewsService(deps: NewsServiceDeps): NewsService {
  return new NewsService(deps);
}
