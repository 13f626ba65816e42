/**
 * News Core Port
 *
 * The surface the command layer depends on. The core owns this interface and
 * NewsService implements it, so handlers never import the engine or the
 * scheduler directly.
 */

import type { Article, FavoriteArticle } from '../types/article.js';
import type { User } from '../types/user.js';

export interface NewsCore {
  /**
   * Run one delivery cycle for a user.
   * @param force - bypass the interval gate ("get news now")
   * @returns number of fresh articles found, before the per-user cap
   */
  processUser(user: User, force: boolean): Promise<number>;

  /** Passthrough topic browse, not deduplicated or delivered. */
  fetchForTopic(topic: string): Promise<Article[]>;

  /** Passthrough free-text search. */
  search(query: string): Promise<Article[]>;

  isAlreadySent(userId: number, url: string): Promise<boolean>;
  markSent(userId: number, url: string): Promise<void>;
  resetHistory(userId: number): Promise<void>;

  addFavorite(userId: number, article: Pick<Article, 'url' | 'title' | 'publishedAt' | 'source'>): Promise<void>;
  removeFavorite(userId: number, url: string): Promise<boolean>;
  listFavorites(userId: number): Promise<FavoriteArticle[]>;
  isFavorite(userId: number, url: string): Promise<boolean>;

  start(): void;
  stop(): Promise<void>;
}
