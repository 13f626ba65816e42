/**
 * Repository Ports
 *
 * Storage-backed suppliers of the delivery engine. Each interface is the
 * narrowest surface the core needs; the JSON-file repositories in
 * src/storage implement them, tests use in-memory fakes.
 */

import type { Article, FavoriteArticle } from '../types/article.js';
import type { User } from '../types/user.js';

/**
 * Enumerates registered users and records delivery timestamps.
 */
export interface UserDirectory {
  listAll(): Promise<User[]>;
  updateLastDelivery(userId: number, at: Date): Promise<void>;
}

/**
 * Per-user set of normalized topics.
 */
export interface SubscriptionRegistry {
  listTopics(userId: number): Promise<string[]>;
}

/**
 * Durable per-user record of delivered article URLs.
 *
 * `markSent` must be idempotent for a repeated (user, url) pair.
 */
export interface SeenArticleLedger {
  isSent(userId: number, url: string): Promise<boolean>;
  markSent(userId: number, url: string): Promise<void>;
  resetHistory(userId: number): Promise<void>;
}

/**
 * Per-user bookmarks.
 */
export interface FavoriteStore {
  add(userId: number, article: Pick<Article, 'url' | 'title' | 'publishedAt' | 'source'>): Promise<void>;
  remove(userId: number, url: string): Promise<boolean>;
  list(userId: number): Promise<FavoriteArticle[]>;
  isFavorite(userId: number, url: string): Promise<boolean>;
}
