import type { Article } from '../types/article.js';

/**
 * Article Source Port
 *
 * Returns candidate articles in provider order. May throw or return an empty
 * list; provider failover is internal.
 */
export interface ArticleSource {
  /** Latest articles for a subscription topic */
  fetchArticles(topic: string): Promise<Article[]>;
  /** Free-text search, ranked by relevance rather than recency */
  searchArticles(query: string): Promise<Article[]>;
}
