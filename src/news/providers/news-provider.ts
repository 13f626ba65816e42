/**
 * News Provider Interface
 *
 * Common interface for upstream news APIs (GNews, NewsAPI).
 */

import type { NewsErrorCode } from '../../core/errors.js';
import type { Article } from '../../types/article.js';

/**
 * Query passed to providers.
 * Note: Using explicit undefined unions for exactOptionalPropertyTypes compatibility.
 */
export interface NewsQuery {
  /** Topic or free-text query */
  query: string;
  /** Ordering requested from upstream */
  sortBy: 'publishedAt' | 'relevance';
  /** Language code (e.g., 'ru') */
  lang?: string | undefined;
  /** Country code (e.g., 'ru'), where the provider supports it */
  country?: string | undefined;
}

export interface NewsError {
  code: Exclude<NewsErrorCode, 'NO_PROVIDER'>;
  message: string;
  retryable: boolean;
  retryAfterMs?: number | undefined;
}

export type NewsResult = { ok: true; articles: Article[] } | { ok: false; error: NewsError };

export interface NewsProvider {
  /** Provider name for identification */
  readonly name: string;

  /**
   * Check if the provider is usable (has an API key).
   */
  isAvailable(): boolean;

  search(params: NewsQuery): Promise<NewsResult>;
}

/**
 * Settings shared by the built-in providers.
 */
export interface NewsProviderConfig {
  apiKey: string | undefined;
  /** Results requested per call */
  maxResults: number;
  /** Per-request timeout */
  timeoutMs: number;
}
