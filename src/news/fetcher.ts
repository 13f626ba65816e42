/**
 * News Fetcher
 *
 * Article source backed by an ordered list of news providers. The first
 * provider with a non-empty result wins; an empty success is returned only
 * when no later provider has articles; when every provider fails, the first
 * failure is raised.
 */

import {
  CircuitBreaker,
  CircuitOpenError,
  type CircuitBreakerConfig,
} from '../core/circuit-breaker.js';
import {
  InvalidTopicError,
  NewsProviderError,
  TimeoutError,
  errorMessage,
} from '../core/errors.js';
import type { ArticleSource } from '../ports/index.js';
import type { Article } from '../types/article.js';
import type { Logger } from '../types/logger.js';
import type { NewsProvider, NewsQuery } from './providers/news-provider.js';

/**
 * Rewrites applied to subscription topics before querying upstream.
 */
const TOPIC_ALIASES: ReadonlyMap<string, string> = new Map([
  ['искусственный интелент', 'искусственный интеллект'],
  ['новости москвы', 'москва новости'],
]);

export function resolveTopicAlias(topic: string): string {
  return TOPIC_ALIASES.get(topic) ?? topic;
}

export interface NewsFetcherConfig {
  /** Language code sent to providers */
  language: string;
  /** Country code sent to providers that support it */
  country: string;
  /** Per-provider circuit breaker settings */
  breaker: Partial<Omit<CircuitBreakerConfig, 'name' | 'logger'>>;
}

const DEFAULT_CONFIG: NewsFetcherConfig = {
  language: 'ru',
  country: 'ru',
  breaker: { maxFailures: 3, resetTimeout: 60_000, timeout: 20_000 },
};

interface Failure {
  provider: string;
  error: NewsProviderError;
}

export class NewsFetcher implements ArticleSource {
  private readonly providers: NewsProvider[];
  private readonly logger: Logger;
  private readonly config: NewsFetcherConfig;
  private readonly breakers = new Map<string, CircuitBreaker>();
  private lastProvider: string | null = null;

  constructor(providers: NewsProvider[], logger: Logger, config: Partial<NewsFetcherConfig> = {}) {
    this.providers = providers;
    this.logger = logger.child({ component: 'news-fetcher' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Name of the provider that served the most recent successful request.
   */
  get lastProviderUsed(): string | null {
    return this.lastProvider;
  }

  async fetchArticles(topic: string): Promise<Article[]> {
    const normalized = topic.trim().toLowerCase();
    if (normalized.length === 0) {
      throw new InvalidTopicError('Topic must not be empty');
    }
    return this.query({
      query: resolveTopicAlias(normalized),
      sortBy: 'publishedAt',
      lang: this.config.language,
      country: this.config.country,
    });
  }

  async searchArticles(query: string): Promise<Article[]> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      throw new InvalidTopicError('Search query must not be empty');
    }
    return this.query({
      query: trimmed,
      sortBy: 'relevance',
      lang: this.config.language,
      country: this.config.country,
    });
  }

  private async query(params: NewsQuery): Promise<Article[]> {
    const available = this.providers.filter((p) => p.isAvailable());
    if (available.length === 0) {
      throw new NewsProviderError('NO_PROVIDER', 'No news provider is configured');
    }

    let emptyFrom: string | null = null;
    let firstFailure: Failure | null = null;

    for (const provider of available) {
      try {
        const articles = await this.breakerFor(provider).execute(() =>
          this.callProvider(provider, params)
        );
        if (articles.length > 0) {
          this.lastProvider = provider.name;
          return articles;
        }
        emptyFrom ??= provider.name;
      } catch (error) {
        const failure: Failure = { provider: provider.name, error: toProviderError(error) };
        firstFailure ??= failure;
        this.logger.warn(
          { provider: provider.name, query: params.query, code: failure.error.code, error: failure.error.message },
          'Provider failed, trying next'
        );
      }
    }

    if (emptyFrom !== null) {
      this.lastProvider = emptyFrom;
      return [];
    }

    if (firstFailure) {
      throw firstFailure.error;
    }
    throw new NewsProviderError('NO_PROVIDER', 'No news provider produced a result');
  }

  /**
   * Provider call that throws on failure, so the breaker sees it.
   */
  private async callProvider(provider: NewsProvider, params: NewsQuery): Promise<Article[]> {
    const result = await provider.search(params);
    if (!result.ok) {
      throw new NewsProviderError(result.error.code, result.error.message, result.error.retryable);
    }
    return result.articles;
  }

  private breakerFor(provider: NewsProvider): CircuitBreaker {
    let breaker = this.breakers.get(provider.name);
    if (!breaker) {
      breaker = new CircuitBreaker({
        ...this.config.breaker,
        name: `news:${provider.name}`,
        logger: this.logger,
      });
      this.breakers.set(provider.name, breaker);
    }
    return breaker;
  }
}

function toProviderError(error: unknown): NewsProviderError {
  if (error instanceof NewsProviderError) {
    return error;
  }
  if (error instanceof TimeoutError) {
    return new NewsProviderError('TIMEOUT', error.message, true);
  }
  if (error instanceof CircuitOpenError) {
    return new NewsProviderError('PROVIDER_ERROR', error.message, true);
  }
  return new NewsProviderError('NETWORK_ERROR', errorMessage(error), true);
}

export function createNewsFetcher(
  providers: NewsProvider[],
  logger: Logger,
  config?: Partial<NewsFetcherConfig>
): NewsFetcher {
  return new NewsFetcher(providers, logger, config);
}
