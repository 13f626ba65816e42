/**
 * NewsAPI Provider
 *
 * https://newsapi.org/docs/endpoints/everything
 */

import { z } from 'zod';
import type { Logger } from '../../types/logger.js';
import type { Article } from '../../types/article.js';
import { parsePublishedAt, requestJson } from './http.js';
import type { NewsProvider, NewsProviderConfig, NewsQuery, NewsResult } from './news-provider.js';

const API_BASE = 'https://newsapi.org/v2/everything';

/** NewsAPI calls it "relevancy" */
const SORT_PARAM: Record<NewsQuery['sortBy'], string> = {
  publishedAt: 'publishedAt',
  relevance: 'relevancy',
};

const newsApiResponseSchema = z.object({
  status: z.string(),
  totalResults: z.number().optional(),
  message: z.string().optional(),
  articles: z
    .array(
      z.object({
        source: z.object({ id: z.string().nullish(), name: z.string().nullish() }).nullish(),
        author: z.string().nullish(),
        title: z.string().nullish(),
        description: z.string().nullish(),
        url: z.string().nullish(),
        urlToImage: z.string().nullish(),
        publishedAt: z.string().nullish(),
        content: z.string().nullish(),
      })
    )
    .default([]),
});

export class NewsApiProvider implements NewsProvider {
  readonly name = 'newsapi';
  private readonly config: NewsProviderConfig;
  private readonly logger: Logger;

  constructor(config: NewsProviderConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ provider: 'newsapi' });
  }

  isAvailable(): boolean {
    return !!this.config.apiKey;
  }

  async search(params: NewsQuery): Promise<NewsResult> {
    if (!this.config.apiKey) {
      return {
        ok: false,
        error: { code: 'AUTH_FAILED', message: 'NewsAPI key not configured', retryable: false },
      };
    }

    const url = new URL(API_BASE);
    url.searchParams.set('q', params.query);
    if (params.lang) {
      url.searchParams.set('language', params.lang);
    }
    url.searchParams.set('sortBy', SORT_PARAM[params.sortBy]);
    url.searchParams.set('pageSize', String(this.config.maxResults));
    url.searchParams.set('apiKey', this.config.apiKey);

    this.logger.debug({ query: params.query, sortBy: params.sortBy }, 'Requesting NewsAPI');

    const response = await requestJson(url, {
      provider: 'NewsAPI',
      timeoutMs: this.config.timeoutMs,
    });
    if (!response.ok) {
      this.logger.warn({ query: params.query, code: response.error.code }, response.error.message);
      return response;
    }

    const parsed = newsApiResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      return {
        ok: false,
        error: {
          code: 'PROVIDER_ERROR',
          message: 'Unexpected NewsAPI response shape',
          retryable: false,
        },
      };
    }
    if (parsed.data.status !== 'ok') {
      return {
        ok: false,
        error: {
          code: 'PROVIDER_ERROR',
          message: `NewsAPI returned status "${parsed.data.status}": ${parsed.data.message ?? 'no message'}`,
          retryable: false,
        },
      };
    }

    const articles: Article[] = [];
    for (const raw of parsed.data.articles) {
      const publishedAt = parsePublishedAt(raw.publishedAt);
      if (!raw.url || !raw.title || !publishedAt) continue;

      articles.push({
        url: raw.url,
        title: raw.title,
        description: raw.description ?? '',
        content: raw.content ?? '',
        image: raw.urlToImage ?? undefined,
        publishedAt,
        source: { name: raw.source?.name ?? '' },
      });
    }

    this.logger.debug(
      { query: params.query, resultCount: articles.length },
      'NewsAPI search completed'
    );
    return { ok: true, articles };
  }
}
