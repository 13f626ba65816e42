/**
 * GNews Provider
 *
 * https://gnews.io/docs/v4#search-endpoint
 */

import { z } from 'zod';
import type { Logger } from '../../types/logger.js';
import type { Article } from '../../types/article.js';
import { parsePublishedAt, requestJson } from './http.js';
import type { NewsProvider, NewsProviderConfig, NewsQuery, NewsResult } from './news-provider.js';

const API_BASE = 'https://gnews.io/api/v4/search';

const gnewsResponseSchema = z.object({
  totalArticles: z.number().optional(),
  articles: z
    .array(
      z.object({
        title: z.string().nullish(),
        description: z.string().nullish(),
        content: z.string().nullish(),
        url: z.string().nullish(),
        image: z.string().nullish(),
        publishedAt: z.string().nullish(),
        source: z
          .object({
            name: z.string().nullish(),
            url: z.string().nullish(),
          })
          .nullish(),
      })
    )
    .default([]),
});

export class GNewsProvider implements NewsProvider {
  readonly name = 'gnews';
  private readonly config: NewsProviderConfig;
  private readonly logger: Logger;

  constructor(config: NewsProviderConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ provider: 'gnews' });
  }

  isAvailable(): boolean {
    return !!this.config.apiKey;
  }

  async search(params: NewsQuery): Promise<NewsResult> {
    if (!this.config.apiKey) {
      return {
        ok: false,
        error: { code: 'AUTH_FAILED', message: 'GNews API key not configured', retryable: false },
      };
    }

    const url = new URL(API_BASE);
    url.searchParams.set('q', params.query);
    if (params.lang) {
      url.searchParams.set('lang', params.lang);
    }
    if (params.country) {
      url.searchParams.set('country', params.country);
    }
    url.searchParams.set('sortby', params.sortBy);
    url.searchParams.set('max', String(this.config.maxResults));
    url.searchParams.set('token', this.config.apiKey);

    this.logger.debug({ query: params.query, sortBy: params.sortBy }, 'Requesting GNews');

    const response = await requestJson(url, {
      provider: 'GNews',
      timeoutMs: this.config.timeoutMs,
    });
    if (!response.ok) {
      this.logger.warn({ query: params.query, code: response.error.code }, response.error.message);
      return response;
    }

    const parsed = gnewsResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      return {
        ok: false,
        error: {
          code: 'PROVIDER_ERROR',
          message: 'Unexpected GNews response shape',
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
        image: raw.image ?? undefined,
        publishedAt,
        source: {
          name: raw.source?.name ?? '',
          url: raw.source?.url ?? undefined,
        },
      });
    }

    this.logger.debug({ query: params.query, resultCount: articles.length }, 'GNews search completed');
    return { ok: true, articles };
  }
}
