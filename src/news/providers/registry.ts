/**
 * News Provider Registry
 *
 * Known providers, their priority order and instantiation.
 * Priority is configurable via NEWS_PROVIDER_PRIORITY (or news.providerPriority).
 *
 * Example: NEWS_PROVIDER_PRIORITY=newsapi,gnews
 */

import type { MergedConfig } from '../../config/index.js';
import type { Logger } from '../../types/logger.js';
import { GNewsProvider } from './gnews-provider.js';
import type { NewsProvider } from './news-provider.js';
import { NewsApiProvider } from './newsapi-provider.js';

type NewsSettings = MergedConfig['news'];

/**
 * Provider descriptor with metadata for discovery and instantiation.
 */
export interface ProviderDescriptor {
  /** Unique provider identifier */
  id: string;
  /** Human-readable name */
  displayName: string;
  factory: (settings: NewsSettings, logger: Logger) => NewsProvider;
}

/**
 * Built-in provider descriptors.
 * Order here is the default priority (first = highest).
 */
const PROVIDER_DESCRIPTORS: ProviderDescriptor[] = [
  {
    id: 'gnews',
    displayName: 'GNews',
    factory: (settings, logger) =>
      new GNewsProvider(
        {
          apiKey: settings.gnewsApiKey,
          maxResults: settings.maxResults,
          timeoutMs: settings.requestTimeoutMs,
        },
        logger
      ),
  },
  {
    id: 'newsapi',
    displayName: 'NewsAPI',
    factory: (settings, logger) =>
      new NewsApiProvider(
        {
          apiKey: settings.newsApiKey,
          maxResults: settings.newsApiPageSize,
          timeoutMs: settings.requestTimeoutMs,
        },
        logger
      ),
  },
];

/**
 * Descriptors in priority order: listed ids first, then the remaining
 * built-ins in their default order. Unknown ids are ignored.
 */
export function getOrderedDescriptors(priority: string[]): ProviderDescriptor[] {
  const ordered: ProviderDescriptor[] = [];
  const seen = new Set<string>();

  for (const id of priority) {
    const descriptor = PROVIDER_DESCRIPTORS.find((d) => d.id === id);
    if (descriptor && !seen.has(id)) {
      ordered.push(descriptor);
      seen.add(id);
    }
  }

  for (const descriptor of PROVIDER_DESCRIPTORS) {
    if (!seen.has(descriptor.id)) {
      ordered.push(descriptor);
      seen.add(descriptor.id);
    }
  }

  return ordered;
}

/**
 * Get all known provider IDs.
 */
export function getAllProviderIds(): string[] {
  return PROVIDER_DESCRIPTORS.map((d) => d.id);
}

/**
 * Instantiate every known provider in priority order. Providers without an
 * API key are kept; the fetcher skips them via isAvailable().
 */
export function createProviders(settings: NewsSettings, logger: Logger): NewsProvider[] {
  return getOrderedDescriptors(settings.providerPriority).map((d) => d.factory(settings, logger));
}

/**
 * Provider availability summary for startup logs.
 */
export function getProviderHealthInfo(providers: NewsProvider[]): {
  available: string[];
  unavailable: string[];
} {
  return {
    available: providers.filter((p) => p.isAvailable()).map((p) => p.name),
    unavailable: providers.filter((p) => !p.isAvailable()).map((p) => p.name),
  };
}
