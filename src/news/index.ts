/**
 * News module exports.
 */

export type {
  NewsProvider,
  NewsProviderConfig,
  NewsQuery,
  NewsResult,
  NewsError,
} from './providers/news-provider.js';
export { GNewsProvider } from './providers/gnews-provider.js';
export { NewsApiProvider } from './providers/newsapi-provider.js';
export {
  createProviders,
  getAllProviderIds,
  getOrderedDescriptors,
  getProviderHealthInfo,
} from './providers/registry.js';
export type { ProviderDescriptor } from './providers/registry.js';
export type { NewsFetcherConfig } from './fetcher.js';
export { NewsFetcher, createNewsFetcher, resolveTopicAlias } from './fetcher.js';
