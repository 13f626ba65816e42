/**
 * Ports - interfaces the core consumes and exposes.
 */

export type {
  UserDirectory,
  SubscriptionRegistry,
  SeenArticleLedger,
  FavoriteStore,
} from './repositories.js';
export type { ArticleSource } from './article-source.js';
export type { DeliverySink, DeliveryTarget } from './delivery-sink.js';
export type { NewsCore } from './news-core.js';
