/**
 * Storage module exports.
 */

export type { Storage } from './storage.js';
export type { JSONStorageConfig } from './json-storage.js';
export { JSONStorage, createJSONStorage } from './json-storage.js';
export { DocumentStore } from './document.js';
export {
  UserRepository,
  DEFAULT_INTERVAL_MINUTES,
  DEFAULT_NEWS_LIMIT,
} from './user-repository.js';
export {
  SubscriptionRepository,
  MAX_TOPIC_LENGTH,
  normalizeTopic,
} from './subscription-repository.js';
export { SentArticleRepository } from './sent-article-repository.js';
export { FavoriteRepository } from './favorite-repository.js';
