/**
 * Channel exports.
 */

export type { OutgoingMessage, TelegramConfig } from './telegram.js';
export { TelegramChannel, TelegramError, createTelegramChannel, toTelegramError } from './telegram.js';
export {
  MAX_DESCRIPTION_LENGTH,
  UNKNOWN_SOURCE,
  escapeHtml,
  formatArticleMessage,
  formatFavoriteMessage,
  formatPublishedAt,
  truncate,
} from './article-format.js';
export { RecentArticleIndex } from './recent-article-index.js';
export { createShortId } from './short-id.js';
export * from './keyboards.js';
