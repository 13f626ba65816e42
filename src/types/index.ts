/**
 * Type exports.
 */

export type { Logger } from './logger.js';
export type { Article, ArticleSourceInfo, FavoriteArticle } from './article.js';
export type { User, UserProfile } from './user.js';
