/**
 * Telegram HTML rendering for articles and favorites.
 */

import { DateTime } from 'luxon';
import type { Article, FavoriteArticle } from '../types/article.js';

export const MAX_DESCRIPTION_LENGTH = 300;
export const UNKNOWN_SOURCE = 'Unknown source';

const DATE_FORMAT = 'dd.MM.yyyy HH:mm';

/**
 * Escape text for Telegram HTML, including attribute values.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Cut text to `max` characters, ending with "..." when shortened.
 * Counts code points so surrogate pairs are never split.
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) {
    return text;
  }
  return chars.slice(0, max - 3).join('') + '...';
}

export function formatPublishedAt(date: Date, zone: string): string {
  return DateTime.fromJSDate(date, { zone }).toFormat(DATE_FORMAT);
}

export function formatArticleMessage(article: Article, zone = 'utc'): string {
  const title = escapeHtml(article.title);
  const description = escapeHtml(truncate(article.description, MAX_DESCRIPTION_LENGTH));
  const source = escapeHtml(article.source.name || UNKNOWN_SOURCE);

  const parts = [`<b>${title}</b>`];
  if (description) {
    parts.push(description);
  }
  parts.push(
    `<i>📰 Source: ${source}</i>\n<i>📅 Published: ${formatPublishedAt(article.publishedAt, zone)}</i>`,
    `<a href="${escapeHtml(article.url)}">Read more →</a>`
  );
  return parts.join('\n\n');
}

export function formatFavoriteMessage(favorite: FavoriteArticle, zone = 'utc'): string {
  return [
    `<b>${escapeHtml(favorite.title)}</b>`,
    `<i>📰 Source: ${escapeHtml(favorite.sourceName || UNKNOWN_SOURCE)}</i>\n` +
      `<i>📅 Published: ${formatPublishedAt(favorite.publishedAt, zone)}</i>`,
    `<a href="${escapeHtml(favorite.url)}">Read more →</a>`,
  ].join('\n\n');
}
