/**
 * User-facing texts.
 */

import { formatInterval } from '../channels/keyboards.js';
import { escapeHtml } from '../channels/article-format.js';

export const MESSAGES = {
  WELCOME:
    '👋 Hi! I deliver fresh news on the topics you follow.\n\n' +
    'Subscribe with /subscribe <topic>, then sit back: new articles arrive on your schedule. ' +
    'Send /help for the full list of commands.',
  HELP:
    'Commands:\n' +
    '/subscribe <topic> - follow a topic\n' +
    '/unsubscribe <topic> - stop following a topic\n' +
    '/subscriptions - list your topics\n' +
    '/news - get fresh news now\n' +
    '/topic <topic> - browse a topic without subscribing\n' +
    '/search <query> - search news\n' +
    '/favorites - saved articles\n' +
    '/settings - delivery interval and article count\n' +
    '/reset - forget which articles were already sent',
  ASK_TOPIC: 'Send me the topic you want to follow.',
  ASK_SEARCH: 'What should I search for?',
  NO_SUBSCRIPTIONS: 'You have no subscriptions yet. Use /subscribe <topic> to add one.',
  NEWS_SEARCHING: '🔍 Looking for fresh news...',
  NO_FRESH_NEWS: 'No fresh news for your subscriptions.',
  FETCH_FAILED: 'Could not fetch news right now, try again later.',
  NO_FAVORITES: 'You have no favorites yet. Press "⭐ Add to favorites" under an article to save it.',
  HISTORY_RESET: '🧹 Delivery history cleared. Articles you already received may be sent again.',
  UNSUBSCRIBE_USAGE: 'Usage: /unsubscribe <topic>',
  TOPIC_USAGE: 'Usage: /topic <topic>',
  UNKNOWN_INPUT: "I didn't understand that. Send /help to see what I can do.",
  INTERNAL_ERROR: 'Something went wrong, please try again.',
  CHOOSE_INTERVAL: 'How often should I send news?',
  CHOOSE_LIMIT: 'How many articles per delivery?',
  ARTICLE_NOT_FOUND: 'Could not find this article.',
  ALREADY_FAVORITE: 'Already in favorites.',
  FAVORITE_ADDED: '⭐ Added to favorites',
  NOT_FAVORITE: 'Not in favorites.',
  FAVORITE_REMOVED: 'Removed from favorites',
} as const;

export function subscribed(topic: string): string {
  return `✅ Subscribed to "${topic}".`;
}

export function alreadySubscribed(topic: string): string {
  return `You are already subscribed to "${topic}".`;
}

export function unsubscribed(topic: string): string {
  return `Unsubscribed from "${topic}".`;
}

export function notSubscribed(topic: string): string {
  return `You are not subscribed to "${topic}".`;
}

export function subscriptionList(topics: string[]): string {
  return `📋 Your subscriptions (${String(topics.length)}):\n` + topics.map((t) => `• ${t}`).join('\n');
}

export function noArticlesFor(query: string): string {
  return `No articles found for "${query}".`;
}

export function favoritesHeader(count: number): string {
  return `⭐ Your favorites (${String(count)}):`;
}

/**
 * Settings summary, HTML.
 */
export function settingsSummary(intervalMinutes: number, newsLimit: number): string {
  return (
    '<b>⚙️ Settings</b>\n\n' +
    `Delivery interval: ${escapeHtml(formatInterval(intervalMinutes))}\n` +
    `Articles per delivery: ${String(newsLimit)}`
  );
}

export function intervalSet(minutes: number): string {
  return `Interval set to ${formatInterval(minutes)}`;
}

export function limitSet(limit: number): string {
  return `Articles per delivery set to ${String(limit)}`;
}
