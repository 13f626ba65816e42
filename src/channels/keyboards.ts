/**
 * Inline and reply keyboards.
 */

import { InlineKeyboard, Keyboard } from 'grammy';

export const CALLBACK = {
  SETTINGS_INTERVAL: 'settings_interval',
  SETTINGS_LIMIT: 'settings_limit',
  SETTINGS_BACK: 'settings_back',
  INTERVAL_PREFIX: 'interval_',
  LIMIT_PREFIX: 'limit_',
  ADD_FAVORITE_PREFIX: 'add_fav_',
  REMOVE_FAVORITE_PREFIX: 'rm_fav_',
  TOPIC_NEWS_PREFIX: 'topic_news_',
} as const;

/** Interval choices in minutes */
export const INTERVAL_OPTIONS = [60, 180, 360, 1440] as const;
export const LIMIT_OPTIONS = [3, 5, 10, 15] as const;

export const MENU = {
  NEWS: '📰 Get news now',
  SUBSCRIPTIONS: '📋 My subscriptions',
  FAVORITES: '⭐ Favorites',
  SETTINGS: '⚙️ Settings',
  HELP: '❓ Help',
} as const;

export function favoriteKeyboard(shortId: string, isFavorite: boolean): InlineKeyboard {
  return isFavorite
    ? new InlineKeyboard().text('❌ Remove from favorites', CALLBACK.REMOVE_FAVORITE_PREFIX + shortId)
    : new InlineKeyboard().text('⭐ Add to favorites', CALLBACK.ADD_FAVORITE_PREFIX + shortId);
}

export function mainMenuKeyboard(): Keyboard {
  return new Keyboard()
    .text(MENU.NEWS)
    .text(MENU.SUBSCRIPTIONS)
    .row()
    .text(MENU.FAVORITES)
    .text(MENU.SETTINGS)
    .row()
    .text(MENU.HELP)
    .resized();
}

export function settingsKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('⏱ Delivery interval', CALLBACK.SETTINGS_INTERVAL)
    .row()
    .text('🔢 Articles per delivery', CALLBACK.SETTINGS_LIMIT);
}

export function formatInterval(minutes: number): string {
  if (minutes % 1440 === 0) {
    const days = minutes / 1440;
    return days === 1 ? '1 day' : `${String(days)} days`;
  }
  if (minutes % 60 === 0) {
    const hours = minutes / 60;
    return hours === 1 ? '1 hour' : `${String(hours)} hours`;
  }
  return `${String(minutes)} min`;
}

export function intervalKeyboard(current: number): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  for (const minutes of INTERVAL_OPTIONS) {
    const label = (minutes === current ? '✅ ' : '') + formatInterval(minutes);
    keyboard.text(label, CALLBACK.INTERVAL_PREFIX + String(minutes)).row();
  }
  return keyboard.text('⬅️ Back', CALLBACK.SETTINGS_BACK);
}

export function limitKeyboard(current: number): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  for (const limit of LIMIT_OPTIONS) {
    keyboard.text((limit === current ? '✅ ' : '') + String(limit), CALLBACK.LIMIT_PREFIX + String(limit));
  }
  return keyboard.row().text('⬅️ Back', CALLBACK.SETTINGS_BACK);
}

/**
 * One button per subscribed topic, fetching that topic on press.
 * Topics whose callback data would exceed Telegram's 64-byte cap are left out.
 */
export function topicsKeyboard(topics: string[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  const fitting = topics.filter(
    (topic) => Buffer.byteLength(CALLBACK.TOPIC_NEWS_PREFIX + topic, 'utf8') <= 64
  );
  fitting.forEach((topic, index) => {
    if (index > 0) {
      keyboard.row();
    }
    keyboard.text(`📰 ${topic}`, CALLBACK.TOPIC_NEWS_PREFIX + topic);
  });
  return keyboard;
}
