import type { Article } from '../types/article.js';

/**
 * Where a delivered article goes.
 */
export interface DeliveryTarget {
  /** Internal user id (used for per-user decorations like favorite buttons) */
  userId: number;
  /** Transport destination (Telegram chat id) */
  chatId: number;
}

/**
 * Delivery Sink Port
 *
 * Pushes one formatted article to one destination. Throws on failure.
 */
export interface DeliverySink {
  deliver(target: DeliveryTarget, article: Article): Promise<void>;
}
