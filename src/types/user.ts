/**
 * User Types
 */

/**
 * A registered bot user with per-user delivery settings.
 */
export interface User {
  /** Internal numeric id (assigned on first contact) */
  id: number;
  /** Telegram chat id used as delivery destination */
  telegramId: number;
  username: string;
  firstName: string;
  lastName: string;
  /** Minutes between scheduled delivery cycles */
  intervalMinutes: number;
  /** Max articles per delivery cycle (non-positive means default) */
  newsLimit: number;
  /** When the engine last completed a cycle for this user */
  lastDeliveryAt: Date | null;
  /** Free-form conversation state tag, owned by the command layer */
  state: string;
  createdAt: Date;
}

/**
 * Profile fields captured from Telegram on first contact.
 */
export interface UserProfile {
  username?: string | undefined;
  firstName?: string | undefined;
  lastName?: string | undefined;
}
