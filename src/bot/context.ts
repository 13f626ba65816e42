/**
 * Transport-neutral view of an incoming update. The grammY adapter builds
 * these; tests provide recording fakes.
 */

import type { InlineKeyboard, Keyboard } from 'grammy';
import type { UserProfile } from '../types/user.js';

export interface ReplyOptions {
  parseMode?: 'HTML';
  keyboard?: InlineKeyboard | Keyboard;
}

export interface ChatContext {
  telegramId: number;
  chatId: number;
  profile: UserProfile;
  reply(text: string, options?: ReplyOptions): Promise<void>;
}

export interface MessageEntityView {
  type: string;
  url?: string | undefined;
}

/**
 * The message a pressed inline button belongs to.
 */
export interface CallbackMessageView {
  text: string;
  entities: MessageEntityView[];
}

export interface CallbackContext extends ChatContext {
  data: string;
  message: CallbackMessageView | undefined;
  answer(text?: string): Promise<void>;
  editText(text: string, keyboard?: InlineKeyboard): Promise<void>;
  editMarkup(keyboard: InlineKeyboard): Promise<void>;
}
