/**
 * Wires BotHandlers to grammY updates.
 */

import { GrammyError } from 'grammy';
import type { Bot, Context, InlineKeyboard } from 'grammy';
import type { CallbackMessageView, ChatContext, ReplyOptions } from './context.js';
import type { BotHandlers } from './handlers.js';

type SendOther = NonNullable<Parameters<Context['reply']>[1]>;

function toSendOptions(options: ReplyOptions | undefined): SendOther {
  const other: SendOther = {};
  if (options?.parseMode) {
    other.parse_mode = options.parseMode;
  }
  if (options?.keyboard) {
    other.reply_markup = options.keyboard;
  }
  return other;
}

/**
 * Editing a message to its current content is rejected by Telegram; that is
 * not a failure for us.
 */
function isNotModified(error: unknown): boolean {
  return error instanceof GrammyError && error.description.includes('message is not modified');
}

function toChatContext(ctx: Context): ChatContext | null {
  const from = ctx.from;
  if (!from) {
    return null;
  }
  return {
    telegramId: from.id,
    chatId: ctx.chat?.id ?? from.id,
    profile: {
      username: from.username,
      firstName: from.first_name,
      lastName: from.last_name,
    },
    reply: async (text, options) => {
      await ctx.reply(text, toSendOptions(options));
    },
  };
}

function callbackMessage(ctx: Context): CallbackMessageView | undefined {
  const message = ctx.callbackQuery?.message;
  if (!message || !('text' in message) || typeof message.text !== 'string') {
    return undefined;
  }
  const entities = 'entities' in message && message.entities ? message.entities : [];
  return {
    text: message.text,
    entities: entities.map((e) => ({
      type: e.type,
      url: e.type === 'text_link' ? e.url : undefined,
    })),
  };
}

export function registerBotHandlers(bot: Bot, handlers: BotHandlers): void {
  bot.on('message:text', async (ctx) => {
    const chat = toChatContext(ctx);
    if (!chat) return;
    await handlers.handleText(chat, ctx.message.text);
  });

  bot.on('callback_query:data', async (ctx) => {
    const chat = toChatContext(ctx);
    if (!chat) return;

    await handlers.handleCallback({
      ...chat,
      data: ctx.callbackQuery.data,
      message: callbackMessage(ctx),
      answer: async (text) => {
        await ctx.answerCallbackQuery(text ? { text } : undefined);
      },
      editText: async (text, keyboard?: InlineKeyboard) => {
        try {
          await ctx.editMessageText(
            text,
            keyboard ? { parse_mode: 'HTML', reply_markup: keyboard } : { parse_mode: 'HTML' }
          );
        } catch (error) {
          if (!isNotModified(error)) throw error;
        }
      },
      editMarkup: async (keyboard) => {
        try {
          await ctx.editMessageReplyMarkup({ reply_markup: keyboard });
        } catch (error) {
          if (!isNotModified(error)) throw error;
        }
      },
    });
  });
}
