/**
 * Command layer exports.
 */

export type {
  CallbackContext,
  CallbackMessageView,
  ChatContext,
  MessageEntityView,
  ReplyOptions,
} from './context.js';
export type {
  BotHandlersConfig,
  BotHandlersDeps,
  TopicSubscriptions,
  UserAccounts,
} from './handlers.js';
export {
  BotHandlers,
  USER_STATE,
  articleFromMessage,
  createBotHandlers,
  parseCommand,
} from './handlers.js';
export { MESSAGES } from './messages.js';
export { registerBotHandlers } from './telegram-adapter.js';
