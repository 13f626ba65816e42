/**
 * Command Handlers
 *
 * Every command, menu button and inline-button callback of the bot. Depends
 * on the NewsCore port plus the user and subscription repositories; never on
 * the engine or scheduler directly.
 */

import { randomUUID } from 'node:crypto';
import { withTimeout } from '../core/circuit-breaker.js';
import {
  DuplicateSubscriptionError,
  InvalidTopicError,
  SubscriptionNotFoundError,
  errorMessage,
} from '../core/errors.js';
import { createTraceContext, withTraceContext } from '../core/trace-context.js';
import type { NewsCore } from '../ports/index.js';
import type { Article } from '../types/article.js';
import type { Logger } from '../types/logger.js';
import type { User, UserProfile } from '../types/user.js';
import { formatArticleMessage, formatFavoriteMessage } from '../channels/article-format.js';
import {
  CALLBACK,
  INTERVAL_OPTIONS,
  LIMIT_OPTIONS,
  MENU,
  favoriteKeyboard,
  intervalKeyboard,
  limitKeyboard,
  mainMenuKeyboard,
  settingsKeyboard,
  topicsKeyboard,
} from '../channels/keyboards.js';
import type { RecentArticleIndex } from '../channels/recent-article-index.js';
import { createShortId } from '../channels/short-id.js';
import type { CallbackContext, CallbackMessageView, ChatContext } from './context.js';
import {
  MESSAGES,
  alreadySubscribed,
  favoritesHeader,
  intervalSet,
  limitSet,
  noArticlesFor,
  notSubscribed,
  settingsSummary,
  subscribed,
  subscriptionList,
  unsubscribed,
} from './messages.js';

/** Conversation states stored on the user */
export const USER_STATE = {
  IDLE: '',
  AWAITING_TOPIC: 'awaiting_topic',
  AWAITING_SEARCH: 'awaiting_search',
} as const;

export interface UserAccounts {
  findOrCreate(telegramId: number, profile?: UserProfile): Promise<User>;
  updateInterval(userId: number, minutes: number): Promise<void>;
  updateLimit(userId: number, limit: number): Promise<void>;
  setState(userId: number, state: string): Promise<void>;
}

export interface TopicSubscriptions {
  add(userId: number, topic: string): Promise<string>;
  remove(userId: number, topic: string): Promise<void>;
  listTopics(userId: number): Promise<string[]>;
}

export interface BotHandlersConfig {
  /** Upper bound on a "get news now" cycle */
  forceTimeoutMs: number;
  /** IANA zone for dates in messages */
  timezone: string;
  /** Articles shown for /topic and /search when the user has no limit */
  defaultLimit: number;
}

const DEFAULT_CONFIG: BotHandlersConfig = {
  forceTimeoutMs: 120_000,
  timezone: 'utc',
  defaultLimit: 5,
};

export interface BotHandlersDeps {
  core: NewsCore;
  users: UserAccounts;
  subscriptions: TopicSubscriptions;
  recentArticles: RecentArticleIndex;
  logger: Logger;
}

interface ParsedCommand {
  name: string;
  args: string;
}

/**
 * Split "/cmd@botname args" into its parts; null for plain text.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const match = /^\/([a-z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/i.exec(text.trim());
  if (!match?.[1]) {
    return null;
  }
  return { name: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
}

export class BotHandlers {
  private readonly core: NewsCore;
  private readonly users: UserAccounts;
  private readonly subscriptions: TopicSubscriptions;
  private readonly recentArticles: RecentArticleIndex;
  private readonly logger: Logger;
  private readonly config: BotHandlersConfig;

  constructor(deps: BotHandlersDeps, config: Partial<BotHandlersConfig> = {}) {
    this.core = deps.core;
    this.users = deps.users;
    this.subscriptions = deps.subscriptions;
    this.recentArticles = deps.recentArticles;
    this.logger = deps.logger.child({ component: 'bot-handlers' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Entry point for every text message (commands, menu buttons, free text).
   */
  async handleText(ctx: ChatContext, text: string): Promise<void> {
    await this.guard(ctx, 'message', async () => {
      const user = await this.users.findOrCreate(ctx.telegramId, ctx.profile);
      const command = parseCommand(text);

      if (command) {
        if (user.state !== USER_STATE.IDLE) {
          await this.users.setState(user.id, USER_STATE.IDLE);
        }
        await this.dispatchCommand(ctx, user, command);
        return;
      }

      const menuCommand = menuButtonCommand(text.trim());
      if (menuCommand) {
        await this.dispatchCommand(ctx, user, { name: menuCommand, args: '' });
        return;
      }

      await this.handleFreeText(ctx, user, text.trim());
    });
  }

  /**
   * Entry point for inline-button presses.
   */
  async handleCallback(ctx: CallbackContext): Promise<void> {
    await this.guard(ctx, 'callback', async () => {
      const user = await this.users.findOrCreate(ctx.telegramId, ctx.profile);
      const data = ctx.data;

      if (data === CALLBACK.SETTINGS_INTERVAL) {
        await ctx.editText(MESSAGES.CHOOSE_INTERVAL, intervalKeyboard(user.intervalMinutes));
        await ctx.answer();
      } else if (data === CALLBACK.SETTINGS_LIMIT) {
        await ctx.editText(MESSAGES.CHOOSE_LIMIT, limitKeyboard(user.newsLimit));
        await ctx.answer();
      } else if (data === CALLBACK.SETTINGS_BACK) {
        await ctx.editText(settingsSummary(user.intervalMinutes, user.newsLimit), settingsKeyboard());
        await ctx.answer();
      } else if (data.startsWith(CALLBACK.INTERVAL_PREFIX)) {
        await this.onIntervalChosen(ctx, user, data.slice(CALLBACK.INTERVAL_PREFIX.length));
      } else if (data.startsWith(CALLBACK.LIMIT_PREFIX)) {
        await this.onLimitChosen(ctx, user, data.slice(CALLBACK.LIMIT_PREFIX.length));
      } else if (data.startsWith(CALLBACK.ADD_FAVORITE_PREFIX)) {
        await this.onAddFavorite(ctx, user, data.slice(CALLBACK.ADD_FAVORITE_PREFIX.length));
      } else if (data.startsWith(CALLBACK.REMOVE_FAVORITE_PREFIX)) {
        await this.onRemoveFavorite(ctx, user, data.slice(CALLBACK.REMOVE_FAVORITE_PREFIX.length));
      } else if (data.startsWith(CALLBACK.TOPIC_NEWS_PREFIX)) {
        await ctx.answer();
        await this.showArticles(ctx, user, data.slice(CALLBACK.TOPIC_NEWS_PREFIX.length), 'topic');
      } else {
        this.logger.debug({ data }, 'Unknown callback data');
        await ctx.answer();
      }
    });
  }

  private async dispatchCommand(ctx: ChatContext, user: User, command: ParsedCommand): Promise<void> {
    switch (command.name) {
      case 'start':
        await ctx.reply(MESSAGES.WELCOME, { keyboard: mainMenuKeyboard() });
        return;
      case 'help':
        await ctx.reply(MESSAGES.HELP);
        return;
      case 'subscribe':
        if (!command.args) {
          await this.users.setState(user.id, USER_STATE.AWAITING_TOPIC);
          await ctx.reply(MESSAGES.ASK_TOPIC);
          return;
        }
        await this.subscribe(ctx, user, command.args);
        return;
      case 'unsubscribe':
        await this.unsubscribe(ctx, user, command.args);
        return;
      case 'subscriptions':
        await this.listSubscriptions(ctx, user);
        return;
      case 'news':
        await this.newsNow(ctx, user);
        return;
      case 'topic':
        if (!command.args) {
          await ctx.reply(MESSAGES.TOPIC_USAGE);
          return;
        }
        await this.showArticles(ctx, user, command.args, 'topic');
        return;
      case 'search':
        if (!command.args) {
          await this.users.setState(user.id, USER_STATE.AWAITING_SEARCH);
          await ctx.reply(MESSAGES.ASK_SEARCH);
          return;
        }
        await this.showArticles(ctx, user, command.args, 'search');
        return;
      case 'favorites':
        await this.listFavorites(ctx, user);
        return;
      case 'reset':
        await this.core.resetHistory(user.id);
        await ctx.reply(MESSAGES.HISTORY_RESET);
        return;
      case 'settings':
        await ctx.reply(settingsSummary(user.intervalMinutes, user.newsLimit), {
          parseMode: 'HTML',
          keyboard: settingsKeyboard(),
        });
        return;
      default:
        await ctx.reply(MESSAGES.UNKNOWN_INPUT);
    }
  }

  private async handleFreeText(ctx: ChatContext, user: User, text: string): Promise<void> {
    switch (user.state) {
      case USER_STATE.AWAITING_TOPIC:
        await this.users.setState(user.id, USER_STATE.IDLE);
        await this.subscribe(ctx, user, text);
        return;
      case USER_STATE.AWAITING_SEARCH:
        await this.users.setState(user.id, USER_STATE.IDLE);
        await this.showArticles(ctx, user, text, 'search');
        return;
      default:
        await ctx.reply(MESSAGES.UNKNOWN_INPUT);
    }
  }

  private async subscribe(ctx: ChatContext, user: User, topic: string): Promise<void> {
    try {
      const normalized = await this.subscriptions.add(user.id, topic);
      this.logger.info({ userId: user.id, topic: normalized }, 'User subscribed');
      await ctx.reply(subscribed(normalized));
    } catch (error) {
      if (error instanceof DuplicateSubscriptionError) {
        await ctx.reply(alreadySubscribed(error.topic));
        return;
      }
      if (error instanceof InvalidTopicError) {
        await ctx.reply(error.message);
        return;
      }
      throw error;
    }
  }

  private async unsubscribe(ctx: ChatContext, user: User, topic: string): Promise<void> {
    if (!topic) {
      const topics = await this.subscriptions.listTopics(user.id);
      await ctx.reply(
        topics.length > 0
          ? `${MESSAGES.UNSUBSCRIBE_USAGE}\n\n${subscriptionList(topics)}`
          : MESSAGES.NO_SUBSCRIPTIONS
      );
      return;
    }

    try {
      await this.subscriptions.remove(user.id, topic);
      this.logger.info({ userId: user.id, topic }, 'User unsubscribed');
      await ctx.reply(unsubscribed(topic.trim().toLowerCase()));
    } catch (error) {
      if (error instanceof SubscriptionNotFoundError) {
        await ctx.reply(notSubscribed(error.topic));
        return;
      }
      throw error;
    }
  }

  private async listSubscriptions(ctx: ChatContext, user: User): Promise<void> {
    const topics = await this.subscriptions.listTopics(user.id);
    if (topics.length === 0) {
      await ctx.reply(MESSAGES.NO_SUBSCRIPTIONS);
      return;
    }
    await ctx.reply(subscriptionList(topics), { keyboard: topicsKeyboard(topics) });
  }

  /**
   * Forced delivery cycle, bounded by forceTimeoutMs.
   */
  private async newsNow(ctx: ChatContext, user: User): Promise<void> {
    const topics = await this.subscriptions.listTopics(user.id);
    if (topics.length === 0) {
      await ctx.reply(MESSAGES.NO_SUBSCRIPTIONS);
      return;
    }

    await ctx.reply(MESSAGES.NEWS_SEARCHING);

    let fresh: number;
    try {
      fresh = await withTimeout(
        this.core.processUser(user, true),
        this.config.forceTimeoutMs,
        'On-demand delivery'
      );
    } catch (error) {
      this.logger.warn({ userId: user.id, error: errorMessage(error) }, 'On-demand delivery failed');
      await ctx.reply(MESSAGES.FETCH_FAILED);
      return;
    }

    if (fresh === 0) {
      await ctx.reply(MESSAGES.NO_FRESH_NEWS);
    }
  }

  /**
   * Browse a topic or run a search. Results are shown as-is: no dedup, and
   * nothing is recorded as delivered.
   */
  private async showArticles(
    ctx: ChatContext,
    user: User,
    query: string,
    mode: 'topic' | 'search'
  ): Promise<void> {
    let articles: Article[];
    try {
      articles =
        mode === 'topic' ? await this.core.fetchForTopic(query) : await this.core.search(query);
    } catch (error) {
      if (error instanceof InvalidTopicError) {
        await ctx.reply(error.message);
        return;
      }
      this.logger.warn({ userId: user.id, query, mode, error: errorMessage(error) }, 'Browse failed');
      await ctx.reply(MESSAGES.FETCH_FAILED);
      return;
    }

    if (articles.length === 0) {
      await ctx.reply(noArticlesFor(query.trim()));
      return;
    }

    const limit = user.newsLimit > 0 ? user.newsLimit : this.config.defaultLimit;
    for (const article of articles.slice(0, limit)) {
      const shortId = createShortId(article.url);
      this.recentArticles.remember(shortId, article);
      const isFavorite = await this.core.isFavorite(user.id, article.url);
      await ctx.reply(formatArticleMessage(article, this.config.timezone), {
        parseMode: 'HTML',
        keyboard: favoriteKeyboard(shortId, isFavorite),
      });
    }
  }

  private async listFavorites(ctx: ChatContext, user: User): Promise<void> {
    const favorites = await this.core.listFavorites(user.id);
    if (favorites.length === 0) {
      await ctx.reply(MESSAGES.NO_FAVORITES);
      return;
    }

    await ctx.reply(favoritesHeader(favorites.length));
    for (const favorite of favorites) {
      await ctx.reply(formatFavoriteMessage(favorite, this.config.timezone), {
        parseMode: 'HTML',
        keyboard: favoriteKeyboard(createShortId(favorite.url), true),
      });
    }
  }

  private async onIntervalChosen(ctx: CallbackContext, user: User, value: string): Promise<void> {
    const minutes = Number(value);
    if (!INTERVAL_OPTIONS.some((option) => option === minutes)) {
      this.logger.warn({ userId: user.id, value }, 'Unexpected interval option');
      await ctx.answer();
      return;
    }
    await this.users.updateInterval(user.id, minutes);
    await ctx.editText(settingsSummary(minutes, user.newsLimit), settingsKeyboard());
    await ctx.answer(intervalSet(minutes));
  }

  private async onLimitChosen(ctx: CallbackContext, user: User, value: string): Promise<void> {
    const limit = Number(value);
    if (!LIMIT_OPTIONS.some((option) => option === limit)) {
      this.logger.warn({ userId: user.id, value }, 'Unexpected limit option');
      await ctx.answer();
      return;
    }
    await this.users.updateLimit(user.id, limit);
    await ctx.editText(settingsSummary(user.intervalMinutes, limit), settingsKeyboard());
    await ctx.answer(limitSet(limit));
  }

  private async onAddFavorite(ctx: CallbackContext, user: User, shortId: string): Promise<void> {
    const article = this.recentArticles.get(shortId) ?? articleFromMessage(ctx.message);
    if (!article) {
      this.logger.warn({ userId: user.id, shortId }, 'Favorite target not found');
      await ctx.answer(MESSAGES.ARTICLE_NOT_FOUND);
      return;
    }

    if (await this.core.isFavorite(user.id, article.url)) {
      await ctx.answer(MESSAGES.ALREADY_FAVORITE);
      return;
    }

    await this.core.addFavorite(user.id, article);
    await ctx.editMarkup(favoriteKeyboard(createShortId(article.url), true));
    await ctx.answer(MESSAGES.FAVORITE_ADDED);
  }

  private async onRemoveFavorite(ctx: CallbackContext, user: User, shortId: string): Promise<void> {
    const favorites = await this.core.listFavorites(user.id);
    const target = favorites.find((f) => createShortId(f.url) === shortId);
    if (!target) {
      await ctx.answer(MESSAGES.NOT_FAVORITE);
      return;
    }

    await this.core.removeFavorite(user.id, target.url);
    await ctx.editMarkup(favoriteKeyboard(shortId, false));
    await ctx.answer(MESSAGES.FAVORITE_REMOVED);
  }

  /**
   * Run a handler in its own trace; failures are logged and reported to the
   * user instead of reaching the polling loop.
   */
  private async guard(ctx: ChatContext, kind: string, handler: () => Promise<void>): Promise<void> {
    await withTraceContext(createTraceContext(randomUUID(), { spanId: kind }), async () => {
      try {
        await handler();
      } catch (error) {
        this.logger.error(
          { telegramId: ctx.telegramId, kind, error: errorMessage(error) },
          'Handler failed'
        );
        try {
          await ctx.reply(MESSAGES.INTERNAL_ERROR);
        } catch (replyError) {
          this.logger.error({ error: errorMessage(replyError) }, 'Failed to report handler error');
        }
      }
    });
  }
}

function menuButtonCommand(text: string): string | null {
  switch (text) {
    case MENU.NEWS:
      return 'news';
    case MENU.SUBSCRIPTIONS:
      return 'subscriptions';
    case MENU.FAVORITES:
      return 'favorites';
    case MENU.SETTINGS:
      return 'settings';
    case MENU.HELP:
      return 'help';
    default:
      return null;
  }
}

/**
 * Recover an article from the message a favorites button is attached to:
 * the first text link is the article URL, the first line its title.
 */
export function articleFromMessage(
  message: CallbackMessageView | undefined
): Pick<Article, 'url' | 'title' | 'publishedAt' | 'source'> | undefined {
  const url = message?.entities.find((e) => e.type === 'text_link' && e.url)?.url;
  if (!message || !url) {
    return undefined;
  }
  const title = message.text.split('\n')[0]?.trim() ?? '';
  return {
    url,
    title: title || url,
    publishedAt: new Date(),
    source: { name: '' },
  };
}

export function createBotHandlers(
  deps: BotHandlersDeps,
  config?: Partial<BotHandlersConfig>
): BotHandlers {
  return new BotHandlers(deps, config);
}
