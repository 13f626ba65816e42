/**
 * Command, menu and callback handling over in-memory storage and a fake
 * article source.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { InlineKeyboard } from 'grammy';
import { BotHandlers, articleFromMessage, parseCommand } from '../../../src/bot/handlers.js';
import type {
  CallbackContext,
  CallbackMessageView,
  ChatContext,
  ReplyOptions,
} from '../../../src/bot/context.js';
import { MESSAGES } from '../../../src/bot/messages.js';
import { formatArticleMessage, formatFavoriteMessage } from '../../../src/channels/article-format.js';
import { RecentArticleIndex } from '../../../src/channels/recent-article-index.js';
import { DeliveryEngine } from '../../../src/core/delivery-engine.js';
import { FleetScheduler } from '../../../src/core/fleet-scheduler.js';
import { NewsService } from '../../../src/core/news-service.js';
import { SeenCache } from '../../../src/core/seen-cache.js';
import { DocumentStore } from '../../../src/storage/document.js';
import { FavoriteRepository } from '../../../src/storage/favorite-repository.js';
import { SubscriptionRepository } from '../../../src/storage/subscription-repository.js';
import { UserRepository } from '../../../src/storage/user-repository.js';
import {
  NOW,
  createArticle,
  createArticles,
  createMockLogger,
  type MockLogger,
} from '../../helpers/factories.js';
import { FakeArticleSource, FakeLedger, MemoryStorage, RecordingSink } from '../../helpers/fakes.js';

const TELEGRAM_ID = 5001;

class FakeChat implements ChatContext {
  readonly telegramId = TELEGRAM_ID;
  readonly chatId = TELEGRAM_ID;
  readonly profile = { username: 'reader', firstName: 'Ann' };
  readonly replies: { text: string; options: ReplyOptions | undefined }[] = [];

  reply(text: string, options?: ReplyOptions): Promise<void> {
    this.replies.push({ text, options });
    return Promise.resolve();
  }

  get texts(): string[] {
    return this.replies.map((r) => r.text);
  }
}

class FakeCallback extends FakeChat implements CallbackContext {
  readonly data: string;
  readonly message: CallbackMessageView | undefined;
  readonly answers: (string | undefined)[] = [];
  readonly edits: { text: string; keyboard: InlineKeyboard | undefined }[] = [];
  readonly markups: InlineKeyboard[] = [];

  constructor(data: string, message?: CallbackMessageView) {
    super();
    this.data = data;
    this.message = message;
  }

  answer(text?: string): Promise<void> {
    this.answers.push(text);
    return Promise.resolve();
  }

  editText(text: string, keyboard?: InlineKeyboard): Promise<void> {
    this.edits.push({ text, keyboard });
    return Promise.resolve();
  }

  editMarkup(keyboard: InlineKeyboard): Promise<void> {
    this.markups.push(keyboard);
    return Promise.resolve();
  }
}

const addButton = (shortId: string) => ({
  inline_keyboard: [[{ text: '⭐ Add to favorites', callback_data: `add_fav_${shortId}` }]],
});
const removeButton = (shortId: string) => ({
  inline_keyboard: [[{ text: '❌ Remove from favorites', callback_data: `rm_fav_${shortId}` }]],
});

/** createShortId('https://news.example.com/item-1') */
const ITEM_1_ID = 'f3a581e2cf';

describe('parseCommand', () => {
  it('splits name and arguments', () => {
    expect(parseCommand('/subscribe@news_bot  Space X ')).toEqual({ name: 'subscribe', args: 'Space X' });
    expect(parseCommand('/NEWS')).toEqual({ name: 'news', args: '' });
  });

  it('returns null for plain text', () => {
    expect(parseCommand('hello')).toBeNull();
  });
});

describe('articleFromMessage', () => {
  it('takes the first text link and the first line', () => {
    expect(
      articleFromMessage({
        text: 'Headline\n\nBody text',
        entities: [{ type: 'bold' }, { type: 'text_link', url: 'https://news.example.com/x' }],
      })
    ).toMatchObject({ url: 'https://news.example.com/x', title: 'Headline', source: { name: '' } });
  });

  it('returns undefined without a link', () => {
    expect(articleFromMessage({ text: 'Headline', entities: [] })).toBeUndefined();
    expect(articleFromMessage(undefined)).toBeUndefined();
  });
});

describe('BotHandlers', () => {
  let storage: MemoryStorage;
  let users: UserRepository;
  let subscriptions: SubscriptionRepository;
  let favorites: FavoriteRepository;
  let source: FakeArticleSource;
  let ledger: FakeLedger;
  let sink: RecordingSink;
  let recentArticles: RecentArticleIndex;
  let logger: MockLogger;
  let handlers: BotHandlers;

  const send = async (text: string): Promise<FakeChat> => {
    const ctx = new FakeChat();
    await handlers.handleText(ctx, text);
    return ctx;
  };

  const press = async (data: string, message?: CallbackMessageView): Promise<FakeCallback> => {
    const ctx = new FakeCallback(data, message);
    await handlers.handleCallback(ctx);
    return ctx;
  };

  const currentUser = async () => {
    const all = await users.listAll();
    const user = all[0];
    if (!user) {
      throw new Error('no user registered');
    }
    return user;
  };

  beforeEach(() => {
    storage = new MemoryStorage();
    const store = new DocumentStore(storage);
    users = new UserRepository(store, () => NOW);
    subscriptions = new SubscriptionRepository(store);
    favorites = new FavoriteRepository(store, () => NOW);
    source = new FakeArticleSource();
    ledger = new FakeLedger();
    sink = new RecordingSink();
    recentArticles = new RecentArticleIndex();
    logger = createMockLogger();

    const engine = new DeliveryEngine({
      users,
      subscriptions,
      source,
      ledger,
      sink,
      seenCache: new SeenCache(),
      logger,
      now: () => NOW,
    });
    const core = new NewsService({
      engine,
      scheduler: new FleetScheduler(users, engine, logger),
      source,
      favorites,
      logger,
    });
    handlers = new BotHandlers(
      { core, users, subscriptions, recentArticles, logger },
      { forceTimeoutMs: 50 }
    );
  });

  describe('basic commands', () => {
    it('/start registers the user and shows the menu', async () => {
      const ctx = await send('/start');

      expect(ctx.texts).toEqual([MESSAGES.WELCOME]);
      expect(ctx.replies[0]?.options?.keyboard).toBeDefined();
      const user = await currentUser();
      expect(user.telegramId).toBe(TELEGRAM_ID);
      expect(user.username).toBe('reader');
    });

    it('/help lists the commands', async () => {
      expect((await send('/help')).texts).toEqual([MESSAGES.HELP]);
    });

    it('answers unknown commands and idle free text', async () => {
      expect((await send('/dance')).texts).toEqual([MESSAGES.UNKNOWN_INPUT]);
      expect((await send('hello there')).texts).toEqual([MESSAGES.UNKNOWN_INPUT]);
    });

    it('/settings shows the current settings', async () => {
      const ctx = await send('/settings');

      expect(ctx.texts).toEqual([
        '<b>⚙️ Settings</b>\n\nDelivery interval: 1 hour\nArticles per delivery: 5',
      ]);
      expect(ctx.replies[0]?.options?.parseMode).toBe('HTML');
    });

    it('menu buttons map to commands', async () => {
      expect((await send('❓ Help')).texts).toEqual([MESSAGES.HELP]);
      expect((await send('📋 My subscriptions')).texts).toEqual([MESSAGES.NO_SUBSCRIPTIONS]);
    });

    it('/reset clears delivery history', async () => {
      await send('/start');
      const user = await currentUser();
      ledger.seed(user.id, ['https://news.example.com/old']);

      const ctx = await send('/reset');

      expect(ctx.texts).toEqual([MESSAGES.HISTORY_RESET]);
      expect(ledger.urlsFor(user.id)).toEqual([]);
    });
  });

  describe('subscriptions', () => {
    it('/subscribe stores the normalized topic', async () => {
      const ctx = await send('/subscribe  Climate Change ');

      expect(ctx.texts).toEqual(['✅ Subscribed to "climate change".']);
      expect(await subscriptions.listTopics((await currentUser()).id)).toEqual(['climate change']);
    });

    it('reports a duplicate subscription', async () => {
      await send('/subscribe tech');

      expect((await send('/subscribe TECH')).texts).toEqual(['You are already subscribed to "tech".']);
    });

    it('asks for a topic and takes the next message as it', async () => {
      expect((await send('/subscribe')).texts).toEqual([MESSAGES.ASK_TOPIC]);
      expect((await currentUser()).state).toBe('awaiting_topic');

      expect((await send('Space')).texts).toEqual(['✅ Subscribed to "space".']);
      expect((await currentUser()).state).toBe('');
    });

    it('a command cancels a pending prompt', async () => {
      await send('/subscribe');

      await send('/help');

      expect((await currentUser()).state).toBe('');
    });

    it('rejects an overlong topic', async () => {
      expect((await send(`/subscribe ${'x'.repeat(256)}`)).texts).toEqual([
        'Topic must be at most 255 characters',
      ]);
    });

    it('/unsubscribe removes a topic', async () => {
      await send('/subscribe tech');

      expect((await send('/unsubscribe Tech')).texts).toEqual(['Unsubscribed from "tech".']);
      expect(await subscriptions.listTopics((await currentUser()).id)).toEqual([]);
    });

    it('/unsubscribe reports a topic the user does not follow', async () => {
      expect((await send('/unsubscribe art')).texts).toEqual(['You are not subscribed to "art".']);
    });

    it('/unsubscribe without a topic shows usage and the list', async () => {
      await send('/subscribe tech');

      expect((await send('/unsubscribe')).texts).toEqual([
        'Usage: /unsubscribe <topic>\n\n📋 Your subscriptions (1):\n• tech',
      ]);
    });

    it('/subscriptions lists topics with browse buttons', async () => {
      await send('/subscribe tech');
      await send('/subscribe art');

      const ctx = await send('/subscriptions');

      expect(ctx.texts).toEqual(['📋 Your subscriptions (2):\n• tech\n• art']);
      expect(ctx.replies[0]?.options?.keyboard).toEqual({
        inline_keyboard: [
          [{ text: '📰 tech', callback_data: 'topic_news_tech' }],
          [{ text: '📰 art', callback_data: 'topic_news_art' }],
        ],
      });
    });
  });

  describe('/news', () => {
    it('tells a user without subscriptions how to add one', async () => {
      const ctx = await send('/news');

      expect(ctx.texts).toEqual([MESSAGES.NO_SUBSCRIPTIONS]);
      expect(source.fetchCalls).toEqual([]);
    });

    it('runs a forced delivery cycle', async () => {
      await send('/subscribe tech');
      source.set('tech', createArticles(2));

      const ctx = await send('/news');

      expect(ctx.texts).toEqual([MESSAGES.NEWS_SEARCHING]);
      expect(sink.urls()).toEqual([
        'https://news.example.com/item-1',
        'https://news.example.com/item-2',
      ]);
    });

    it('says so when nothing is fresh', async () => {
      await send('/subscribe tech');

      const ctx = await send('📰 Get news now');

      expect(ctx.texts).toEqual([MESSAGES.NEWS_SEARCHING, MESSAGES.NO_FRESH_NEWS]);
    });

    it('gives up after the on-demand timeout', async () => {
      await send('/subscribe tech');
      vi.spyOn(source, 'fetchArticles').mockReturnValue(new Promise<never>(() => undefined));

      const ctx = await send('/news');

      expect(ctx.texts).toEqual([MESSAGES.NEWS_SEARCHING, MESSAGES.FETCH_FAILED]);
    });
  });

  describe('browse and search', () => {
    it('/topic shows up to the user limit without recording anything', async () => {
      source.set('tech', createArticles(7));

      const ctx = await send('/topic tech');

      expect(ctx.replies).toHaveLength(5);
      expect(ctx.replies[0]?.text).toBe(
        formatArticleMessage(createArticle({ url: 'https://news.example.com/item-1' }), 'utc')
      );
      expect(ctx.replies[0]?.options?.parseMode).toBe('HTML');
      expect(ctx.replies[0]?.options?.keyboard).toEqual(addButton(ITEM_1_ID));
      expect(ledger.markCalls).toEqual([]);
      expect(recentArticles.get(ITEM_1_ID)?.url).toBe('https://news.example.com/item-1');
    });

    it('shows already-delivered articles too', async () => {
      await send('/start');
      ledger.seed((await currentUser()).id, ['https://news.example.com/item-1']);
      source.set('tech', createArticles(1));

      expect((await send('/topic tech')).replies).toHaveLength(1);
    });

    it('/topic without a topic shows usage', async () => {
      expect((await send('/topic')).texts).toEqual([MESSAGES.TOPIC_USAGE]);
    });

    it('reports an empty result', async () => {
      expect((await send('/topic quantum')).texts).toEqual(['No articles found for "quantum".']);
    });

    it('reports a failed fetch', async () => {
      source.set('tech', new Error('upstream down'));

      expect((await send('/topic tech')).texts).toEqual([MESSAGES.FETCH_FAILED]);
    });

    it('/search asks for a query and searches the next message', async () => {
      source.set('mars rover', createArticles(1));

      expect((await send('/search')).texts).toEqual([MESSAGES.ASK_SEARCH]);
      const ctx = await send('mars rover');

      expect(source.searchCalls).toEqual(['mars rover']);
      expect(ctx.replies).toHaveLength(1);
    });

    it('topic buttons browse that topic', async () => {
      source.set('tech', createArticles(1));

      const ctx = await press('topic_news_tech');

      expect(ctx.answers).toEqual([undefined]);
      expect(source.fetchCalls).toEqual(['tech']);
      expect(ctx.replies).toHaveLength(1);
    });
  });

  describe('settings callbacks', () => {
    it('opens the interval picker', async () => {
      const ctx = await press('settings_interval');

      expect(ctx.edits[0]?.text).toBe(MESSAGES.CHOOSE_INTERVAL);
      expect(ctx.answers).toEqual([undefined]);
    });

    it('stores a chosen interval', async () => {
      const ctx = await press('interval_180');

      expect((await currentUser()).intervalMinutes).toBe(180);
      expect(ctx.edits[0]?.text).toBe(
        '<b>⚙️ Settings</b>\n\nDelivery interval: 3 hours\nArticles per delivery: 5'
      );
      expect(ctx.answers).toEqual(['Interval set to 3 hours']);
    });

    it('ignores an interval that is not offered', async () => {
      const ctx = await press('interval_7');

      expect((await currentUser()).intervalMinutes).toBe(60);
      expect(ctx.answers).toEqual([undefined]);
    });

    it('stores a chosen limit', async () => {
      const ctx = await press('limit_10');

      expect((await currentUser()).newsLimit).toBe(10);
      expect(ctx.answers).toEqual(['Articles per delivery set to 10']);
    });
  });

  describe('favorites', () => {
    it('adds a recently shown article', async () => {
      source.set('tech', createArticles(1));
      await send('/topic tech');

      const ctx = await press(`add_fav_${ITEM_1_ID}`);

      expect(ctx.answers).toEqual([MESSAGES.FAVORITE_ADDED]);
      expect(ctx.markups[0]).toEqual(removeButton(ITEM_1_ID));
      const saved = await favorites.list((await currentUser()).id);
      expect(saved.map((f) => f.url)).toEqual(['https://news.example.com/item-1']);
    });

    it('does not add the same article twice', async () => {
      source.set('tech', createArticles(1));
      await send('/topic tech');
      await press(`add_fav_${ITEM_1_ID}`);

      const ctx = await press(`add_fav_${ITEM_1_ID}`);

      expect(ctx.answers).toEqual([MESSAGES.ALREADY_FAVORITE]);
    });

    it('recovers the article from the message after a restart', async () => {
      const ctx = await press('add_fav_0000000000', {
        text: 'Headline\n\nBody',
        entities: [{ type: 'text_link', url: 'https://news.example.com/old' }],
      });

      expect(ctx.answers).toEqual([MESSAGES.FAVORITE_ADDED]);
      const saved = await favorites.list((await currentUser()).id);
      expect(saved[0]?.title).toBe('Headline');
      expect(saved[0]?.url).toBe('https://news.example.com/old');
    });

    it('reports an article it cannot find', async () => {
      expect((await press('add_fav_0000000000')).answers).toEqual([MESSAGES.ARTICLE_NOT_FOUND]);
    });

    it('removes a favorite by short id', async () => {
      await send('/start');
      const user = await currentUser();
      await favorites.add(user.id, createArticle({ url: 'https://news.example.com/item-1' }));

      const ctx = await press(`rm_fav_${ITEM_1_ID}`);

      expect(ctx.answers).toEqual([MESSAGES.FAVORITE_REMOVED]);
      expect(ctx.markups[0]).toEqual(addButton(ITEM_1_ID));
      expect(await favorites.list(user.id)).toEqual([]);
    });

    it('reports removal of something that is not a favorite', async () => {
      expect((await press('rm_fav_0000000000')).answers).toEqual([MESSAGES.NOT_FAVORITE]);
    });

    it('/favorites lists saved articles', async () => {
      await send('/start');
      const user = await currentUser();
      await favorites.add(user.id, createArticle({ url: 'https://news.example.com/item-1' }));

      const ctx = await send('⭐ Favorites');

      const saved = (await favorites.list(user.id))[0];
      expect(ctx.texts).toEqual([
        '⭐ Your favorites (1):',
        saved ? formatFavoriteMessage(saved, 'utc') : '',
      ]);
      expect(ctx.replies[1]?.options?.keyboard).toEqual(removeButton(ITEM_1_ID));
    });

    it('/favorites without any says how to add one', async () => {
      expect((await send('/favorites')).texts).toEqual([MESSAGES.NO_FAVORITES]);
    });
  });

  describe('failures', () => {
    it('replies with a generic error when storage fails', async () => {
      storage.failLoads = true;

      const ctx = await send('/help');

      expect(ctx.texts).toEqual([MESSAGES.INTERNAL_ERROR]);
      expect(logger.error).toHaveBeenCalledWith(
        {
          telegramId: TELEGRAM_ID,
          kind: 'message',
          error: 'Storage operation failed for "users": disk unavailable',
        },
        'Handler failed'
      );
    });
  });
});
