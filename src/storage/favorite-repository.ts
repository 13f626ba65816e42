/**
 * Favorite Repository
 *
 * Per-user bookmarks in `favorites/<userId>`, unique by URL.
 */

import { z } from 'zod';
import type { FavoriteStore } from '../ports/index.js';
import type { Article, FavoriteArticle } from '../types/article.js';
import type { DocumentStore } from './document.js';

const storedFavoriteSchema = z.object({
  url: z.string(),
  title: z.string(),
  sourceName: z.string(),
  publishedAt: z.string(),
  addedAt: z.string(),
});

const favoritesDocumentSchema = z.object({
  favorites: z.array(storedFavoriteSchema),
});

type FavoritesDocument = z.infer<typeof favoritesDocumentSchema>;

function emptyDocument(): FavoritesDocument {
  return { favorites: [] };
}

function favoritesKey(userId: number): string {
  return `favorites/${String(userId)}`;
}

export class FavoriteRepository implements FavoriteStore {
  private readonly store: DocumentStore;
  private readonly now: () => Date;

  constructor(store: DocumentStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  /**
   * Bookmark an article. Adding the same URL twice keeps the first entry.
   */
  async add(
    userId: number,
    article: Pick<Article, 'url' | 'title' | 'publishedAt' | 'source'>
  ): Promise<void> {
    await this.update(userId, (doc) => {
      if (doc.favorites.some((f) => f.url === article.url)) {
        return;
      }
      doc.favorites.push({
        url: article.url,
        title: article.title,
        sourceName: article.source.name,
        publishedAt: article.publishedAt.toISOString(),
        addedAt: this.now().toISOString(),
      });
    });
  }

  async remove(userId: number, url: string): Promise<boolean> {
    return this.update(userId, (doc) => {
      const before = doc.favorites.length;
      doc.favorites = doc.favorites.filter((f) => f.url !== url);
      return doc.favorites.length < before;
    });
  }

  /**
   * Favorites, most recently added first.
   */
  async list(userId: number): Promise<FavoriteArticle[]> {
    const doc = await this.read(userId);
    return doc.favorites
      .map((f) => ({
        userId,
        url: f.url,
        title: f.title,
        sourceName: f.sourceName,
        publishedAt: new Date(f.publishedAt),
        addedAt: new Date(f.addedAt),
      }))
      .reverse();
  }

  async isFavorite(userId: number, url: string): Promise<boolean> {
    const doc = await this.read(userId);
    return doc.favorites.some((f) => f.url === url);
  }

  private read(userId: number): Promise<FavoritesDocument> {
    return this.store.read(favoritesKey(userId), favoritesDocumentSchema, emptyDocument);
  }

  private update<R>(userId: number, mutate: (doc: FavoritesDocument) => R): Promise<R> {
    return this.store.update(favoritesKey(userId), favoritesDocumentSchema, emptyDocument, mutate);
  }
}
