import type { Article } from '../types/article.js';

/**
 * Bounded map of recently delivered articles by short id, so a favorites
 * button pressed later can recover the full article. Oldest entries are
 * evicted first.
 */
export class RecentArticleIndex {
  private readonly entries = new Map<string, Article>();
  private readonly capacity: number;

  constructor(capacity = 500) {
    this.capacity = capacity;
  }

  remember(shortId: string, article: Article): void {
    // Re-insert so a repeat delivery counts as recent
    this.entries.delete(shortId);
    this.entries.set(shortId, article);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get(shortId: string): Article | undefined {
    return this.entries.get(shortId);
  }

  get size(): number {
    return this.entries.size;
  }
}
