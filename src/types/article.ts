/**
 * Article Types
 *
 * An article's identity is its canonical URL: two articles are the same
 * article iff their URLs are equal.
 */

/**
 * Publisher of an article.
 */
export interface ArticleSourceInfo {
  /** Human-readable publisher name (may be empty) */
  name: string;
  /** Publisher home page, when the provider reports one */
  url?: string | undefined;
}

/**
 * A news article as returned by a provider.
 *
 * Immutable once fetched.
 */
export interface Article {
  /** Canonical URL - the article identity */
  url: string;
  title: string;
  description: string;
  /** Body excerpt (providers truncate it) */
  content: string;
  /** Lead image URL, if any */
  image?: string | undefined;
  publishedAt: Date;
  source: ArticleSourceInfo;
}

/**
 * Article saved to a user's favorites.
 */
export interface FavoriteArticle {
  userId: number;
  url: string;
  title: string;
  sourceName: string;
  publishedAt: Date;
  addedAt: Date;
}
