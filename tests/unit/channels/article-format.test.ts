import { describe, it, expect } from 'vitest';
import {
  escapeHtml,
  formatArticleMessage,
  formatFavoriteMessage,
  formatPublishedAt,
  truncate,
} from '../../../src/channels/article-format.js';
import { createArticle } from '../../helpers/factories.js';

const PUBLISHED = new Date('2025-03-09T08:05:00Z');

describe('escapeHtml', () => {
  it('escapes markup and quotes', () => {
    expect(escapeHtml('a < b & "c" > d')).toBe('a &lt; b &amp; &quot;c&quot; &gt; d');
  });
});

describe('truncate', () => {
  it('returns short text unchanged', () => {
    expect(truncate('hello', 5)).toBe('hello');
  });

  it('cuts long text and appends an ellipsis within the limit', () => {
    expect(truncate('hello world', 8)).toBe('hello...');
    expect(truncate('a'.repeat(400), 300)).toHaveLength(300);
  });

  it('never splits a surrogate pair', () => {
    expect(truncate('😀😀😀😀😀', 4)).toBe('😀...');
  });
});

describe('formatPublishedAt', () => {
  it('formats in the requested zone', () => {
    expect(formatPublishedAt(PUBLISHED, 'utc')).toBe('09.03.2025 08:05');
    expect(formatPublishedAt(PUBLISHED, 'Europe/Moscow')).toBe('09.03.2025 11:05');
  });
});

describe('formatArticleMessage', () => {
  it('renders title, description, source, date and link', () => {
    const article = createArticle({
      url: 'https://news.example.com/a?x=1&y=2',
      title: 'Rates & <Bonds>',
      description: 'Short "quoted" text',
      publishedAt: PUBLISHED,
      source: { name: 'Daily' },
    });

    expect(formatArticleMessage(article)).toBe(
      '<b>Rates &amp; &lt;Bonds&gt;</b>\n\n' +
        'Short &quot;quoted&quot; text\n\n' +
        '<i>📰 Source: Daily</i>\n' +
        '<i>📅 Published: 09.03.2025 08:05</i>\n\n' +
        '<a href="https://news.example.com/a?x=1&amp;y=2">Read more →</a>'
    );
  });

  it('omits an empty description and names an unknown source', () => {
    const article = createArticle({
      url: 'https://news.example.com/b',
      title: 'Plain',
      description: '',
      publishedAt: PUBLISHED,
      source: { name: '' },
    });

    expect(formatArticleMessage(article)).toBe(
      '<b>Plain</b>\n\n' +
        '<i>📰 Source: Unknown source</i>\n' +
        '<i>📅 Published: 09.03.2025 08:05</i>\n\n' +
        '<a href="https://news.example.com/b">Read more →</a>'
    );
  });

  it('shortens long descriptions to 300 characters', () => {
    const article = createArticle({ description: 'x'.repeat(500), publishedAt: PUBLISHED });

    const description = formatArticleMessage(article).split('\n\n')[1];

    expect(description).toBe('x'.repeat(297) + '...');
  });
});

describe('formatFavoriteMessage', () => {
  it('renders a saved article without description', () => {
    expect(
      formatFavoriteMessage({
        userId: 1,
        url: 'https://news.example.com/fav',
        title: 'Saved',
        sourceName: 'Daily',
        publishedAt: PUBLISHED,
        addedAt: PUBLISHED,
      })
    ).toBe(
      '<b>Saved</b>\n\n' +
        '<i>📰 Source: Daily</i>\n' +
        '<i>📅 Published: 09.03.2025 08:05</i>\n\n' +
        '<a href="https://news.example.com/fav">Read more →</a>'
    );
  });
});
