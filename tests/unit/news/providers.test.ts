/**
 * GNews and NewsAPI providers against a stubbed fetch.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { GNewsProvider } from '../../../src/news/providers/gnews-provider.js';
import { NewsApiProvider } from '../../../src/news/providers/newsapi-provider.js';
import { createProviders, getOrderedDescriptors, getProviderHealthInfo } from '../../../src/news/providers/registry.js';
import { DEFAULT_CONFIG } from '../../../src/config/config-schema.js';
import { createMockLogger } from '../../helpers/factories.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const GNEWS_FIXTURE: unknown = JSON.parse(
  readFileSync(join(__dirname, '../../fixtures/gnews-search.json'), 'utf-8')
);
const NEWSAPI_FIXTURE: unknown = JSON.parse(
  readFileSync(join(__dirname, '../../fixtures/newsapi-everything.json'), 'utf-8')
);

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/json' },
    ...init,
  });
}

describe('GNewsProvider', () => {
  const mockFetch = vi.fn<typeof fetch>();
  let provider: GNewsProvider;

  const requestedUrl = (): URL => new URL(String(mockFetch.mock.calls[0]?.[0]));

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    provider = new GNewsProvider(
      { apiKey: 'test-gnews-key', maxResults: 20, timeoutMs: 1000 },
      createMockLogger()
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds the search request', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ articles: [] }));

    await provider.search({ query: 'solar energy', sortBy: 'publishedAt', lang: 'ru', country: 'ru' });

    const url = requestedUrl();
    expect(`${url.origin}${url.pathname}`).toBe('https://gnews.io/api/v4/search');
    expect(url.searchParams.get('q')).toBe('solar energy');
    expect(url.searchParams.get('lang')).toBe('ru');
    expect(url.searchParams.get('country')).toBe('ru');
    expect(url.searchParams.get('sortby')).toBe('publishedAt');
    expect(url.searchParams.get('max')).toBe('20');
    expect(url.searchParams.get('token')).toBe('test-gnews-key');
  });

  it('passes relevance ordering through', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ articles: [] }));

    await provider.search({ query: 'mars', sortBy: 'relevance' });

    expect(requestedUrl().searchParams.get('sortby')).toBe('relevance');
    expect(requestedUrl().searchParams.has('lang')).toBe(false);
  });

  it('converts articles and drops entries missing url, title or date', async () => {
    mockFetch.mockResolvedValue(jsonResponse(GNEWS_FIXTURE));

    const result = await provider.search({ query: 'solar', sortBy: 'publishedAt' });

    expect(result).toEqual({
      ok: true,
      articles: [
        {
          url: 'https://news.example.com/solar-farm',
          title: 'Solar farm opens on the coast',
          description: 'A new plant starts feeding the regional grid.',
          content: 'The plant was built over two years...',
          image: 'https://img.example.com/solar.jpg',
          publishedAt: new Date('2025-03-09T08:00:00Z'),
          source: { name: 'Energy Daily', url: 'https://energy.example.com' },
        },
      ],
    });
  });

  it('reports rate limiting with the retry delay', async () => {
    mockFetch.mockResolvedValue(
      new Response('{}', { status: 429, headers: { 'retry-after': '30' } })
    );

    const result = await provider.search({ query: 'solar', sortBy: 'publishedAt' });

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'RATE_LIMITED',
        message: 'GNews rate limit exceeded',
        retryable: true,
        retryAfterMs: 30_000,
      },
    });
  });

  it('reports a rejected key', async () => {
    mockFetch.mockResolvedValue(new Response('{}', { status: 403 }));

    const result = await provider.search({ query: 'solar', sortBy: 'publishedAt' });

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error.code).toBe('AUTH_FAILED');
  });

  it('marks server errors retryable', async () => {
    mockFetch.mockResolvedValue(
      new Response('oops', { status: 503, statusText: 'Service Unavailable' })
    );

    const result = await provider.search({ query: 'solar', sortBy: 'publishedAt' });

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'PROVIDER_ERROR',
        message: 'GNews error: 503 Service Unavailable',
        retryable: true,
      },
    });
  });

  it('reports an unparsable body', async () => {
    mockFetch.mockResolvedValue(new Response('<html>', { status: 200 }));

    const result = await provider.search({ query: 'solar', sortBy: 'publishedAt' });

    expect(result.ok ? undefined : result.error.message).toBe('Failed to parse GNews response');
  });

  it('reports an unexpected payload shape', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ articles: 'none' }));

    const result = await provider.search({ query: 'solar', sortBy: 'publishedAt' });

    expect(result.ok ? undefined : result.error.message).toBe('Unexpected GNews response shape');
  });

  it('maps transport failures', async () => {
    mockFetch.mockRejectedValue(new Error('socket hang up'));

    const result = await provider.search({ query: 'solar', sortBy: 'publishedAt' });

    expect(result).toEqual({
      ok: false,
      error: { code: 'NETWORK_ERROR', message: 'GNews request failed: socket hang up', retryable: true },
    });
  });

  it('maps an aborted request to a timeout', async () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    mockFetch.mockRejectedValue(abort);

    const result = await provider.search({ query: 'solar', sortBy: 'publishedAt' });

    expect(result.ok ? undefined : result.error.code).toBe('TIMEOUT');
  });

  it('is unavailable without a key and never calls out', async () => {
    const keyless = new GNewsProvider({ apiKey: undefined, maxResults: 20, timeoutMs: 1000 }, createMockLogger());

    const result = await keyless.search({ query: 'solar', sortBy: 'publishedAt' });

    expect(keyless.isAvailable()).toBe(false);
    expect(result.ok ? undefined : result.error.code).toBe('AUTH_FAILED');
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('NewsApiProvider', () => {
  const mockFetch = vi.fn<typeof fetch>();
  let provider: NewsApiProvider;

  const requestedUrl = (): URL => new URL(String(mockFetch.mock.calls[0]?.[0]));

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    provider = new NewsApiProvider(
      { apiKey: 'test-newsapi-key', maxResults: 10, timeoutMs: 1000 },
      createMockLogger()
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds the everything request', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ status: 'ok', articles: [] }));

    await provider.search({ query: 'compilers', sortBy: 'publishedAt', lang: 'ru', country: 'ru' });

    const url = requestedUrl();
    expect(`${url.origin}${url.pathname}`).toBe('https://newsapi.org/v2/everything');
    expect(url.searchParams.get('q')).toBe('compilers');
    expect(url.searchParams.get('language')).toBe('ru');
    expect(url.searchParams.get('sortBy')).toBe('publishedAt');
    expect(url.searchParams.get('pageSize')).toBe('10');
    expect(url.searchParams.get('apiKey')).toBe('test-newsapi-key');
    expect(url.searchParams.has('country')).toBe(false);
  });

  it('asks for relevancy ordering on search', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ status: 'ok', articles: [] }));

    await provider.search({ query: 'compilers', sortBy: 'relevance' });

    expect(requestedUrl().searchParams.get('sortBy')).toBe('relevancy');
  });

  it('converts articles and drops entries without a URL', async () => {
    mockFetch.mockResolvedValue(jsonResponse(NEWSAPI_FIXTURE));

    const result = await provider.search({ query: 'compilers', sortBy: 'publishedAt' });

    expect(result).toEqual({
      ok: true,
      articles: [
        {
          url: 'https://news.example.com/compiler-release',
          title: 'Compiler release adds faster builds',
          description: 'Incremental builds are twice as fast.',
          content: 'The release notes list...',
          image: undefined,
          publishedAt: new Date('2025-03-08T17:30:00Z'),
          source: { name: 'Tech Wire' },
        },
      ],
    });
  });

  it('treats a non-ok status field as a provider error', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ status: 'error', message: 'bad query' }));

    const result = await provider.search({ query: 'compilers', sortBy: 'publishedAt' });

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'PROVIDER_ERROR',
        message: 'NewsAPI returned status "error": bad query',
        retryable: false,
      },
    });
  });
});

describe('provider registry', () => {
  it('orders providers by configured priority', () => {
    expect(getOrderedDescriptors(['newsapi']).map((d) => d.id)).toEqual(['newsapi', 'gnews']);
    expect(getOrderedDescriptors(['bogus', 'gnews']).map((d) => d.id)).toEqual(['gnews', 'newsapi']);
  });

  it('creates every provider and reports which have keys', () => {
    const providers = createProviders(
      { ...DEFAULT_CONFIG.news, gnewsApiKey: undefined, newsApiKey: 'test-newsapi-key' },
      createMockLogger()
    );

    expect(providers.map((p) => p.name)).toEqual(['gnews', 'newsapi']);
    expect(getProviderHealthInfo(providers)).toEqual({
      available: ['newsapi'],
      unavailable: ['gnews'],
    });
  });
});
