/**
 * JSON over HTTP for news providers.
 *
 * Maps transport failures and HTTP statuses to NewsError codes; providers
 * only validate and convert the payload.
 */

import { errorMessage } from '../../core/errors.js';
import type { NewsError } from './news-provider.js';

export type JsonResult = { ok: true; data: unknown } | { ok: false; error: NewsError };

export async function requestJson(
  url: URL,
  options: { provider: string; timeoutMs: number; headers?: Record<string, string> }
): Promise<JsonResult> {
  const { provider, timeoutMs } = options;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetch(url.href, {
      signal: controller.signal,
      headers: { Accept: 'application/json', ...options.headers },
    });

    if (response.status === 429) {
      const retryAfter = response.headers.get('retry-after');
      const seconds = retryAfter ? Number.parseInt(retryAfter, 10) : Number.NaN;
      return {
        ok: false,
        error: {
          code: 'RATE_LIMITED',
          message: `${provider} rate limit exceeded`,
          retryable: true,
          retryAfterMs: Number.isNaN(seconds) ? undefined : seconds * 1000,
        },
      };
    }

    if (response.status === 401 || response.status === 403) {
      return {
        ok: false,
        error: {
          code: 'AUTH_FAILED',
          message: `${provider} authentication failed (${String(response.status)})`,
          retryable: false,
        },
      };
    }

    if (!response.ok) {
      return {
        ok: false,
        error: {
          code: 'PROVIDER_ERROR',
          message: `${provider} error: ${String(response.status)} ${response.statusText}`,
          retryable: response.status >= 500,
        },
      };
    }

    try {
      const data: unknown = await response.json();
      return { ok: true, data };
    } catch {
      return {
        ok: false,
        error: {
          code: 'PROVIDER_ERROR',
          message: `Failed to parse ${provider} response`,
          retryable: false,
        },
      };
    }
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      return {
        ok: false,
        error: {
          code: 'TIMEOUT',
          message: `${provider} request timed out after ${String(timeoutMs)}ms`,
          retryable: true,
        },
      };
    }

    return {
      ok: false,
      error: {
        code: 'NETWORK_ERROR',
        message: `${provider} request failed: ${errorMessage(error)}`,
        retryable: true,
      },
    };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Parse an upstream timestamp; null when missing or unparsable.
 */
export function parsePublishedAt(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}
