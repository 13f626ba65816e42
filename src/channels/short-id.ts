import { createHash } from 'node:crypto';

const SHORT_ID_LENGTH = 10;

/**
 * Compact article key for callback data (Telegram caps it at 64 bytes).
 * Short inputs are used as-is; longer ones map to the tail of their MD5.
 */
export function createShortId(url: string): string {
  if (url.length <= SHORT_ID_LENGTH) {
    return url;
  }
  const digest = createHash('md5').update(url).digest('hex');
  return digest.slice(-SHORT_ID_LENGTH);
}
