/**
 * Degradation Cache
 *
 * In-memory, non-authoritative mirror of the seen-article ledger. The engine
 * only reads it when a ledger read fails and only writes it when a ledger
 * write fails. Contents are lost on restart.
 *
 * All operations are synchronous, so concurrent delivery cycles on the event
 * loop cannot observe a half-applied update.
 */

export interface SeenCacheConfig {
  /** Entries kept per user before that user's segment is cleared */
  maxEntriesPerUser: number;
}

const DEFAULT_CONFIG: SeenCacheConfig = {
  maxEntriesPerUser: 100,
};

export class SeenCache {
  private readonly config: SeenCacheConfig;
  private readonly segments = new Map<number, Set<string>>();

  constructor(config: Partial<SeenCacheConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  has(userId: number, url: string): boolean {
    return this.segments.get(userId)?.has(url) ?? false;
  }

  /**
   * Record a URL for a user. A full segment is cleared first: old dedup
   * history is dropped rather than letting the segment grow.
   */
  add(userId: number, url: string): void {
    let segment = this.segments.get(userId);
    if (!segment) {
      segment = new Set();
      this.segments.set(userId, segment);
    }
    if (segment.has(url)) {
      return;
    }
    if (segment.size >= this.config.maxEntriesPerUser) {
      segment.clear();
    }
    segment.add(url);
  }

  clearUser(userId: number): void {
    this.segments.delete(userId);
  }

  sizeFor(userId: number): number {
    return this.segments.get(userId)?.size ?? 0;
  }

  get totalSize(): number {
    let total = 0;
    for (const segment of this.segments.values()) {
      total += segment.size;
    }
    return total;
  }
}

export function createSeenCache(config?: Partial<SeenCacheConfig>): SeenCache {
  return new SeenCache(config);
}
