/**
 * Sent Article Repository
 *
 * Durable ledger of delivered article URLs, one `sent/<userId>` document per
 * user so writes for one user never touch another's file.
 */

import { z } from 'zod';
import type { SeenArticleLedger } from '../ports/index.js';
import type { DocumentStore } from './document.js';

const sentDocumentSchema = z.object({
  /** url -> ISO time of first delivery */
  sent: z.record(z.string(), z.string()),
});

type SentDocument = z.infer<typeof sentDocumentSchema>;

function emptyDocument(): SentDocument {
  return { sent: {} };
}

function sentKey(userId: number): string {
  return `sent/${String(userId)}`;
}

export class SentArticleRepository implements SeenArticleLedger {
  private readonly store: DocumentStore;
  private readonly now: () => Date;

  constructor(store: DocumentStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  async isSent(userId: number, url: string): Promise<boolean> {
    const doc = await this.store.read(sentKey(userId), sentDocumentSchema, emptyDocument);
    return Object.hasOwn(doc.sent, url);
  }

  /**
   * Record a delivery. Repeats keep the original timestamp.
   */
  async markSent(userId: number, url: string): Promise<void> {
    await this.store.update(sentKey(userId), sentDocumentSchema, emptyDocument, (doc) => {
      if (!Object.hasOwn(doc.sent, url)) {
        doc.sent[url] = this.now().toISOString();
      }
    });
  }

  async resetHistory(userId: number): Promise<void> {
    await this.store.remove(sentKey(userId));
  }
}
