/**
 * Subscription Repository
 *
 * Topics are normalized to trimmed lower case and kept per user in
 * insertion order, all in one `subscriptions` document keyed by user id.
 */

import { z } from 'zod';
import {
  DuplicateSubscriptionError,
  InvalidTopicError,
  SubscriptionNotFoundError,
} from '../core/errors.js';
import type { SubscriptionRegistry } from '../ports/index.js';
import type { DocumentStore } from './document.js';

const SUBSCRIPTIONS_KEY = 'subscriptions';

export const MAX_TOPIC_LENGTH = 255;

const subscriptionsDocumentSchema = z.object({
  topics: z.record(z.string(), z.array(z.string())),
});

type SubscriptionsDocument = z.infer<typeof subscriptionsDocumentSchema>;

function emptyDocument(): SubscriptionsDocument {
  return { topics: {} };
}

export function normalizeTopic(topic: string): string {
  return topic.trim().toLowerCase();
}

function validTopic(topic: string): string {
  const normalized = normalizeTopic(topic);
  if (normalized.length === 0) {
    throw new InvalidTopicError('Topic must not be empty');
  }
  if (normalized.length > MAX_TOPIC_LENGTH) {
    throw new InvalidTopicError(`Topic must be at most ${String(MAX_TOPIC_LENGTH)} characters`);
  }
  return normalized;
}

export class SubscriptionRepository implements SubscriptionRegistry {
  private readonly store: DocumentStore;

  constructor(store: DocumentStore) {
    this.store = store;
  }

  /**
   * Subscribe a user to a topic.
   * @returns the normalized topic
   */
  async add(userId: number, topic: string): Promise<string> {
    const normalized = validTopic(topic);
    await this.update((doc) => {
      const topics = doc.topics[String(userId)] ?? [];
      if (topics.includes(normalized)) {
        throw new DuplicateSubscriptionError(normalized);
      }
      doc.topics[String(userId)] = [...topics, normalized];
    });
    return normalized;
  }

  async remove(userId: number, topic: string): Promise<void> {
    const normalized = normalizeTopic(topic);
    await this.update((doc) => {
      const topics = doc.topics[String(userId)] ?? [];
      if (!topics.includes(normalized)) {
        throw new SubscriptionNotFoundError(normalized);
      }
      const remaining = topics.filter((t) => t !== normalized);
      if (remaining.length === 0) {
        delete doc.topics[String(userId)];
      } else {
        doc.topics[String(userId)] = remaining;
      }
    });
  }

  async listTopics(userId: number): Promise<string[]> {
    const doc = await this.read();
    return [...(doc.topics[String(userId)] ?? [])];
  }

  async listAllUniqueTopics(): Promise<string[]> {
    const doc = await this.read();
    return [...new Set(Object.values(doc.topics).flat())];
  }

  async listSubscribersForTopic(topic: string): Promise<number[]> {
    const normalized = normalizeTopic(topic);
    const doc = await this.read();
    return Object.entries(doc.topics)
      .filter(([, topics]) => topics.includes(normalized))
      .map(([userId]) => Number(userId));
  }

  /**
   * Lower-case legacy topics and drop entries that collapse into duplicates.
   * @returns number of users whose topic list changed
   */
  async normalizeStoredTopics(): Promise<number> {
    return this.update((doc) => {
      let changed = 0;
      for (const [userId, topics] of Object.entries(doc.topics)) {
        const normalized = [...new Set(topics.map(normalizeTopic).filter((t) => t.length > 0))];
        if (
          normalized.length !== topics.length ||
          normalized.some((t, i) => t !== topics[i])
        ) {
          doc.topics[userId] = normalized;
          changed++;
        }
      }
      return changed;
    });
  }

  private read(): Promise<SubscriptionsDocument> {
    return this.store.read(SUBSCRIPTIONS_KEY, subscriptionsDocumentSchema, emptyDocument);
  }

  private update<R>(mutate: (doc: SubscriptionsDocument) => R): Promise<R> {
    return this.store.update(SUBSCRIPTIONS_KEY, subscriptionsDocumentSchema, emptyDocument, mutate);
  }
}
