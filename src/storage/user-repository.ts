/**
 * User Repository
 *
 * All users live in one `users` document. Internal ids are assigned
 * incrementally from 1; the Telegram id is the delivery destination.
 */

import { z } from 'zod';
import { UserNotFoundError } from '../core/errors.js';
import type { UserDirectory } from '../ports/index.js';
import type { User, UserProfile } from '../types/user.js';
import type { DocumentStore } from './document.js';

const USERS_KEY = 'users';

export const DEFAULT_INTERVAL_MINUTES = 60;
export const DEFAULT_NEWS_LIMIT = 5;

const storedUserSchema = z.object({
  id: z.number().int().positive(),
  telegramId: z.number().int(),
  username: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  intervalMinutes: z.number().int(),
  newsLimit: z.number().int(),
  lastDeliveryAt: z.string().nullable(),
  state: z.string(),
  createdAt: z.string(),
});

const usersDocumentSchema = z.object({
  nextId: z.number().int().positive(),
  users: z.array(storedUserSchema),
});

type StoredUser = z.infer<typeof storedUserSchema>;
type UsersDocument = z.infer<typeof usersDocumentSchema>;

function emptyDocument(): UsersDocument {
  return { nextId: 1, users: [] };
}

function toUser(stored: StoredUser): User {
  return {
    ...stored,
    lastDeliveryAt: stored.lastDeliveryAt ? new Date(stored.lastDeliveryAt) : null,
    createdAt: new Date(stored.createdAt),
  };
}

function findStored(doc: UsersDocument, userId: number): StoredUser {
  const stored = doc.users.find((u) => u.id === userId);
  if (!stored) {
    throw new UserNotFoundError(userId);
  }
  return stored;
}

export class UserRepository implements UserDirectory {
  private readonly store: DocumentStore;
  private readonly now: () => Date;

  constructor(store: DocumentStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  /**
   * Return the user for a Telegram id, registering them on first contact.
   */
  async findOrCreate(telegramId: number, profile: UserProfile = {}): Promise<User> {
    const stored = await this.update((doc) => {
      const existing = doc.users.find((u) => u.telegramId === telegramId);
      if (existing) {
        return existing;
      }
      const created: StoredUser = {
        id: doc.nextId,
        telegramId,
        username: profile.username ?? '',
        firstName: profile.firstName ?? '',
        lastName: profile.lastName ?? '',
        intervalMinutes: DEFAULT_INTERVAL_MINUTES,
        newsLimit: DEFAULT_NEWS_LIMIT,
        lastDeliveryAt: null,
        state: '',
        createdAt: this.now().toISOString(),
      };
      doc.nextId += 1;
      doc.users.push(created);
      return created;
    });
    return toUser(stored);
  }

  async getById(userId: number): Promise<User | null> {
    const doc = await this.read();
    const stored = doc.users.find((u) => u.id === userId);
    return stored ? toUser(stored) : null;
  }

  async listAll(): Promise<User[]> {
    const doc = await this.read();
    return doc.users.map(toUser);
  }

  async updateLastDelivery(userId: number, at: Date): Promise<void> {
    await this.update((doc) => {
      findStored(doc, userId).lastDeliveryAt = at.toISOString();
    });
  }

  async updateInterval(userId: number, minutes: number): Promise<void> {
    if (!Number.isInteger(minutes) || minutes <= 0) {
      throw new RangeError(`Interval must be a positive number of minutes, got ${String(minutes)}`);
    }
    await this.update((doc) => {
      findStored(doc, userId).intervalMinutes = minutes;
    });
  }

  async updateLimit(userId: number, limit: number): Promise<void> {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`News limit must be a positive integer, got ${String(limit)}`);
    }
    await this.update((doc) => {
      findStored(doc, userId).newsLimit = limit;
    });
  }

  async setState(userId: number, state: string): Promise<void> {
    await this.update((doc) => {
      findStored(doc, userId).state = state;
    });
  }

  private read(): Promise<UsersDocument> {
    return this.store.read(USERS_KEY, usersDocumentSchema, emptyDocument);
  }

  private update<R>(mutate: (doc: UsersDocument) => R): Promise<R> {
    return this.store.update(USERS_KEY, usersDocumentSchema, emptyDocument, mutate);
  }
}
