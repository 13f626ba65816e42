/**
 * Typed JSON document over a Storage key.
 *
 * Reads are validated with a zod schema; updates are read-modify-write
 * sections serialized per key, so concurrent writers never lose changes.
 */

import type { z } from 'zod';
import { KeyedMutex } from '../core/concurrency.js';
import { StorageError } from '../core/errors.js';
import type { Storage } from './storage.js';

export class DocumentStore {
  private readonly storage: Storage;
  private readonly locks = new KeyedMutex<string>();

  constructor(storage: Storage) {
    this.storage = storage;
  }

  /**
   * Load and validate a document. A missing document yields `empty()`.
   */
  async read<S extends z.ZodTypeAny>(
    key: string,
    schema: S,
    empty: () => z.output<S>
  ): Promise<z.output<S>> {
    let raw: unknown;
    try {
      raw = await this.storage.load(key);
    } catch (error) {
      throw new StorageError(key, error);
    }
    if (raw === null) {
      return empty();
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new StorageError(key, result.error);
    }
    return result.data;
  }

  /**
   * Apply `mutate` to the current document and persist the result.
   * `mutate` returns the value handed back to the caller.
   */
  async update<S extends z.ZodTypeAny, R>(
    key: string,
    schema: S,
    empty: () => z.output<S>,
    mutate: (doc: z.output<S>) => R
  ): Promise<R> {
    return this.locks.runExclusive(key, async () => {
      const doc = await this.read(key, schema, empty);
      const result = mutate(doc);
      try {
        await this.storage.save(key, doc);
      } catch (error) {
        throw new StorageError(key, error);
      }
      return result;
    });
  }

  async remove(key: string): Promise<boolean> {
    return this.locks.runExclusive(key, async () => {
      try {
        return await this.storage.delete(key);
      } catch (error) {
        throw new StorageError(key, error);
      }
    });
  }
}
