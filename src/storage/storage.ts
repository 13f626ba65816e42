/**
 * Key/value storage port.
 *
 * Keys may contain `/` to group documents (`sent/42`). Implementations map
 * each key to one document.
 */
export interface Storage {
  /**
   * Load data by key.
   * @returns The data if found, null otherwise
   */
  load(key: string): Promise<unknown>;

  /**
   * Replace the document stored under a key.
   */
  save(key: string, data: unknown): Promise<void>;

  /**
   * Delete data by key.
   * @returns true if deleted, false if key didn't exist
   */
  delete(key: string): Promise<boolean>;

  exists(key: string): Promise<boolean>;
}
