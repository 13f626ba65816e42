import { access, copyFile, mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';
import { errorMessage, isErrnoError } from '../core/errors.js';

/**
 * Configuration for JSONStorage.
 */
export interface JSONStorageConfig {
  /** Base directory for storage files */
  basePath: string;
  /** Keep the previous version as `<key>.backup.json` (default: true) */
  createBackup?: boolean;
  /** Logger for warnings/errors (optional) */
  logger?: Logger;
}

const EXTENSION = '.json';

/**
 * JSON file-based storage.
 *
 * - One file per key, nested keys become subdirectories
 * - Atomic writes (temp file + rename); the primary file never goes missing
 * - Previous version copied to a backup and used when the primary is unparsable
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly logger: Logger | undefined;

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.logger = config.logger?.child({ component: 'json-storage' });
  }

  private getPath(key: string): string {
    return join(this.basePath, `${key}${EXTENSION}`);
  }

  private getBackupPath(key: string): string {
    return join(this.basePath, `${key}.backup${EXTENSION}`);
  }

  private getTempPath(key: string): string {
    return join(this.basePath, `${key}.tmp${EXTENSION}`);
  }

  async load(key: string): Promise<unknown> {
    try {
      const content = await readFile(this.getPath(key), 'utf-8');
      const data: unknown = JSON.parse(content);
      return data;
    } catch (error) {
      if (isErrnoError(error, 'ENOENT')) {
        return null;
      }

      if (error instanceof SyntaxError) {
        const backup = await this.loadBackup(key);
        if (backup !== null) {
          this.logger?.warn({ key }, 'Primary file corrupted, loaded from backup');
          return backup;
        }
      }

      throw error;
    }
  }

  private async loadBackup(key: string): Promise<unknown> {
    try {
      const content = await readFile(this.getBackupPath(key), 'utf-8');
      const data: unknown = JSON.parse(content);
      return data;
    } catch {
      return null;
    }
  }

  async save(key: string, data: unknown): Promise<void> {
    const path = this.getPath(key);
    const tempPath = this.getTempPath(key);

    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');

    if (this.createBackup && (await this.exists(key))) {
      try {
        await copyFile(path, this.getBackupPath(key));
      } catch (error) {
        this.logger?.warn({ key, error: errorMessage(error) }, 'Backup copy failed');
      }
    }

    await rename(tempPath, path);
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.getPath(key));
      return true;
    } catch (error) {
      if (isErrnoError(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.getPath(key));
      return true;
    } catch {
      return false;
    }
  }
}

export function createJSONStorage(basePath: string, logger?: Logger): JSONStorage {
  const config: JSONStorageConfig = { basePath };
  if (logger) {
    config.logger = logger;
  }
  return new JSONStorage(config);
}
