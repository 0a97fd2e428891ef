import { mkdir, readFile, writeFile, access, rename } from 'node:fs/promises';
import { join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';

/**
 * Configuration for JSONStorage.
 */
export interface JSONStorageConfig {
  /** Base directory for storage files */
  basePath: string;
  /** Keep the previous version as <key>.backup.json (default: true) */
  createBackup?: boolean;
  /**
   * Answer a corrupt primary file with the backup instead of throwing
   * (default: false). Leave off where the caller must see the corruption.
   */
  recoverFromBackup?: boolean;
  /** Logger for warnings (optional) */
  logger?: Logger;
}

/**
 * JSON file-based storage.
 *
 * - Atomic writes (temp file + rename)
 * - Previous version kept as a backup, optionally read when the primary is corrupt
 * - Directory created on first save
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly recoverFromBackup: boolean;
  private readonly logger: Logger | undefined;

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.recoverFromBackup = config.recoverFromBackup ?? false;
    this.logger = config.logger?.child({ component: 'json-storage' });
  }

  getPath(key: string): string {
    return join(this.basePath, `${key}.json`);
  }

  private getBackupPath(key: string): string {
    return join(this.basePath, `${key}.backup.json`);
  }

  private getTempPath(key: string): string {
    return join(this.basePath, `${key}.tmp.json`);
  }

  async load(key: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(this.getPath(key), 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      if (!this.recoverFromBackup) {
        throw error;
      }
      const backup = await this.loadBackup(key);
      if (backup !== null) {
        this.logger?.warn({ key }, 'Primary file is corrupt, loaded from backup');
        return backup;
      }
      throw error;
    }
  }

  /**
   * Parsed backup, or null when there is none or it is unreadable too.
   */
  private async loadBackup(key: string): Promise<unknown> {
    try {
      const content = await readFile(this.getBackupPath(key), 'utf-8');
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch {
      return null;
    }
  }

  async save(key: string, data: unknown): Promise<void> {
    await mkdir(this.basePath, { recursive: true });

    const path = this.getPath(key);
    const tempPath = this.getTempPath(key);

    await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');

    if (this.createBackup && (await this.exists(key))) {
      try {
        await rename(path, this.getBackupPath(key));
      } catch (error) {
        // The new version is still written; only the safety copy is lost
        this.logger?.warn({ key, error: String(error) }, 'Could not create backup');
      }
    }

    await rename(tempPath, path);
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

/**
 * Factory function for creating JSON storage.
 */
export function createJSONStorage(
  basePath: string,
  options?: Partial<Omit<JSONStorageConfig, 'basePath'>>
): JSONStorage {
  return new JSONStorage({
    basePath,
    ...options,
  });
}
