import * as fs from 'fs-extra';
import { readJsonSafeAsync, writeJsonAtomic } from '../storage/jsonStore';
import { logger } from '../utils/logger';

export interface CacheEntry<T> {
  payload: T;
  createdAt: number;        // epoch ms
  ttlMs: number;
}

/**
 * Backing store for a single named cache entry. Writes replace the whole entry.
 */
export interface CacheStore<T> {
  readonly description: string;
  read(): Promise<CacheEntry<T> | null>;
  write(entry: CacheEntry<T>): Promise<void>;
  clear(): Promise<void>;
}

export class MemoryCacheStore<T> implements CacheStore<T> {
  readonly description = 'memory';
  private entry: CacheEntry<T> | null = null;

  async read(): Promise<CacheEntry<T> | null> {
    return this.entry;
  }

  async write(entry: CacheEntry<T>): Promise<void> {
    this.entry = entry;
  }

  async clear(): Promise<void> {
    this.entry = null;
  }
}

/**
 * JSON file store. The file is read once and mirrored in memory afterwards,
 * so hits cost no I/O; writes go through an atomic rename.
 */
export class FileCacheStore<T> implements CacheStore<T> {
  readonly description: string;
  private mirror: CacheEntry<T> | null = null;
  private loaded = false;
  // Bumped by write/clear so a slower first load cannot overwrite newer state
  private generation = 0;

  constructor(
    private readonly filePath: string,
    private readonly isPayload: (value: unknown) => value is T
  ) {
    this.description = `file:${filePath}`;
  }

  private isEntry = (value: unknown): value is CacheEntry<T> | null => {
    if (value === null) return true;
    if (!value || typeof value !== 'object') return false;
    return 'createdAt' in value && typeof value.createdAt === 'number'
      && 'ttlMs' in value && typeof value.ttlMs === 'number'
      && 'payload' in value && this.isPayload(value.payload);
  };

  async read(): Promise<CacheEntry<T> | null> {
    if (!this.loaded) {
      const startedAt = this.generation;
      const fromDisk = await readJsonSafeAsync<CacheEntry<T> | null>(this.filePath, null, this.isEntry);
      if (this.generation !== startedAt) {
        return fromDisk;
      }
      this.mirror = fromDisk;
      this.loaded = true;
      if (fromDisk) {
        logger.debug(`Loaded cache entry from ${this.filePath} (created ${new Date(fromDisk.createdAt).toISOString()})`);
      }
    }
    return this.mirror;
  }

  async write(entry: CacheEntry<T>): Promise<void> {
    this.generation++;
    await writeJsonAtomic(this.filePath, entry);
    this.mirror = entry;
    this.loaded = true;
  }

  async clear(): Promise<void> {
    this.generation++;
    this.mirror = null;
    this.loaded = true;
    await fs.remove(this.filePath);
  }
}
