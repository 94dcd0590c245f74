/**
 * FileSystemCacheStore
 *
 * Filesystem-based implementation of CacheStore.
 * Stores one JSON envelope per key under {baseDir}/{key}.json so cached handles and
 * model responses survive across command invocations.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { CacheEntry, CacheStats, CacheStore, GetOrCreateOptions, GetOrCreateResult, TtlPolicy } from './types.js';
import { DEFAULT_TTL_POLICY, TtlClass } from './types.js';
import { KeyedMutex } from '../../utils/concurrency.js';
import { logger } from '../../utils/logger.js';
import { getErrorCode } from '../../types/errors.js';

const SAFE_KEY = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

const envelopeSchema = z.object({
  key: z.string(),
  createdAt: z.string().datetime(),
  ttlClass: z.nativeEnum(TtlClass),
  value: z.unknown(),
});

export interface FileSystemCacheStoreOptions {
  /** Base directory for cache entries (default: ./cache) */
  baseDir?: string;
  /** Lifetime per TTL class */
  ttlPolicy?: Partial<TtlPolicy>;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

export class FileSystemCacheStore implements CacheStore {
  private readonly baseDir: string;
  private readonly ttlPolicy: TtlPolicy;
  private readonly now: () => number;
  private readonly locks = new KeyedMutex();
  private readonly stats: CacheStats = { hits: 0, misses: 0, expired: 0, corrupt: 0, writes: 0 };

  constructor(options: FileSystemCacheStoreOptions = {}) {
    this.baseDir = options.baseDir || join(process.cwd(), 'cache');
    this.ttlPolicy = { ...DEFAULT_TTL_POLICY, ...options.ttlPolicy };
    this.now = options.now ?? Date.now;
  }

  async get<T>(key: string, schema: z.ZodType<T>): Promise<CacheEntry<T> | undefined> {
    const filePath = this.pathFor(key);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (getErrorCode(error) !== 'ENOENT') {
        this.recordCorruption(key, error);
      } else {
        this.stats.misses++;
      }
      return undefined;
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (error) {
      this.recordCorruption(key, error);
      return undefined;
    }

    const envelope = envelopeSchema.safeParse(parsedJson);
    if (!envelope.success || envelope.data.key !== key) {
      this.recordCorruption(key, envelope.success ? 'key mismatch' : envelope.error.message);
      return undefined;
    }

    const value = schema.safeParse(envelope.data.value);
    if (!value.success) {
      this.recordCorruption(key, value.error.message);
      return undefined;
    }

    const entry: CacheEntry<T> = {
      key,
      value: value.data,
      createdAt: Date.parse(envelope.data.createdAt),
      ttlClass: envelope.data.ttlClass,
    };

    if (!this.isFresh(entry)) {
      this.stats.expired++;
      this.stats.misses++;
      logger.debug({ key, ttlClass: entry.ttlClass, ageMs: this.now() - entry.createdAt }, 'Cache entry expired');
      return undefined;
    }

    this.stats.hits++;
    return entry;
  }

  async put<T>(key: string, value: T, ttlClass: TtlClass): Promise<CacheEntry<T>> {
    const filePath = this.pathFor(key);
    const entry: CacheEntry<T> = { key, value, createdAt: this.now(), ttlClass };
    const envelope = {
      key,
      createdAt: new Date(entry.createdAt).toISOString(),
      ttlClass,
      value,
    };

    // Write atomically (write to temp file, then rename)
    const tempPath = `${filePath}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(envelope, null, 2), 'utf8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    this.stats.writes++;
    logger.debug({ key, ttlClass }, 'Cache entry stored');
    return entry;
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
    logger.debug({ key }, 'Cache entry evicted');
  }

  async getOrCreate<T>(
    key: string,
    ttlClass: TtlClass,
    schema: z.ZodType<T>,
    factory: () => Promise<T>,
    options: GetOrCreateOptions<T> = {}
  ): Promise<GetOrCreateResult<T>> {
    return this.locks.runExclusive(key, async () => {
      const existing = await this.get(key, schema);
      if (existing && !options.isStale?.(existing.value)) {
        return { value: existing.value, created: false };
      }
      if (existing) {
        logger.debug({ key }, 'Replacing stale cache entry');
      }

      const value = await factory();
      try {
        await this.put(key, value, ttlClass);
      } catch (error) {
        // The value is still good; only reuse across runs is lost
        logger.warn({ key, error: error instanceof Error ? error.message : String(error) }, 'Failed to persist cache entry');
      }
      return { value, created: true };
    });
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  /**
   * Entry is valid iff its age is strictly below the class lifetime
   */
  private isFresh(entry: CacheEntry<unknown>): boolean {
    const ttl = this.ttlPolicy[entry.ttlClass];
    if (ttl === Infinity) {
      return true;
    }
    return this.now() - entry.createdAt < ttl;
  }

  private recordCorruption(key: string, reason: unknown): void {
    this.stats.corrupt++;
    this.stats.misses++;
    logger.debug(
      { key, reason: reason instanceof Error ? reason.message : String(reason) },
      'Unreadable cache entry treated as miss'
    );
  }

  private pathFor(key: string): string {
    if (!SAFE_KEY.test(key)) {
      throw new TypeError(`Invalid cache key: ${key}`);
    }
    return join(this.baseDir, `${key}.json`);
  }
}
