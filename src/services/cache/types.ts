import type { z } from 'zod';

/**
 * Named expiry policies. Each remote resource class gets the lifetime the
 * remote side gives it.
 */
export enum TtlClass {
  /** Model invocation results: never expire */
  PERMANENT = 'permanent',
  /** Uploaded file handles */
  HOURS_48 = 'hours48',
  /** Context caches of example surveys */
  MINUTES_60 = 'minutes60',
}

/**
 * Lifetime in milliseconds per TTL class. `Infinity` never expires.
 */
export type TtlPolicy = Record<TtlClass, number>;

export const HOUR_MS = 60 * 60 * 1000;
export const MINUTE_MS = 60 * 1000;

export const DEFAULT_TTL_POLICY: TtlPolicy = {
  [TtlClass.PERMANENT]: Infinity,
  [TtlClass.HOURS_48]: 48 * HOUR_MS,
  [TtlClass.MINUTES_60]: 60 * MINUTE_MS,
};

export interface CacheEntry<T> {
  key: string;
  value: T;
  /** Epoch milliseconds */
  createdAt: number;
  ttlClass: TtlClass;
}

export interface CacheStats {
  hits: number;
  misses: number;
  expired: number;
  corrupt: number;
  writes: number;
}

export interface GetOrCreateOptions<T> {
  /**
   * Treat a valid entry as absent when this returns true. Evaluated under the key's lock,
   * so a handle that a concurrent caller already replaced is reused instead of replaced twice.
   */
  isStale?: (value: T) => boolean;
}

export interface GetOrCreateResult<T> {
  value: T;
  /** true when `factory` ran, false when an existing entry was reused */
  created: boolean;
}

/**
 * Tiered cache store
 *
 * All implementations must:
 * - Treat an entry as valid iff `now - createdAt < ttl(ttlClass)`
 * - Return a miss (never throw) for absent, expired, unreadable or malformed entries
 * - Leave expired entries in place until overwritten
 * - Run at most one `factory` per key at a time within a process
 */
export interface CacheStore {
  /**
   * @param schema - validates the stored value; a mismatch counts as corruption
   * @returns the entry, or undefined on a miss
   */
  get<T>(key: string, schema: z.ZodType<T>): Promise<CacheEntry<T> | undefined>;

  put<T>(key: string, value: T, ttlClass: TtlClass): Promise<CacheEntry<T>>;

  /**
   * Remove an entry. Removing an absent key is not an error.
   */
  delete(key: string): Promise<void>;

  /**
   * Return the valid entry for `key`, or create it with `factory` while holding the key's lock.
   * Concurrent callers for the same key wait for the first one and reuse its entry.
   */
  getOrCreate<T>(
    key: string,
    ttlClass: TtlClass,
    schema: z.ZodType<T>,
    factory: () => Promise<T>,
    options?: GetOrCreateOptions<T>
  ): Promise<GetOrCreateResult<T>>;

  getStats(): CacheStats;
}
