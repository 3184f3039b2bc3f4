/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Cohort reports are re-read over the same (start, end) ranges; their results
 *   live in an externalized cache.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
}
