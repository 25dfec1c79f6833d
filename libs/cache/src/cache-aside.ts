/**
 * Cache-aside pattern helpers
 * Fetch from the cache, and on a miss compute, store and tag the value
 */
import type { ZodType } from 'zod';
import type {
  CacheInstrumentation,
  FetchOptions,
  Lookup,
  TagSource,
  WriteOptions,
} from './interfaces.js';

/**
 * The reads and writes cache-aside needs; implemented by CacheProvider
 */
export interface CacheAsideTarget {
  readonly instrumentation?: CacheInstrumentation;
  tryGetObject<T>(key: string, schema?: ZodType<T>): Promise<Lookup<T>>;
  setObject<T>(key: string, value: T, options?: WriteOptions): Promise<boolean>;
  tryGetHashed<T>(key: string, field: unknown, schema?: ZodType<T>): Promise<Lookup<T>>;
  setHashed<T>(key: string, field: unknown, value: T, options?: WriteOptions): Promise<boolean>;
}

export type Producer<T> = () => T | Promise<T>;

export interface CacheAsideOptions<T> extends FetchOptions<T> {
  /** Cache key */
  key: string;
  /** Function to fetch data on a cache miss */
  fetch: Producer<T>;
}

export interface HashedCacheAsideOptions<T> extends CacheAsideOptions<T> {
  /** Hash field under `key` */
  field: unknown;
}

/**
 * Normalize a tag source into a tag list for `value`
 */
export function resolveTags<T>(tags: TagSource<T> | undefined, value: T): readonly string[] | undefined {
  if (tags === undefined) {
    return undefined;
  }
  return typeof tags === 'function' ? tags(value) : tags;
}

async function produce<T>(
  target: CacheAsideTarget,
  operation: string,
  fetch: Producer<T>
): Promise<T> {
  const startedAt = Date.now();
  try {
    const value = await fetch();
    target.instrumentation?.recordProduce(operation, (Date.now() - startedAt) / 1000, 'success');
    return value;
  } catch (error) {
    target.instrumentation?.recordProduce(operation, (Date.now() - startedAt) / 1000, 'error');
    throw error;
  }
}

/**
 * Cache-aside pattern implementation
 *
 * On a hit the stored value is returned and `fetch`, `tags` and `ttl` are
 * ignored. On a miss `fetch` runs once; if it throws nothing is written.
 * Concurrent misses are not coalesced, so the last write wins.
 *
 * @example
 * ```typescript
 * const user = await cacheAside(cache, {
 *   key: `user:${userId}`,
 *   fetch: () => db.getUser(userId),
 *   tags: (user) => [`org:${user.orgId}`],
 *   ttl: 3600,
 * });
 * ```
 */
export async function cacheAside<T>(
  cache: CacheAsideTarget,
  options: CacheAsideOptions<T>
): Promise<T> {
  const { key, fetch, ttl, tags, schema } = options;

  const cached = await cache.tryGetObject<T>(key, schema);
  if (cached.found) {
    return cached.value;
  }

  const data = await produce(cache, 'fetchObject', fetch);
  await cache.setObject(key, data, { ttl, tags: resolveTags(tags, data) });

  return data;
}

/**
 * Cache-aside over a single hash field; `ttl` applies to the whole hash
 */
export async function cacheAsideHashed<T>(
  cache: CacheAsideTarget,
  options: HashedCacheAsideOptions<T>
): Promise<T> {
  const { key, field, fetch, ttl, tags, schema } = options;

  const cached = await cache.tryGetHashed<T>(key, field, schema);
  if (cached.found) {
    return cached.value;
  }

  const data = await produce(cache, 'fetchHashed', fetch);
  await cache.setHashed(key, field, data, { ttl, tags: resolveTags(tags, data) });

  return data;
}

/**
 * Cached function wrapper
 * Wraps a function to automatically cache its results
 *
 * @example
 * ```typescript
 * const getUserById = cachedFunction(
 *   cache,
 *   (userId: string) => `user:${userId}`,
 *   (userId: string) => db.getUser(userId),
 *   { ttl: 3600, tags: ['users'] }
 * );
 * ```
 */
export function cachedFunction<TArgs extends unknown[], TReturn>(
  cache: CacheAsideTarget,
  keyGenerator: (...args: TArgs) => string,
  fn: (...args: TArgs) => TReturn | Promise<TReturn>,
  options: FetchOptions<TReturn> = {}
): (...args: TArgs) => Promise<TReturn> {
  return async (...args: TArgs): Promise<TReturn> => {
    const key = keyGenerator(...args);

    return cacheAside(cache, {
      ...options,
      key,
      fetch: () => fn(...args),
    });
  };
}
