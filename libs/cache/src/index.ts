/**
 * @tagcache/cache - Tag-indexed caching library
 *
 * Provides typed cache operations over a key-value store:
 * - Redis store for production (ioredis)
 * - Memory store for development and tests
 *
 * Features:
 * - Cache-aside (fetch-or-compute) helpers
 * - Strings, hash fields, sets, sorted sets and HyperLogLogs
 * - Tags on keys, hash fields and set members, checked for liveness on read
 * - Glob pattern scans over keys and hash fields
 *
 * @example
 * ```typescript
 * import { createCacheProviderFromEnv } from '@tagcache/cache';
 *
 * const cache = createCacheProviderFromEnv();
 *
 * const cart = await cache.fetchHashed('cart:1', 'sku:42', () => loadLine(1, 42), {
 *   tags: ['sale'],
 *   ttl: 600,
 * });
 *
 * await cache.isHashFieldInTag('cart:1', 'sku:42', 'sale'); // true
 * await cache.invalidateTags('sale');
 * ```
 */

// Core interfaces
export type {
  CacheBackend,
  CacheConfig,
  CacheFactoryConfig,
  CacheInstrumentation,
  CacheLogger,
  CacheStats,
  CacheStore,
  FetchOptions,
  Lookup,
  ProduceOutcome,
  ScanPage,
  ScanStrategy,
  StoreSetOptions,
  TagEntry,
  TagEntryKind,
  TagSource,
  ValueCodec,
  When,
  WriteOptions,
} from './interfaces.js';

export {
  CacheError,
  CapabilityMismatchError,
  OptionValidationError,
  SerializationError,
  StoreConnectivityError,
} from './errors.js';

// Stores
export { MemoryStore } from './memory-store.js';
export { RedisStore } from './redis-store.js';

export { JsonCodec, encodeField } from './codec.js';
export { globToRegExp } from './glob.js';
export { KeySpace } from './keyspace.js';
export { PatternScanner, type PatternScannerOptions } from './pattern-scanner.js';
export { TagIndex, type TagIndexOptions } from './tag-index.js';
export { CacheProvider, type ProviderOptions } from './cache-provider.js';

// Factory
export {
  configFromEnv,
  createCacheProvider,
  createCacheProviderFromEnv,
  createStore,
  pinoCacheLogger,
  withCacheProvider,
} from './factory.js';

// Cache-aside pattern helpers
export {
  cacheAside,
  cacheAsideHashed,
  cachedFunction,
  resolveTags,
  type CacheAsideOptions,
  type CacheAsideTarget,
  type HashedCacheAsideOptions,
  type Producer,
} from './cache-aside.js';
