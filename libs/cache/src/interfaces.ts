/**
 * Cache interfaces and types
 */
import type { ZodType } from 'zod';

/**
 * Cache backend type
 */
export type CacheBackend = 'memory' | 'redis';

/**
 * Condition under which a write executes
 */
export type When = 'always' | 'exists' | 'not-exists';

/**
 * How the pattern scanner enumerates keys and fields
 * - `auto`: cursor sweep, downgrading to a full listing if the store lacks it
 * - `scan`: cursor sweep only
 * - `keys`: full listing only
 */
export type ScanStrategy = 'auto' | 'scan' | 'keys';

/**
 * Logger interface for cache operations
 */
export interface CacheLogger {
  info: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  debug?: (msg: string, meta?: Record<string, unknown>) => void;
}

/**
 * Serializes values to the store's string representation
 */
export interface ValueCodec {
  encode(value: unknown): string;
  decode<T>(raw: string, schema?: ZodType<T>): T;
}

export type ProduceOutcome = 'success' | 'error';

/**
 * Hooks for exporting cache activity (see @tagcache/metrics)
 */
export interface CacheInstrumentation {
  recordHit(operation: string): void;
  recordMiss(operation: string): void;
  recordProduce(operation: string, seconds: number, outcome: ProduceOutcome): void;
  recordPrune(count: number): void;
}

/**
 * Cache configuration
 */
export interface CacheConfig {
  /** Cache backend to use */
  backend: CacheBackend;

  /** Default time-to-live in seconds (optional, entries never expire without it) */
  ttl?: number;

  /** Key prefix for all cache keys (optional) */
  prefix?: string;

  /**
   * Prefix of the tag index keys, inside the key prefix (default: "$tag$:").
   * Keys starting with it are left out of pattern queries.
   */
  tagKeyPrefix?: string;

  /** Pattern scan strategy (default: auto) */
  scanStrategy?: ScanStrategy;

  /** Hint for how many keys each cursor step returns (default: 250) */
  scanCount?: number;

  /** Redis connection options (required for redis backend) */
  redis?: {
    url?: string;
    host?: string;
    port?: number;
    password?: string;
    db?: number;
  };

  /** Memory store options (for memory backend) */
  memory?: {
    /** Expired entry sweep interval in milliseconds (0 disables the sweep) */
    cleanupIntervalMs?: number;
    /** Whether cursor scans are available (default: true) */
    supportsScan?: boolean;
  };

  logger?: CacheLogger;

  instrumentation?: CacheInstrumentation;

  /** Value codec (default: JsonCodec) */
  codec?: ValueCodec;
}

/**
 * Factory configuration for cache creation
 */
export type CacheFactoryConfig = CacheConfig;

/**
 * Options of a single primitive string write
 */
export interface StoreSetOptions {
  /** Time-to-live in milliseconds */
  ttlMs?: number;
  when?: When;
}

/**
 * Result page of a cursor sweep. A cursor of "0" marks the end.
 */
export interface ScanPage<T> {
  cursor: string;
  items: T[];
}

/**
 * Primitive commands of the backing store, over raw (already prefixed) keys
 * and encoded values. Implemented by RedisStore and MemoryStore.
 */
export interface CacheStore {
  readonly backend: CacheBackend;

  get(key: string): Promise<string | null>;
  /** @returns true if the write happened */
  set(key: string, value: string, options?: StoreSetOptions): Promise<boolean>;
  getSet(key: string, value: string): Promise<string | null>;
  exists(key: string): Promise<boolean>;
  del(keys: string[]): Promise<number>;

  expireAt(key: string, at: Date): Promise<boolean>;
  pexpire(key: string, ttlMs: number): Promise<boolean>;
  /** Remaining time-to-live in milliseconds, or null without key or expiry */
  pttl(key: string): Promise<number | null>;
  persist(key: string): Promise<boolean>;

  hget(key: string, field: string): Promise<string | null>;
  hset(key: string, field: string, value: string, when?: When): Promise<boolean>;
  hsetMany(key: string, entries: Array<[string, string]>): Promise<void>;
  hmget(key: string, fields: string[]): Promise<Array<string | null>>;
  hgetall(key: string): Promise<Record<string, string>>;
  hdel(key: string, field: string): Promise<boolean>;
  hexists(key: string, field: string): Promise<boolean>;

  sadd(key: string, members: string[]): Promise<number>;
  srem(key: string, members: string[]): Promise<number>;
  sismember(key: string, member: string): Promise<boolean>;
  smembers(key: string): Promise<string[]>;

  /**
   * In one atomic step, make the set at `reverseKey` hold exactly `tags`,
   * removing `member` from `<tagKeyPrefix><tag>` for every tag it drops and
   * adding it for every tag in `tags`
   */
  replaceTags(reverseKey: string, member: string, tagKeyPrefix: string, tags: string[]): Promise<void>;

  zadd(key: string, score: number, member: string): Promise<boolean>;
  zrem(key: string, member: string): Promise<boolean>;
  zscore(key: string, member: string): Promise<number | null>;

  /** @returns true if the approximated cardinality changed */
  pfadd(key: string, items: string[]): Promise<boolean>;
  pfcount(key: string): Promise<number>;

  /** Full listing of keys matching a glob */
  keys(pattern: string): Promise<string[]>;
  scan(cursor: string, pattern: string, count: number): Promise<ScanPage<string>>;
  hscan(
    key: string,
    cursor: string,
    pattern: string,
    count: number
  ): Promise<ScanPage<[string, string]>>;

  dbSize(): Promise<number>;
  flushAll(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Kind of structure a tag entry points into
 */
export type TagEntryKind = 'string' | 'hash-field' | 'set-member' | 'sorted-set-member';

/**
 * Non-owning reference from a tag to a cached value
 */
export interface TagEntry {
  kind: TagEntryKind;
  /** Top-level key, without the cache prefix */
  key: string;
  /** Encoded hash field or set member (absent for string keys) */
  member?: string;
}

/**
 * Fixed tag list, or tags derived from a freshly produced value
 */
export type TagSource<T> = readonly string[] | ((value: T) => readonly string[]);

/**
 * Result of a lookup that distinguishes a stored value from a miss
 */
export type Lookup<T> = { found: true; value: T } | { found: false };

/**
 * Options of a typed write
 */
export interface WriteOptions {
  /** Time-to-live in seconds, applied to the whole key */
  ttl?: number;
  when?: When;
  /** Replaces the entry's tags. Omit to leave existing tags untouched. */
  tags?: readonly string[];
}

/**
 * Cache-aside pattern helper options
 */
export interface FetchOptions<T> {
  /** Time-to-live in seconds (optional) */
  ttl?: number;
  /** Tags to associate on a miss; ignored on a hit */
  tags?: TagSource<T>;
  /** Validates the cached value on a hit */
  schema?: ZodType<T>;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  /** Total cache operations */
  operations: number;
  /** Number of cache hits */
  hits: number;
  /** Number of cache misses */
  misses: number;
  /** Hit rate (0-1) */
  hitRate: number;
  /** Number of keys currently in the store */
  size: number;
}
