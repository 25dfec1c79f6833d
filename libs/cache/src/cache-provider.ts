/**
 * Typed cache operations over a CacheStore
 *
 * Values go through the codec, keys through the configured prefix, and tags
 * through the TagIndex. Writes that carry tags replace the entry's previous
 * tags, but only when the value write actually happened.
 */
import type { ZodType } from 'zod';
import { cacheAside, cacheAsideHashed, type CacheAsideTarget, type Producer } from './cache-aside.js';
import { JsonCodec, encodeField } from './codec.js';
import { OptionValidationError } from './errors.js';
import type {
  CacheConfig,
  CacheInstrumentation,
  CacheLogger,
  CacheStats,
  CacheStore,
  FetchOptions,
  Lookup,
  TagEntry,
  ValueCodec,
  When,
  WriteOptions,
} from './interfaces.js';
import { KeySpace } from './keyspace.js';
import { PatternScanner } from './pattern-scanner.js';
import { TagIndex } from './tag-index.js';

export type ProviderOptions = Omit<CacheConfig, 'backend' | 'redis' | 'memory'>;

export class CacheProvider implements CacheAsideTarget {
  readonly instrumentation?: CacheInstrumentation;
  readonly tags: TagIndex;

  private readonly codec: ValueCodec;
  private readonly keySpace: KeySpace;
  private readonly scanner: PatternScanner;
  private readonly defaultTtl?: number;
  private readonly logger?: CacheLogger;
  private _stats = {
    operations: 0,
    hits: 0,
    misses: 0,
  };

  constructor(
    readonly store: CacheStore,
    options: ProviderOptions = {}
  ) {
    if (options.ttl !== undefined) {
      this.toMs(options.ttl);
    }

    this.defaultTtl = options.ttl;
    this.codec = options.codec ?? new JsonCodec();
    this.keySpace = new KeySpace(options.prefix);
    this.logger = options.logger;
    this.instrumentation = options.instrumentation;
    this.scanner = new PatternScanner(store, {
      strategy: options.scanStrategy,
      count: options.scanCount,
      logger: options.logger,
    });
    this.tags = new TagIndex(store, {
      keySpace: this.keySpace,
      tagKeyPrefix: options.tagKeyPrefix,
      scanner: this.scanner,
      logger: options.logger,
      instrumentation: options.instrumentation,
    });
  }

  private toMs(ttl: number): number {
    if (!Number.isFinite(ttl) || ttl <= 0) {
      throw new OptionValidationError(`TTL must be a positive number of seconds, got ${ttl}`);
    }
    return Math.max(1, Math.round(ttl * 1000));
  }

  private ttlMs(ttl?: number): number | undefined {
    const seconds = ttl ?? this.defaultTtl;
    return seconds === undefined ? undefined : this.toMs(seconds);
  }

  private track<T>(operation: string, lookup: Lookup<T>): Lookup<T> {
    this._stats.operations++;
    if (lookup.found) {
      this._stats.hits++;
      this.instrumentation?.recordHit(operation);
    } else {
      this._stats.misses++;
      this.instrumentation?.recordMiss(operation);
    }
    return lookup;
  }

  private decode<T>(raw: string | null, schema?: ZodType<T>): Lookup<T> {
    return raw === null ? { found: false } : { found: true, value: this.codec.decode(raw, schema) };
  }

  private async retag(entry: TagEntry, written: boolean, tags?: readonly string[]): Promise<void> {
    if (written && tags !== undefined) {
      await this.tags.associate(entry, tags);
    }
  }

  // --- Fetch-or-compute -------------------------------------------------

  /**
   * Return the value at `key`, or compute, store and tag it on a miss
   */
  async fetchObject<T>(key: string, producer: Producer<T>, options: FetchOptions<T> = {}): Promise<T> {
    return cacheAside(this, { ...options, key, fetch: producer });
  }

  /**
   * Return the value at `key`/`field`, or compute, store and tag it on a miss
   * (the latest ttl applies to the whole hash)
   */
  async fetchHashed<T>(
    key: string,
    field: unknown,
    producer: Producer<T>,
    options: FetchOptions<T> = {}
  ): Promise<T> {
    return cacheAsideHashed(this, { ...options, key, field, fetch: producer });
  }

  // --- Strings ----------------------------------------------------------

  /**
   * Set the value of a key
   * @returns false when `when` rejected the write
   */
  async setObject<T>(key: string, value: T, options: WriteOptions = {}): Promise<boolean> {
    this._stats.operations++;
    const encoded = this.codec.encode(value);
    const written = await this.store.set(this.keySpace.key(key), encoded, {
      ttlMs: this.ttlMs(options.ttl),
      when: options.when,
    });

    await this.retag({ kind: 'string', key }, written, options.tags);
    return written;
  }

  /**
   * Atomically set `key` to `value` and return the previous value
   */
  async getSetObject<T>(key: string, value: T, schema?: ZodType<T>): Promise<T | null> {
    this._stats.operations++;
    const previous = await this.store.getSet(this.keySpace.key(key), this.codec.encode(value));
    const lookup = this.decode(previous, schema);
    return lookup.found ? lookup.value : null;
  }

  async getObject<T>(key: string, schema?: ZodType<T>): Promise<T | null> {
    const lookup = await this.tryGetObject(key, schema);
    return lookup.found ? lookup.value : null;
  }

  async tryGetObject<T>(key: string, schema?: ZodType<T>): Promise<Lookup<T>> {
    const raw = await this.store.get(this.keySpace.key(key));
    return this.track('getObject', this.decode(raw, schema));
  }

  /**
   * Keys matching a glob pattern, without the cache prefix and without the
   * tag index's own keys. Every iteration runs a fresh sweep.
   */
  getKeysByPattern(pattern: string): AsyncIterable<string> {
    const storeKeys = this.scanner.keys(this.keySpace.pattern(pattern));
    const keySpace = this.keySpace;
    const tags = this.tags;

    return {
      async *[Symbol.asyncIterator](): AsyncGenerator<string> {
        for await (const storeKey of storeKeys) {
          const key = keySpace.strip(storeKey);
          if (!tags.isIndexKey(key)) {
            yield key;
          }
        }
      },
    };
  }

  async keyExists(key: string): Promise<boolean> {
    return this.store.exists(this.keySpace.key(key));
  }

  /**
   * Set the expiration of a key to an absolute point in time
   */
  async keyExpire(key: string, expiration: Date): Promise<boolean> {
    return this.store.expireAt(this.keySpace.key(key), expiration);
  }

  /**
   * Set the time-to-live of a key, in seconds
   */
  async setKeyTimeToLive(key: string, ttl: number): Promise<boolean> {
    return this.store.pexpire(this.keySpace.key(key), this.toMs(ttl));
  }

  /**
   * Remaining time-to-live in seconds, or null when the key does not exist
   * or has no expiration
   */
  async keyTimeToLive(key: string): Promise<number | null> {
    const ms = await this.store.pttl(this.keySpace.key(key));
    return ms === null ? null : ms / 1000;
  }

  async keyPersist(key: string): Promise<boolean> {
    return this.store.persist(this.keySpace.key(key));
  }

  async remove(key: string): Promise<boolean> {
    return (await this.store.del([this.keySpace.key(key)])) > 0;
  }

  async removeMany(keys: string[]): Promise<number> {
    return this.store.del(keys.map((key) => this.keySpace.key(key)));
  }

  // --- Hashes -----------------------------------------------------------

  /**
   * Set `field` of the hash at `key` (the latest ttl applies to the whole key)
   */
  async setHashed<T>(key: string, field: unknown, value: T, options: WriteOptions = {}): Promise<boolean> {
    this._stats.operations++;
    const storeKey = this.keySpace.key(key);
    const member = encodeField(this.codec, field);
    const encoded = this.codec.encode(value);
    const ttlMs = this.ttlMs(options.ttl);

    const written = await this.store.hset(storeKey, member, encoded, options.when);
    if (written && ttlMs !== undefined) {
      await this.store.pexpire(storeKey, ttlMs);
    }

    await this.retag({ kind: 'hash-field', key, member }, written, options.tags);
    return written;
  }

  /**
   * Set several fields of the hash at `key`
   * @returns Number of fields written
   */
  async setHashedMany<T>(
    key: string,
    fieldValues: Map<unknown, T> | Record<string, T>,
    options: Omit<WriteOptions, 'tags'> = {}
  ): Promise<number> {
    this._stats.operations++;
    const storeKey = this.keySpace.key(key);
    const source: Array<[unknown, T]> =
      fieldValues instanceof Map ? Array.from(fieldValues) : Object.entries(fieldValues);
    const entries = source.map(([field, value]): [string, string] => [
      encodeField(this.codec, field),
      this.codec.encode(value),
    ]);
    const when: When = options.when ?? 'always';

    let written = entries.length;
    if (when === 'always') {
      await this.store.hsetMany(storeKey, entries);
    } else {
      written = 0;
      for (const [field, value] of entries) {
        if (await this.store.hset(storeKey, field, value, when)) {
          written++;
        }
      }
    }

    const ttlMs = this.ttlMs(options.ttl);
    if (written > 0 && ttlMs !== undefined) {
      await this.store.pexpire(storeKey, ttlMs);
    }
    return written;
  }

  async getHashed<T>(key: string, field: unknown, schema?: ZodType<T>): Promise<T | null> {
    const lookup = await this.tryGetHashed(key, field, schema);
    return lookup.found ? lookup.value : null;
  }

  async tryGetHashed<T>(key: string, field: unknown, schema?: ZodType<T>): Promise<Lookup<T>> {
    const raw = await this.store.hget(this.keySpace.key(key), encodeField(this.codec, field));
    return this.track('getHashed', this.decode(raw, schema));
  }

  /**
   * Values of several fields, positionally aligned with `fields`
   * (null for missing fields)
   */
  async getHashedMany<T>(key: string, fields: unknown[], schema?: ZodType<T>): Promise<Array<T | null>> {
    this._stats.operations++;
    const raw = await this.store.hmget(
      this.keySpace.key(key),
      fields.map((field) => encodeField(this.codec, field))
    );
    return raw.map((value) => (value === null ? null : this.codec.decode(value, schema)));
  }

  async getHashedAll<T>(key: string, schema?: ZodType<T>): Promise<Record<string, T>> {
    this._stats.operations++;
    const raw = await this.store.hgetall(this.keySpace.key(key));
    return Object.fromEntries(
      Object.entries(raw).map(([field, value]) => [field, this.codec.decode(value, schema)])
    );
  }

  /**
   * Field/value pairs of the hash at `key` whose field matches `pattern`;
   * every iteration runs a fresh sweep
   */
  scanHashed<T>(key: string, pattern: string, schema?: ZodType<T>): AsyncIterable<[string, T]> {
    const pairs = this.scanner.fields(this.keySpace.key(key), pattern);
    const codec = this.codec;

    return {
      async *[Symbol.asyncIterator](): AsyncGenerator<[string, T]> {
        for await (const [field, value] of pairs) {
          yield [field, codec.decode(value, schema)];
        }
      },
    };
  }

  async removeHashed(key: string, field: unknown): Promise<boolean> {
    return this.store.hdel(this.keySpace.key(key), encodeField(this.codec, field));
  }

  // --- Sets and sorted sets ---------------------------------------------

  /**
   * Add `value` to the set at `key` (the latest ttl applies to the whole key)
   */
  async addToSet<T>(key: string, value: T, options: Omit<WriteOptions, 'when'> = {}): Promise<boolean> {
    const storeKey = this.keySpace.key(key);
    const member = encodeField(this.codec, value);
    const ttlMs = this.ttlMs(options.ttl);

    const added = (await this.store.sadd(storeKey, [member])) > 0;
    if (ttlMs !== undefined) {
      await this.store.pexpire(storeKey, ttlMs);
    }

    await this.retag({ kind: 'set-member', key, member }, true, options.tags);
    return added;
  }

  /**
   * @returns false if the value was not in the set
   */
  async removeFromSet<T>(key: string, value: T): Promise<boolean> {
    const removed = await this.store.srem(this.keySpace.key(key), [encodeField(this.codec, value)]);
    return removed > 0;
  }

  /**
   * Add `value` to the sorted set at `key` with `score`
   * (the latest ttl applies to the whole key)
   */
  async addToSortedSet<T>(
    key: string,
    score: number,
    value: T,
    options: Omit<WriteOptions, 'when'> = {}
  ): Promise<boolean> {
    const storeKey = this.keySpace.key(key);
    const member = encodeField(this.codec, value);
    const ttlMs = this.ttlMs(options.ttl);

    const added = await this.store.zadd(storeKey, score, member);
    if (ttlMs !== undefined) {
      await this.store.pexpire(storeKey, ttlMs);
    }

    await this.retag({ kind: 'sorted-set-member', key, member }, true, options.tags);
    return added;
  }

  async removeFromSortedSet<T>(key: string, value: T): Promise<boolean> {
    return this.store.zrem(this.keySpace.key(key), encodeField(this.codec, value));
  }

  // --- HyperLogLog ------------------------------------------------------

  /**
   * Add one item, or every item of an array, to the HyperLogLog at `key`
   * @returns true if the approximated cardinality changed
   */
  async hyperLogLogAdd<T>(key: string, items: T | T[]): Promise<boolean> {
    const list = Array.isArray(items) ? items : [items];
    return this.store.pfadd(
      this.keySpace.key(key),
      list.map((item) => encodeField(this.codec, item))
    );
  }

  /**
   * Approximate number of distinct items added to `key` (0 when absent)
   */
  async hyperLogLogCount(key: string): Promise<number> {
    return this.store.pfcount(this.keySpace.key(key));
  }

  // --- Tags -------------------------------------------------------------

  async isStringKeyInTag(key: string, ...tags: string[]): Promise<boolean> {
    return this.tags.isInTag({ kind: 'string', key }, tags);
  }

  async isHashFieldInTag(key: string, field: unknown, ...tags: string[]): Promise<boolean> {
    return this.tags.isInTag({ kind: 'hash-field', key, member: encodeField(this.codec, field) }, tags);
  }

  async isSetMemberInTag(key: string, member: unknown, ...tags: string[]): Promise<boolean> {
    return this.tags.isInTag({ kind: 'set-member', key, member: encodeField(this.codec, member) }, tags);
  }

  async isSortedSetMemberInTag(key: string, member: unknown, ...tags: string[]): Promise<boolean> {
    return this.tags.isInTag(
      { kind: 'sorted-set-member', key, member: encodeField(this.codec, member) },
      tags
    );
  }

  /**
   * Live entries tagged with any of `tags`
   */
  async getTaggedEntries(...tags: string[]): Promise<TagEntry[]> {
    return this.tags.getEntries(tags);
  }

  /**
   * Remove every value tagged with any of `tags`, then the tags themselves
   * @returns Number of values removed
   */
  async invalidateTags(...tags: string[]): Promise<number> {
    const removed = await this.tags.invalidate(tags);
    this.logger?.info('Invalidated cache tags', { tags, removed });
    return removed;
  }

  async getAllTags(): Promise<string[]> {
    return this.tags.listTags();
  }

  // --- Maintenance ------------------------------------------------------

  /**
   * Delete every key of the store, prefixed or not
   */
  async flushAll(): Promise<void> {
    await this.store.flushAll();
  }

  async stats(): Promise<CacheStats> {
    const size = await this.store.dbSize();
    const lookups = this._stats.hits + this._stats.misses;

    return {
      operations: this._stats.operations,
      hits: this._stats.hits,
      misses: this._stats.misses,
      hitRate: lookups > 0 ? this._stats.hits / lookups : 0,
      size,
    };
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}
