import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import {
  CacheProvider,
  MemoryStore,
  OptionValidationError,
  SerializationError,
} from '../src/index.js';

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('CacheProvider', () => {
  let store: MemoryStore;
  let cache: CacheProvider;

  beforeEach(() => {
    store = new MemoryStore({ memory: { cleanupIntervalMs: 0 } });
    cache = new CacheProvider(store);
  });

  afterEach(async () => {
    await cache.close();
  });

  describe('strings', () => {
    it('should report a miss for keys never written', async () => {
      expect(await cache.getObject('missing')).toBeNull();
      expect(await cache.tryGetObject('missing')).toEqual({ found: false });
    });

    it('should set and get complex objects', async () => {
      const order = { id: 7, lines: [{ sku: 'sku:42', qty: 3 }], paid: false };

      await cache.setObject('order:7', order);

      expect(await cache.getObject('order:7')).toEqual(order);
      expect(await cache.tryGetObject('order:7')).toEqual({ found: true, value: order });
    });

    it('should distinguish a stored null from a miss', async () => {
      await cache.setObject('nothing', null);

      expect(await cache.tryGetObject('nothing')).toEqual({ found: true, value: null });
    });

    it('should keep the first value when writing with not-exists twice', async () => {
      expect(await cache.setObject('k', 'v1', { when: 'not-exists' })).toBe(true);
      expect(await cache.setObject('k', 'v2', { when: 'not-exists' })).toBe(false);

      expect(await cache.getObject('k')).toBe('v1');
    });

    it('should skip writes with exists on an absent key', async () => {
      expect(await cache.setObject('k', 'v1', { when: 'exists' })).toBe(false);
      expect(await cache.keyExists('k')).toBe(false);

      await cache.setObject('k', 'v1');
      expect(await cache.setObject('k', 'v2', { when: 'exists' })).toBe(true);
      expect(await cache.getObject('k')).toBe('v2');
    });

    it('should return the previous value from getSetObject', async () => {
      await cache.setObject('k', 'v1');

      expect(await cache.getSetObject('k', 'v2')).toBe('v1');
      expect(await cache.getObject('k')).toBe('v2');
    });

    it('should return null from getSetObject on an absent key', async () => {
      expect(await cache.getSetObject('fresh', 1)).toBeNull();
      expect(await cache.getObject('fresh')).toBe(1);
    });

    it('should remove one or many keys', async () => {
      await cache.setObject('a', 1);
      await cache.setObject('b', 2);
      await cache.setObject('c', 3);

      expect(await cache.remove('a')).toBe(true);
      expect(await cache.remove('a')).toBe(false);
      expect(await cache.removeMany(['b', 'c', 'd'])).toBe(2);
      expect(await cache.keyExists('b')).toBe(false);
    });

    it('should validate values against a schema', async () => {
      const user = z.object({ id: z.number(), name: z.string() });
      await cache.setObject('user:1', { id: 1, name: 'Ada' });
      await cache.setObject('user:2', { id: 'two' });

      expect(await cache.getObject('user:1', user)).toEqual({ id: 1, name: 'Ada' });
      await expect(cache.getObject('user:2', user)).rejects.toBeInstanceOf(SerializationError);
    });

    it('should refuse values that cannot be encoded and write nothing', async () => {
      const cyclic: Record<string, unknown> = {};
      cyclic.self = cyclic;

      await expect(cache.setObject('bad', undefined)).rejects.toBeInstanceOf(SerializationError);
      await expect(cache.setObject('bad', cyclic)).rejects.toBeInstanceOf(SerializationError);
      expect(await cache.keyExists('bad')).toBe(false);
    });

    it('should namespace keys with the configured prefix', async () => {
      const prefixed = new CacheProvider(store, { prefix: 'app' });

      await prefixed.setObject('k', 'v');

      expect(await store.get('app:k')).toBe('"v"');
      expect(await cache.getObject('app:k')).toBe('v');
    });
  });

  describe('expiry', () => {
    it('should report a ttl within the requested bound', async () => {
      await cache.setObject('k', 'v', { ttl: 60 });
      const ttl = await cache.keyTimeToLive('k');

      expect(ttl).toBeGreaterThan(0);
      expect(ttl).toBeLessThanOrEqual(60);
    });

    it('should return null ttl for missing keys and keys without expiry', async () => {
      await cache.setObject('forever', 'v');

      expect(await cache.keyTimeToLive('missing')).toBeNull();
      expect(await cache.keyTimeToLive('forever')).toBeNull();
    });

    it('should apply the default ttl from options', async () => {
      const withDefault = new CacheProvider(store, { ttl: 30 });
      await withDefault.setObject('k', 'v');

      const ttl = await withDefault.keyTimeToLive('k');
      expect(ttl).toBeGreaterThan(0);
      expect(ttl).toBeLessThanOrEqual(30);
    });

    it('should set, refresh and remove expirations', async () => {
      await cache.setObject('k', 'v');

      expect(await cache.setKeyTimeToLive('k', 120)).toBe(true);
      expect(await cache.keyTimeToLive('k')).toBeGreaterThan(60);

      expect(await cache.keyExpire('k', new Date(Date.now() + 10_000))).toBe(true);
      expect(await cache.keyTimeToLive('k')).toBeLessThanOrEqual(10);

      expect(await cache.keyPersist('k')).toBe(true);
      expect(await cache.keyTimeToLive('k')).toBeNull();
      expect(await cache.keyPersist('k')).toBe(false);
    });

    it('should report false when expiring a missing key', async () => {
      expect(await cache.setKeyTimeToLive('missing', 10)).toBe(false);
    });

    it('should expire keys after their ttl', async () => {
      await cache.setObject('k', 'v', { ttl: 0.05 }); // 50ms

      expect(await cache.getObject('k')).toBe('v');
      await new Promise((resolve) => setTimeout(resolve, 100));

      expect(await cache.getObject('k')).toBeNull();
    });

    it('should reject non-positive ttls without writing', async () => {
      await expect(cache.setObject('k', 'v', { ttl: 0 })).rejects.toBeInstanceOf(
        OptionValidationError
      );
      expect(await cache.keyExists('k')).toBe(false);
      expect(() => new CacheProvider(store, { ttl: -1 })).toThrow(OptionValidationError);
    });
  });

  describe('hashes', () => {
    it('should apply a field ttl to the whole key and keep siblings on removal', async () => {
      await cache.setHashed('cart:1', 'f1', 'x', { ttl: 60 });
      await cache.setHashed('cart:1', 'f2', 'y');

      const ttl = await cache.keyTimeToLive('cart:1');
      expect(ttl).toBeGreaterThan(0);
      expect(ttl).toBeLessThanOrEqual(60);

      expect(await cache.removeHashed('cart:1', 'f1')).toBe(true);
      expect(await cache.getHashed('cart:1', 'f1')).toBeNull();
      expect(await cache.getHashed('cart:1', 'f2')).toBe('y');
    });

    it('should return aligned values with nulls for missing fields', async () => {
      await cache.setHashed('cart:1', 'sku:42', 3);
      await cache.setHashed('cart:1', 'sku:43', 1);

      expect(await cache.getHashedMany('cart:1', ['sku:43', 'sku:99', 'sku:42'])).toEqual([
        1,
        null,
        3,
      ]);
      expect(await cache.getHashedMany('missing', ['a', 'b'])).toEqual([null, null]);
    });

    it('should return every field, or an empty record for a missing hash', async () => {
      await cache.setHashedMany('cart:1', { 'sku:42': 3, 'sku:43': 1 });

      expect(await cache.getHashedAll('cart:1')).toEqual({ 'sku:42': 3, 'sku:43': 1 });
      expect(await cache.getHashedAll('missing')).toEqual({});
    });

    it('should encode non-string fields', async () => {
      await cache.setHashed('prices', { sku: 42, region: 'eu' }, 9.5);

      expect(await cache.getHashed('prices', { sku: 42, region: 'eu' })).toBe(9.5);
      expect(await store.hget('prices', '{"sku":42,"region":"eu"}')).toBe('9.5');
    });

    it('should honour write conditions on fields', async () => {
      expect(await cache.setHashed('h', 'f', 1, { when: 'exists' })).toBe(false);
      expect(await cache.setHashed('h', 'f', 1, { when: 'not-exists' })).toBe(true);
      expect(await cache.setHashed('h', 'f', 2, { when: 'not-exists' })).toBe(false);
      expect(await cache.setHashed('h', 'f', 3, { when: 'exists' })).toBe(true);

      expect(await cache.getHashed('h', 'f')).toBe(3);
    });

    it('should count written fields in setHashedMany', async () => {
      await cache.setHashed('h', 'a', 1);

      const written = await cache.setHashedMany(
        'h',
        new Map([
          ['a', 10],
          ['b', 20],
        ]),
        { when: 'not-exists', ttl: 30 }
      );

      expect(written).toBe(1);
      expect(await cache.getHashedAll('h')).toEqual({ a: 1, b: 20 });
      expect(await cache.keyTimeToLive('h')).toBeGreaterThan(0);
    });

    it('should scan fields by pattern', async () => {
      await cache.setHashedMany('cart:1', { 'sku:42': 3, 'sku:43': 1, note: 'gift' });

      const fields = await collect(cache.scanHashed('cart:1', 'sku:*'));

      expect(new Map(fields)).toEqual(
        new Map([
          ['sku:42', 3],
          ['sku:43', 1],
        ])
      );
    });

    it('should report tryGetHashed misses', async () => {
      expect(await cache.tryGetHashed('cart:1', 'sku:42')).toEqual({ found: false });
    });
  });

  describe('sets and sorted sets', () => {
    it('should add and remove set members', async () => {
      expect(await cache.addToSet('colors', 'red')).toBe(true);
      expect(await cache.addToSet('colors', 'red')).toBe(false);

      expect(await cache.removeFromSet('colors', 'red')).toBe(true);
      expect(await cache.removeFromSet('colors', 'red')).toBe(false);
    });

    it('should apply a member ttl to the whole set', async () => {
      await cache.addToSet('colors', 'red', { ttl: 45 });

      const ttl = await cache.keyTimeToLive('colors');
      expect(ttl).toBeGreaterThan(0);
      expect(ttl).toBeLessThanOrEqual(45);
    });

    it('should add and remove sorted set members', async () => {
      expect(await cache.addToSortedSet('leaders', 10, 'ada')).toBe(true);
      expect(await cache.addToSortedSet('leaders', 12, 'ada')).toBe(false);
      expect(await store.zscore('leaders', 'ada')).toBe(12);

      expect(await cache.removeFromSortedSet('leaders', 'ada')).toBe(true);
      expect(await cache.removeFromSortedSet('leaders', 'ada')).toBe(false);
    });
  });

  describe('hyperloglog', () => {
    it('should report zero for an absent structure', async () => {
      expect(await cache.hyperLogLogCount('visitors')).toBe(0);
    });

    it('should approximate the number of distinct items', async () => {
      const items = Array.from({ length: 1000 }, (_, i) => `visitor-${i}`);

      expect(await cache.hyperLogLogAdd('visitors', items)).toBe(true);
      const count = await cache.hyperLogLogCount('visitors');

      expect(count).toBeGreaterThanOrEqual(970);
      expect(count).toBeLessThanOrEqual(1030);
    });

    it('should ignore repeated items', async () => {
      await cache.hyperLogLogAdd('visitors', 'ada');

      expect(await cache.hyperLogLogAdd('visitors', 'ada')).toBe(false);
      expect(await cache.hyperLogLogCount('visitors')).toBe(1);
    });
  });

  describe('patterns', () => {
    beforeEach(async () => {
      await cache.setObject('cart:1', 1);
      await cache.setObject('cart:2', 2);
      await cache.setHashed('cart:10', 'sku:42', 3);
      await cache.setObject('user:1', 'ada');
    });

    it('should return exactly the matching keys', async () => {
      const keys = await collect(cache.getKeysByPattern('cart:*'));

      expect(new Set(keys)).toEqual(new Set(['cart:1', 'cart:2', 'cart:10']));
      expect(keys).toHaveLength(3);
    });

    it('should support single character and class wildcards', async () => {
      expect(new Set(await collect(cache.getKeysByPattern('cart:?')))).toEqual(
        new Set(['cart:1', 'cart:2'])
      );
      expect(await collect(cache.getKeysByPattern('cart:[2-9]'))).toEqual(['cart:2']);
    });

    it('should match the same keys whatever the scan strategy', async () => {
      for (const scanStrategy of ['auto', 'scan', 'keys'] as const) {
        const provider = new CacheProvider(store, { scanStrategy, scanCount: 1 });
        const keys = await collect(provider.getKeysByPattern('cart:*'));

        expect(new Set(keys)).toEqual(new Set(['cart:1', 'cart:2', 'cart:10']));
      }
    });

    it('should strip the prefix from matched keys', async () => {
      const prefixed = new CacheProvider(store, { prefix: 'app' });
      await prefixed.setObject('cart:1', 1);

      expect(await collect(prefixed.getKeysByPattern('cart:*'))).toEqual(['cart:1']);
    });

    it('should restart the sweep on every iteration', async () => {
      const matches = cache.getKeysByPattern('user:*');

      expect(await collect(matches)).toEqual(['user:1']);
      await cache.setObject('user:2', 'bob');
      expect(await collect(matches)).toEqual(['user:1', 'user:2']);
    });

    it('should restart hash field sweeps on every iteration', async () => {
      const fields = cache.scanHashed<number>('cart:10', 'sku:*');

      expect(await collect(fields)).toEqual([['sku:42', 3]]);
      await cache.setHashed('cart:10', 'sku:43', 1);
      expect(await collect(fields)).toEqual([
        ['sku:42', 3],
        ['sku:43', 1],
      ]);
    });

    it('should leave tag index keys out of pattern results', async () => {
      await cache.setObject('user:1', 'ada', { tags: ['users'] });

      const keys = await collect(cache.getKeysByPattern('*'));

      expect(new Set(keys)).toEqual(new Set(['cart:1', 'cart:2', 'cart:10', 'user:1']));
      expect(await store.exists('$tag$:tag:users')).toBe(true);
    });
  });

  describe('maintenance', () => {
    it('should flush every key', async () => {
      await cache.setObject('a', 1);
      await cache.setHashed('b', 'f', 2);

      await cache.flushAll();

      expect(await cache.keyExists('a')).toBe(false);
      expect(await cache.keyExists('b')).toBe(false);
    });

    it('should track cache statistics', async () => {
      await cache.setObject('key1', 'value1');
      await cache.getObject('key1'); // Hit
      await cache.getObject('key2'); // Miss
      await cache.getObject('key1'); // Hit

      const stats = await cache.stats();

      expect(stats.hits).toBe(2);
      expect(stats.misses).toBe(1);
      expect(stats.hitRate).toBeCloseTo(2 / 3);
      expect(stats.operations).toBe(4);
      expect(stats.size).toBe(1);
    });
  });
});
