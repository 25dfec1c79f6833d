import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import {
  CacheProvider,
  MemoryStore,
  SerializationError,
  cacheAside,
  cachedFunction,
  resolveTags,
} from '../src/index.js';

describe('Cache-Aside Pattern', () => {
  let cache: CacheProvider;

  beforeEach(() => {
    cache = new CacheProvider(new MemoryStore({ memory: { cleanupIntervalMs: 0 } }));
  });

  afterEach(async () => {
    await cache.close();
  });

  it('should fetch and cache on miss', async () => {
    const fetchFn = vi.fn().mockResolvedValue({ id: 1, name: 'Test' });

    const result1 = await cache.fetchObject('user:1', fetchFn, { ttl: 60 });

    expect(result1).toEqual({ id: 1, name: 'Test' });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn).toHaveBeenCalledWith();
    expect(await cache.getObject('user:1')).toEqual({ id: 1, name: 'Test' });

    // Second call should use cache
    const result2 = await cache.fetchObject('user:1', fetchFn, { ttl: 60 });

    expect(result2).toEqual({ id: 1, name: 'Test' });
    expect(fetchFn).toHaveBeenCalledTimes(1); // Not called again
  });

  it('should ignore producer, tags and ttl on a hit', async () => {
    await cache.setObject('user:1', 'stored');
    const fetchFn = vi.fn(() => 'computed');
    const tagsFn = vi.fn(() => ['users']);

    const result = await cache.fetchObject('user:1', fetchFn, { tags: tagsFn, ttl: 5 });

    expect(result).toBe('stored');
    expect(fetchFn).not.toHaveBeenCalled();
    expect(tagsFn).not.toHaveBeenCalled();
    expect(await cache.keyTimeToLive('user:1')).toBeNull();
    expect(await cache.isStringKeyInTag('user:1', 'users')).toBe(false);
  });

  it('should treat a cached null as a hit', async () => {
    await cache.setObject('nothing', null);
    const fetchFn = vi.fn(() => 'computed');

    expect(await cache.fetchObject('nothing', fetchFn)).toBeNull();
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should propagate producer errors and write nothing', async () => {
    const failure = new Error('database down');
    const tagsFn = vi.fn(() => ['users']);

    await expect(
      cache.fetchObject('user:1', () => Promise.reject(failure), { tags: tagsFn })
    ).rejects.toBe(failure);

    expect(await cache.keyExists('user:1')).toBe(false);
    expect(tagsFn).not.toHaveBeenCalled();
    expect(await cache.getAllTags()).toEqual([]);
  });

  it('should accept synchronous producers', async () => {
    expect(await cache.fetchObject('answer', () => 42)).toBe(42);
    expect(await cache.getObject('answer')).toBe(42);
  });

  it('should tag the produced value with a fixed list', async () => {
    await cache.fetchObject('user:1', async () => ({ id: 1 }), { tags: ['users'] });

    expect(await cache.isStringKeyInTag('user:1', 'users')).toBe(true);
    expect(await cache.isStringKeyInTag('user:1', 'admins')).toBe(false);
  });

  it('should derive tags from the produced value', async () => {
    const tagsFn = vi.fn((user: { id: number; org: string }) => [`org:${user.org}`]);

    await cache.fetchObject('user:1', async () => ({ id: 1, org: 'acme' }), { tags: tagsFn });

    expect(tagsFn).toHaveBeenCalledWith({ id: 1, org: 'acme' });
    expect(await cache.isStringKeyInTag('user:1', 'org:acme')).toBe(true);
  });

  it('should fetch hashed fields with a whole-key ttl', async () => {
    const fetchFn = vi.fn(async () => 3);

    expect(await cache.fetchHashed('cart:1', 'sku:42', fetchFn, { tags: ['sale'], ttl: 60 })).toBe(3);
    expect(await cache.fetchHashed('cart:1', 'sku:42', fetchFn)).toBe(3);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(await cache.getHashed('cart:1', 'sku:42')).toBe(3);
    expect(await cache.keyTimeToLive('cart:1')).toBeGreaterThan(0);
    expect(await cache.isHashFieldInTag('cart:1', 'sku:42', 'sale')).toBe(true);
  });

  it('should produce again after the value is removed', async () => {
    const fetchFn = vi.fn().mockResolvedValueOnce('first').mockResolvedValueOnce('second');

    expect(await cache.fetchObject('k', fetchFn)).toBe('first');
    await cache.remove('k');
    expect(await cache.fetchObject('k', fetchFn)).toBe('second');

    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('should let concurrent misses each produce, last write wins', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const slow = cache.fetchObject('k', async () => {
      await gate;
      return 'slow';
    });
    const fast = cache.fetchObject('k', async () => 'fast');

    expect(await fast).toBe('fast');
    release();
    expect(await slow).toBe('slow');

    expect(await cache.getObject('k')).toBe('slow');
  });

  it('should surface schema mismatches of cached values', async () => {
    await cache.setObject('user:1', { id: 'not-a-number' });
    const fetchFn = vi.fn(async () => ({ id: 1 }));

    await expect(
      cache.fetchObject('user:1', fetchFn, { schema: z.object({ id: z.number() }) })
    ).rejects.toBeInstanceOf(SerializationError);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should work through the standalone helper', async () => {
    const result = await cacheAside(cache, {
      key: 'config:app',
      fetch: async () => ({ version: '1.0' }),
      ttl: 600,
    });

    expect(result).toEqual({ version: '1.0' });
    expect(await cache.getObject('config:app')).toEqual({ version: '1.0' });
  });

  it('should work with cached function wrapper', async () => {
    const fetchFn = vi.fn().mockImplementation(async (id: string) => ({
      id,
      name: `User ${id}`,
    }));

    const getUser = cachedFunction(cache, (id: string) => `user:${id}`, fetchFn, { ttl: 60 });

    // First call fetches
    const user1 = await getUser('123');
    expect(user1).toEqual({ id: '123', name: 'User 123' });
    expect(fetchFn).toHaveBeenCalledTimes(1);

    // Second call uses cache
    const user2 = await getUser('123');
    expect(user2).toEqual({ id: '123', name: 'User 123' });
    expect(fetchFn).toHaveBeenCalledTimes(1);

    // Different ID fetches again
    const user3 = await getUser('456');
    expect(user3).toEqual({ id: '456', name: 'User 456' });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  describe('resolveTags', () => {
    it('should treat a fixed list as a derivation that ignores the value', () => {
      expect(resolveTags(['a', 'b'], 42)).toEqual(['a', 'b']);
      expect(resolveTags((n: number) => [`n:${n}`], 42)).toEqual(['n:42']);
      expect(resolveTags(undefined, 42)).toBeUndefined();
    });
  });
});
