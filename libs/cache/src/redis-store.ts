/**
 * Redis store for production
 * Uses ioredis for the primitive commands the cache is built on
 */
import { Redis } from 'ioredis';
import {
  CapabilityMismatchError,
  OptionValidationError,
  StoreConnectivityError,
  errorMessage,
} from './errors.js';
import type {
  CacheConfig,
  CacheLogger,
  CacheStore,
  ScanPage,
  StoreSetOptions,
  When,
} from './interfaces.js';

// HSET only when the field is already present; Redis has no HSETXX
const HSET_IF_EXISTS = `
if redis.call('HEXISTS', KEYS[1], ARGV[1]) == 1 then
  redis.call('HSET', KEYS[1], ARGV[1], ARGV[2])
  return 1
end
return 0
`;

// KEYS[1] reverse tag set; ARGV: member, tag key prefix, new tags...
const REPLACE_TAGS = `
local member = ARGV[1]
local prefix = ARGV[2]
local keep = {}
for i = 3, #ARGV do
  keep[ARGV[i]] = true
end
for _, tag in ipairs(redis.call('SMEMBERS', KEYS[1])) do
  if not keep[tag] then
    redis.call('SREM', prefix .. tag, member)
  end
end
redis.call('DEL', KEYS[1])
for i = 3, #ARGV do
  redis.call('SADD', prefix .. ARGV[i], member)
  redis.call('SADD', KEYS[1], ARGV[i])
end
return 0
`;

const UNKNOWN_COMMAND = /unknown command/i;
const WRONG_TYPE = /WRONGTYPE/;

export class RedisStore implements CacheStore {
  readonly backend = 'redis' as const;

  private client: Redis;
  private readonly logger?: CacheLogger;

  constructor(config: Pick<CacheConfig, 'redis' | 'logger'>) {
    if (!config.redis) {
      throw new OptionValidationError('Redis configuration required for RedisStore');
    }

    this.logger = config.logger;

    // Create Redis client
    if (config.redis.url) {
      this.client = new Redis(config.redis.url);
    } else {
      this.client = new Redis({
        host: config.redis.host ?? 'localhost',
        port: config.redis.port ?? 6379,
        password: config.redis.password,
        db: config.redis.db ?? 0,
      });
    }

    // Handle connection errors
    this.client.on('error', (err: unknown) => {
      this.logger?.error('Redis client error', { error: errorMessage(err) });
    });
  }

  private async run<T>(command: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const message = errorMessage(error);
      if (UNKNOWN_COMMAND.test(message)) {
        throw new CapabilityMismatchError(message, command, { cause: error });
      }

      // Liveness checks expect WRONGTYPE when a key changed type
      if (WRONG_TYPE.test(message)) {
        this.logger?.debug?.('Redis command rejected', { command, error: message });
      } else {
        this.logger?.error('Redis command error', { command, error: message });
      }
      throw new StoreConnectivityError(`Redis ${command} failed: ${message}`, command, {
        cause: error,
      });
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run('GET', () => this.client.get(key));
  }

  async set(key: string, value: string, options: StoreSetOptions = {}): Promise<boolean> {
    const { ttlMs, when = 'always' } = options;

    const result = await this.run('SET', () => {
      if (ttlMs !== undefined) {
        if (when === 'not-exists') return this.client.set(key, value, 'PX', ttlMs, 'NX');
        if (when === 'exists') return this.client.set(key, value, 'PX', ttlMs, 'XX');
        return this.client.set(key, value, 'PX', ttlMs);
      }
      if (when === 'not-exists') return this.client.set(key, value, 'NX');
      if (when === 'exists') return this.client.set(key, value, 'XX');
      return this.client.set(key, value);
    });

    return result === 'OK';
  }

  async getSet(key: string, value: string): Promise<string | null> {
    return this.run('GETSET', () => this.client.getset(key, value));
  }

  async exists(key: string): Promise<boolean> {
    const result = await this.run('EXISTS', () => this.client.exists(key));
    return result === 1;
  }

  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return this.run('DEL', () => this.client.del(...keys));
  }

  async expireAt(key: string, at: Date): Promise<boolean> {
    const result = await this.run('PEXPIREAT', () => this.client.pexpireat(key, at.getTime()));
    return result === 1;
  }

  async pexpire(key: string, ttlMs: number): Promise<boolean> {
    const result = await this.run('PEXPIRE', () => this.client.pexpire(key, ttlMs));
    return result === 1;
  }

  async pttl(key: string): Promise<number | null> {
    const result = await this.run('PTTL', () => this.client.pttl(key));

    // PTTL returns -2 if key doesn't exist, -1 if no expiration
    return result < 0 ? null : result;
  }

  async persist(key: string): Promise<boolean> {
    const result = await this.run('PERSIST', () => this.client.persist(key));
    return result === 1;
  }

  async hget(key: string, field: string): Promise<string | null> {
    return this.run('HGET', () => this.client.hget(key, field));
  }

  async hset(key: string, field: string, value: string, when: When = 'always'): Promise<boolean> {
    if (when === 'not-exists') {
      const result = await this.run('HSETNX', () => this.client.hsetnx(key, field, value));
      return result === 1;
    }

    if (when === 'exists') {
      const result = await this.run('EVAL', () =>
        this.client.eval(HSET_IF_EXISTS, 1, key, field, value)
      );
      return result === 1;
    }

    await this.run('HSET', () => this.client.hset(key, field, value));
    return true;
  }

  async hsetMany(key: string, entries: Array<[string, string]>): Promise<void> {
    if (entries.length === 0) {
      return;
    }
    await this.run('HSET', () => this.client.hset(key, Object.fromEntries(entries)));
  }

  async hmget(key: string, fields: string[]): Promise<Array<string | null>> {
    if (fields.length === 0) {
      return [];
    }
    return this.run('HMGET', () => this.client.hmget(key, ...fields));
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return this.run('HGETALL', () => this.client.hgetall(key));
  }

  async hdel(key: string, field: string): Promise<boolean> {
    const result = await this.run('HDEL', () => this.client.hdel(key, field));
    return result > 0;
  }

  async hexists(key: string, field: string): Promise<boolean> {
    const result = await this.run('HEXISTS', () => this.client.hexists(key, field));
    return result === 1;
  }

  async sadd(key: string, members: string[]): Promise<number> {
    if (members.length === 0) {
      return 0;
    }
    return this.run('SADD', () => this.client.sadd(key, ...members));
  }

  async srem(key: string, members: string[]): Promise<number> {
    if (members.length === 0) {
      return 0;
    }
    return this.run('SREM', () => this.client.srem(key, ...members));
  }

  async replaceTags(
    reverseKey: string,
    member: string,
    tagKeyPrefix: string,
    tags: string[]
  ): Promise<void> {
    await this.run('EVAL', () =>
      this.client.eval(REPLACE_TAGS, 1, reverseKey, member, tagKeyPrefix, ...tags)
    );
  }

  async sismember(key: string, member: string): Promise<boolean> {
    const result = await this.run('SISMEMBER', () => this.client.sismember(key, member));
    return result === 1;
  }

  async smembers(key: string): Promise<string[]> {
    return this.run('SMEMBERS', () => this.client.smembers(key));
  }

  async zadd(key: string, score: number, member: string): Promise<boolean> {
    const result = await this.run('ZADD', () => this.client.zadd(key, score, member));
    return Number(result) === 1;
  }

  async zrem(key: string, member: string): Promise<boolean> {
    const result = await this.run('ZREM', () => this.client.zrem(key, member));
    return result > 0;
  }

  async zscore(key: string, member: string): Promise<number | null> {
    const result = await this.run('ZSCORE', () => this.client.zscore(key, member));
    return result === null ? null : Number(result);
  }

  async pfadd(key: string, items: string[]): Promise<boolean> {
    const result = await this.run('PFADD', () => this.client.pfadd(key, ...items));
    return result === 1;
  }

  async pfcount(key: string): Promise<number> {
    return this.run('PFCOUNT', () => this.client.pfcount(key));
  }

  async keys(pattern: string): Promise<string[]> {
    return this.run('KEYS', () => this.client.keys(pattern));
  }

  async scan(cursor: string, pattern: string, count: number): Promise<ScanPage<string>> {
    const [nextCursor, keys] = await this.run('SCAN', () =>
      this.client.scan(cursor, 'MATCH', pattern, 'COUNT', count)
    );
    return { cursor: nextCursor, items: keys };
  }

  async hscan(
    key: string,
    cursor: string,
    pattern: string,
    count: number
  ): Promise<ScanPage<[string, string]>> {
    const [nextCursor, flat] = await this.run('HSCAN', () =>
      this.client.hscan(key, cursor, 'MATCH', pattern, 'COUNT', count)
    );

    // Reply alternates field, value
    const items: Array<[string, string]> = [];
    for (let i = 0; i + 1 < flat.length; i += 2) {
      items.push([flat[i], flat[i + 1]]);
    }
    return { cursor: nextCursor, items };
  }

  async dbSize(): Promise<number> {
    return this.run('DBSIZE', () => this.client.dbsize());
  }

  async flushAll(): Promise<void> {
    await this.run('FLUSHALL', () => this.client.flushall());
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
