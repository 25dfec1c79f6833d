/**
 * In-memory store for development and tests
 * Mirrors the Redis data types and expiry semantics the cache relies on
 */
import { CapabilityMismatchError, StoreConnectivityError } from './errors.js';
import { GlobMatcher } from './glob.js';
import { HyperLogLog } from './hyperloglog.js';
import type {
  CacheConfig,
  CacheStore,
  ScanPage,
  StoreSetOptions,
  When,
} from './interfaces.js';

type StoredValue =
  | { type: 'string'; value: string }
  | { type: 'hash'; value: Map<string, string> }
  | { type: 'set'; value: Set<string> }
  | { type: 'zset'; value: Map<string, number> }
  | { type: 'hll'; value: HyperLogLog };

type Entry = StoredValue & { expiresAt?: number };

function wrongType(command: string): StoreConnectivityError {
  return new StoreConnectivityError(
    'WRONGTYPE Operation against a key holding the wrong kind of value',
    command
  );
}

function page<T>(items: T[], cursor: string, count: number): ScanPage<T> {
  const offset = Number.parseInt(cursor, 10) || 0;
  const next = offset + count;
  return {
    cursor: next >= items.length ? '0' : String(next),
    items: items.slice(offset, next),
  };
}

export class MemoryStore implements CacheStore {
  readonly backend = 'memory' as const;

  private readonly data = new Map<string, Entry>();
  private readonly glob = new GlobMatcher();
  private readonly supportsScan: boolean;
  private cleanupInterval?: NodeJS.Timeout;

  constructor(config: Pick<CacheConfig, 'memory'> = {}) {
    this.supportsScan = config.memory?.supportsScan ?? true;

    // Start periodic cleanup of expired entries
    const cleanupIntervalMs = config.memory?.cleanupIntervalMs ?? 60000;
    if (cleanupIntervalMs > 0) {
      this.cleanupInterval = setInterval(() => {
        this.cleanupExpired();
      }, cleanupIntervalMs);
      this.cleanupInterval.unref();
    }
  }

  private cleanupExpired(): void {
    const now = Date.now();
    for (const [key, entry] of this.data.entries()) {
      if (entry.expiresAt !== undefined && entry.expiresAt <= now) {
        this.data.delete(key);
      }
    }
  }

  private live(key: string): Entry | undefined {
    const entry = this.data.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt !== undefined && entry.expiresAt <= Date.now()) {
      this.data.delete(key);
      return undefined;
    }
    return entry;
  }

  private liveKeys(): string[] {
    return Array.from(this.data.keys())
      .filter((key) => this.live(key) !== undefined)
      .sort();
  }

  private hash(key: string, command: string): Map<string, string> | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;
    if (entry.type !== 'hash') throw wrongType(command);
    return entry.value;
  }

  private members(key: string, command: string): Set<string> | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;
    if (entry.type !== 'set') throw wrongType(command);
    return entry.value;
  }

  private zset(key: string, command: string): Map<string, number> | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;
    if (entry.type !== 'zset') throw wrongType(command);
    return entry.value;
  }

  private dropIfEmpty(key: string, size: number): void {
    if (size === 0) {
      this.data.delete(key);
    }
  }

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    if (!entry) return null;
    if (entry.type !== 'string') throw wrongType('GET');
    return entry.value;
  }

  async set(key: string, value: string, options: StoreSetOptions = {}): Promise<boolean> {
    const { ttlMs, when = 'always' } = options;
    const exists = this.live(key) !== undefined;

    if ((when === 'exists' && !exists) || (when === 'not-exists' && exists)) {
      return false;
    }

    this.data.set(key, {
      type: 'string',
      value,
      expiresAt: ttlMs !== undefined ? Date.now() + ttlMs : undefined,
    });
    return true;
  }

  async getSet(key: string, value: string): Promise<string | null> {
    const previous = await this.get(key);
    this.data.set(key, { type: 'string', value });
    return previous;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async del(keys: string[]): Promise<number> {
    let deleted = 0;
    for (const key of keys) {
      if (this.live(key) !== undefined) {
        this.data.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  async expireAt(key: string, at: Date): Promise<boolean> {
    return this.pexpire(key, at.getTime() - Date.now());
  }

  async pexpire(key: string, ttlMs: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;

    if (ttlMs <= 0) {
      this.data.delete(key);
    } else {
      entry.expiresAt = Date.now() + ttlMs;
    }
    return true;
  }

  async pttl(key: string): Promise<number | null> {
    const entry = this.live(key);
    if (!entry || entry.expiresAt === undefined) return null;
    return entry.expiresAt - Date.now();
  }

  async persist(key: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.expiresAt === undefined) return false;
    entry.expiresAt = undefined;
    return true;
  }

  async hget(key: string, field: string): Promise<string | null> {
    return this.hash(key, 'HGET')?.get(field) ?? null;
  }

  async hset(key: string, field: string, value: string, when: When = 'always'): Promise<boolean> {
    let hash = this.hash(key, 'HSET');
    const exists = hash?.has(field) ?? false;

    if ((when === 'exists' && !exists) || (when === 'not-exists' && exists)) {
      return false;
    }

    if (!hash) {
      hash = new Map();
      this.data.set(key, { type: 'hash', value: hash });
    }
    hash.set(field, value);
    return true;
  }

  async hsetMany(key: string, entries: Array<[string, string]>): Promise<void> {
    for (const [field, value] of entries) {
      await this.hset(key, field, value);
    }
  }

  async hmget(key: string, fields: string[]): Promise<Array<string | null>> {
    const hash = this.hash(key, 'HMGET');
    return fields.map((field) => hash?.get(field) ?? null);
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return Object.fromEntries(this.hash(key, 'HGETALL') ?? new Map<string, string>());
  }

  async hdel(key: string, field: string): Promise<boolean> {
    const hash = this.hash(key, 'HDEL');
    if (!hash) return false;

    const removed = hash.delete(field);
    this.dropIfEmpty(key, hash.size);
    return removed;
  }

  async hexists(key: string, field: string): Promise<boolean> {
    return this.hash(key, 'HEXISTS')?.has(field) ?? false;
  }

  private addMembers(key: string, members: Iterable<string>, command: string): number {
    let set = this.members(key, command);
    if (!set) {
      set = new Set();
      this.data.set(key, { type: 'set', value: set });
    }

    let added = 0;
    for (const member of members) {
      if (!set.has(member)) {
        set.add(member);
        added++;
      }
    }
    this.dropIfEmpty(key, set.size);
    return added;
  }

  private removeMembers(key: string, members: Iterable<string>, command: string): number {
    const set = this.members(key, command);
    if (!set) return 0;

    let removed = 0;
    for (const member of members) {
      if (set.delete(member)) {
        removed++;
      }
    }
    this.dropIfEmpty(key, set.size);
    return removed;
  }

  async sadd(key: string, members: string[]): Promise<number> {
    return this.addMembers(key, members, 'SADD');
  }

  async srem(key: string, members: string[]): Promise<number> {
    return this.removeMembers(key, members, 'SREM');
  }

  async replaceTags(
    reverseKey: string,
    member: string,
    tagKeyPrefix: string,
    tags: string[]
  ): Promise<void> {
    // No await in here, so concurrent replacements never interleave
    const previous = Array.from(this.members(reverseKey, 'SMEMBERS') ?? []);
    for (const tag of previous) {
      if (!tags.includes(tag)) {
        this.removeMembers(`${tagKeyPrefix}${tag}`, [member], 'SREM');
      }
    }

    this.data.delete(reverseKey);
    for (const tag of tags) {
      this.addMembers(`${tagKeyPrefix}${tag}`, [member], 'SADD');
    }
    this.addMembers(reverseKey, tags, 'SADD');
  }

  async sismember(key: string, member: string): Promise<boolean> {
    return this.members(key, 'SISMEMBER')?.has(member) ?? false;
  }

  async smembers(key: string): Promise<string[]> {
    return Array.from(this.members(key, 'SMEMBERS') ?? []);
  }

  async zadd(key: string, score: number, member: string): Promise<boolean> {
    let zset = this.zset(key, 'ZADD');
    if (!zset) {
      zset = new Map();
      this.data.set(key, { type: 'zset', value: zset });
    }

    const added = !zset.has(member);
    zset.set(member, score);
    return added;
  }

  async zrem(key: string, member: string): Promise<boolean> {
    const zset = this.zset(key, 'ZREM');
    if (!zset) return false;

    const removed = zset.delete(member);
    this.dropIfEmpty(key, zset.size);
    return removed;
  }

  async zscore(key: string, member: string): Promise<number | null> {
    return this.zset(key, 'ZSCORE')?.get(member) ?? null;
  }

  async pfadd(key: string, items: string[]): Promise<boolean> {
    const entry = this.live(key);

    let changed = false;
    let hll: HyperLogLog;
    if (!entry) {
      hll = new HyperLogLog();
      this.data.set(key, { type: 'hll', value: hll });
      changed = true;
    } else if (entry.type === 'hll') {
      hll = entry.value;
    } else {
      throw wrongType('PFADD');
    }

    for (const item of items) {
      changed = hll.add(item) || changed;
    }
    return changed;
  }

  async pfcount(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) return 0;
    if (entry.type !== 'hll') throw wrongType('PFCOUNT');
    return entry.value.count();
  }

  async keys(pattern: string): Promise<string[]> {
    return this.liveKeys().filter((key) => this.glob.matches(pattern, key));
  }

  async scan(cursor: string, pattern: string, count: number): Promise<ScanPage<string>> {
    if (!this.supportsScan) {
      throw new CapabilityMismatchError('ERR unknown command SCAN', 'SCAN');
    }

    const result = page(this.liveKeys(), cursor, count);
    return {
      cursor: result.cursor,
      items: result.items.filter((key) => this.glob.matches(pattern, key)),
    };
  }

  async hscan(
    key: string,
    cursor: string,
    pattern: string,
    count: number
  ): Promise<ScanPage<[string, string]>> {
    if (!this.supportsScan) {
      throw new CapabilityMismatchError('ERR unknown command HSCAN', 'HSCAN');
    }

    const hash = this.hash(key, 'HSCAN');
    const fields: Array<[string, string]> = hash ? Array.from(hash.entries()) : [];
    const result = page(fields, cursor, count);
    return {
      cursor: result.cursor,
      items: result.items.filter(([field]) => this.glob.matches(pattern, field)),
    };
  }

  async dbSize(): Promise<number> {
    return this.liveKeys().length;
  }

  async flushAll(): Promise<void> {
    this.data.clear();
  }

  async close(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }

    this.data.clear();
  }
}
