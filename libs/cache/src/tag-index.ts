/**
 * Tag index
 *
 * Each tag owns a set of encoded entry references; each tagged entry owns a
 * reverse set of its tag names so a new tag list can replace the old one.
 * References never keep a value alive: every query re-checks liveness and
 * detaches entries whose value is gone.
 */
import { z } from 'zod';
import { StoreConnectivityError } from './errors.js';
import type {
  CacheInstrumentation,
  CacheLogger,
  CacheStore,
  TagEntry,
  TagEntryKind,
} from './interfaces.js';
import { KeySpace, escapeGlob } from './keyspace.js';
import type { PatternScanner } from './pattern-scanner.js';

const KIND_CODES = {
  string: 's',
  'hash-field': 'h',
  'set-member': 'S',
  'sorted-set-member': 'z',
} as const satisfies Record<TagEntryKind, string>;

const KINDS_BY_CODE: Record<(typeof KIND_CODES)[TagEntryKind], TagEntryKind> = {
  s: 'string',
  h: 'hash-field',
  S: 'set-member',
  z: 'sorted-set-member',
};

const encodedEntrySchema = z
  .tuple([z.enum(['s', 'h', 'S', 'z']), z.string()])
  .rest(z.string());

export interface TagIndexOptions {
  keySpace?: KeySpace;
  /** Prefix of tag index keys (default: "$tag$:") */
  tagKeyPrefix?: string;
  scanner: PatternScanner;
  logger?: CacheLogger;
  instrumentation?: CacheInstrumentation;
}

export class TagIndex {
  private readonly keySpace: KeySpace;
  private readonly tagKeyPrefix: string;
  private readonly scanner: PatternScanner;
  private readonly logger?: CacheLogger;
  private readonly instrumentation?: CacheInstrumentation;

  constructor(
    private readonly store: CacheStore,
    options: TagIndexOptions
  ) {
    this.keySpace = options.keySpace ?? new KeySpace();
    this.tagKeyPrefix = options.tagKeyPrefix ?? '$tag$:';
    this.scanner = options.scanner;
    this.logger = options.logger;
    this.instrumentation = options.instrumentation;
  }

  encodeEntry(entry: TagEntry): string {
    const code = KIND_CODES[entry.kind];
    return JSON.stringify(code === 's' ? [code, entry.key] : [code, entry.key, entry.member ?? '']);
  }

  decodeEntry(raw: string): TagEntry | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }

    const result = encodedEntrySchema.safeParse(parsed);
    if (!result.success) {
      return null;
    }

    const [code, key, ...rest] = result.data;
    const kind = KINDS_BY_CODE[code];
    if (kind === 'string') {
      return { kind, key };
    }
    return rest.length === 0 ? null : { kind, key, member: rest[0] };
  }

  private tagKey(tag: string): string {
    return this.keySpace.key(`${this.tagKeyPrefix}tag:${tag}`);
  }

  private entryKey(encoded: string): string {
    return this.keySpace.key(`${this.tagKeyPrefix}entry:${encoded}`);
  }

  /**
   * Replace the tags of `entry` with `tags`
   */
  async associate(entry: TagEntry, tags: readonly string[]): Promise<void> {
    const member = this.encodeEntry(entry);
    await this.store.replaceTags(
      this.entryKey(member),
      member,
      this.keySpace.key(`${this.tagKeyPrefix}tag:`),
      Array.from(new Set(tags))
    );
  }

  /**
   * Whether a caller-side key (prefix already stripped) belongs to the index
   */
  isIndexKey(key: string): boolean {
    return key.startsWith(this.tagKeyPrefix);
  }

  /**
   * Tags currently recorded for `entry`
   */
  async getTags(entry: TagEntry): Promise<string[]> {
    return this.store.smembers(this.entryKey(this.encodeEntry(entry)));
  }

  /**
   * Whether `entry` is a live member of any of `tags`
   */
  async isInTag(entry: TagEntry, tags: readonly string[]): Promise<boolean> {
    if (tags.length === 0) {
      return false;
    }

    const member = this.encodeEntry(entry);
    const indexed = await Promise.all(
      tags.map((tag) => this.store.sismember(this.tagKey(tag), member))
    );
    if (!indexed.includes(true)) {
      return false;
    }

    if (await this.isAlive(entry)) {
      return true;
    }

    await this.detach(entry, tags);
    return false;
  }

  /**
   * Live entries indexed under any of `tags`; dead references are pruned
   */
  async getEntries(tags: readonly string[]): Promise<TagEntry[]> {
    const seen = new Set<string>();
    const live: TagEntry[] = [];

    for (const tag of new Set(tags)) {
      const members = await this.store.smembers(this.tagKey(tag));

      for (const member of members) {
        if (seen.has(member)) continue;
        seen.add(member);

        const entry = this.decodeEntry(member);
        if (!entry) {
          this.logger?.warn('Dropping malformed tag entry', { tag, member });
          await this.store.srem(this.tagKey(tag), [member]);
          continue;
        }

        if (await this.isAlive(entry)) {
          live.push(entry);
        } else {
          await this.detach(entry, [tag]);
        }
      }
    }

    return live;
  }

  /**
   * Remove every live value indexed under `tags` and drop the tags
   *
   * @returns Number of values removed
   */
  async invalidate(tags: readonly string[]): Promise<number> {
    const entries = await this.getEntries(tags);
    let removed = 0;

    for (const entry of entries) {
      if (await this.removeValue(entry)) {
        removed++;
      }
      await this.detach(entry, tags, false);
    }

    await this.store.del(tags.map((tag) => this.tagKey(tag)));
    return removed;
  }

  /**
   * Drop `entry` from every tag it is indexed under
   */
  async detach(entry: TagEntry, extraTags: readonly string[] = [], pruned = true): Promise<void> {
    const member = this.encodeEntry(entry);
    const reverseKey = this.entryKey(member);
    const tags = new Set([...(await this.store.smembers(reverseKey)), ...extraTags]);

    await Promise.all(Array.from(tags, (tag) => this.store.srem(this.tagKey(tag), [member])));
    await this.store.del([reverseKey]);

    if (pruned) {
      this.logger?.debug?.('Pruned dangling tag entry', { key: entry.key, kind: entry.kind });
      this.instrumentation?.recordPrune(1);
    }
  }

  /**
   * Names of all tags with an index in the store
   */
  async listTags(): Promise<string[]> {
    const prefix = `${this.tagKeyPrefix}tag:`;
    const tags: string[] = [];

    for await (const storeKey of this.scanner.keys(this.keySpace.pattern(`${escapeGlob(prefix)}*`))) {
      tags.push(this.keySpace.strip(storeKey).slice(prefix.length));
    }
    return tags;
  }

  private async isAlive(entry: TagEntry): Promise<boolean> {
    const key = this.keySpace.key(entry.key);
    const member = entry.member ?? '';

    try {
      switch (entry.kind) {
        case 'string':
          return await this.store.exists(key);
        case 'hash-field':
          return await this.store.hexists(key, member);
        case 'set-member':
          return await this.store.sismember(key, member);
        case 'sorted-set-member':
          return (await this.store.zscore(key, member)) !== null;
      }
    } catch (error) {
      // The key now holds another type, so the referenced value is gone
      if (error instanceof StoreConnectivityError && /WRONGTYPE/.test(error.message)) {
        return false;
      }
      throw error;
    }
  }

  private async removeValue(entry: TagEntry): Promise<boolean> {
    const key = this.keySpace.key(entry.key);
    const member = entry.member ?? '';

    switch (entry.kind) {
      case 'string':
        return (await this.store.del([key])) > 0;
      case 'hash-field':
        return this.store.hdel(key, member);
      case 'set-member':
        return (await this.store.srem(key, [member])) > 0;
      case 'sorted-set-member':
        return this.store.zrem(key, member);
    }
  }
}
