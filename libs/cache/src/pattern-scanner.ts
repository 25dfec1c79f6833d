/**
 * Lazy glob enumeration over keys or hash fields
 *
 * Every iteration starts a fresh sweep. With the `auto` strategy the cursor
 * sweep is tried first; a store without SCAN downgrades the scanner to full
 * listings for the rest of its life.
 */
import { CapabilityMismatchError } from './errors.js';
import { GlobMatcher } from './glob.js';
import type { CacheLogger, CacheStore, ScanPage, ScanStrategy } from './interfaces.js';

export interface PatternScannerOptions {
  strategy?: ScanStrategy;
  /** Hint for how many items each cursor step returns */
  count?: number;
  logger?: CacheLogger;
}

export class PatternScanner {
  private strategy: ScanStrategy;
  private readonly count: number;
  private readonly logger?: CacheLogger;
  private readonly glob = new GlobMatcher();

  constructor(
    private readonly store: CacheStore,
    options: PatternScannerOptions = {}
  ) {
    this.strategy = options.strategy ?? 'auto';
    this.count = options.count ?? 250;
    this.logger = options.logger;
  }

  /**
   * Keys matching `pattern` in the flat key namespace
   */
  keys(pattern: string): AsyncIterable<string> {
    return {
      [Symbol.asyncIterator]: () =>
        this.sweep(
          (cursor) => this.store.scan(cursor, pattern, this.count),
          () => this.store.keys(pattern),
          (key) => key
        ),
    };
  }

  /**
   * Field/value pairs of one hash whose field matches `pattern`
   */
  fields(key: string, pattern: string): AsyncIterable<[string, string]> {
    return {
      [Symbol.asyncIterator]: () =>
        this.sweep(
          (cursor) => this.store.hscan(key, cursor, pattern, this.count),
          async () => {
            const all = await this.store.hgetall(key);
            return Object.entries(all).filter(([field]) => this.glob.matches(pattern, field));
          },
          ([field]) => field
        ),
    };
  }

  private async *sweep<T>(
    step: (cursor: string) => Promise<ScanPage<T>>,
    list: () => Promise<T[]>,
    identity: (item: T) => string
  ): AsyncGenerator<T> {
    if (this.strategy !== 'keys') {
      const seen = new Set<string>();
      let cursor = '0';
      let first = true;

      try {
        while (first || cursor !== '0') {
          const result = await step(cursor);
          first = false;
          cursor = result.cursor;

          // A cursor sweep may return an item more than once
          for (const item of result.items) {
            const id = identity(item);
            if (!seen.has(id)) {
              seen.add(id);
              yield item;
            }
          }
        }
        return;
      } catch (error) {
        if (!(error instanceof CapabilityMismatchError) || this.strategy !== 'auto' || !first) {
          throw error;
        }

        this.logger?.warn('Cursor scan unsupported, falling back to full listing', {
          command: error.command,
        });
        this.strategy = 'keys';
      }
    }

    yield* await list();
  }
}
