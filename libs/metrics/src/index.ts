/**
 * @tagcache/metrics
 *
 * Prometheus instrumentation for @tagcache/cache.
 * Counts hits and misses per operation, times producers on cache misses and
 * counts dangling tag entries pruned during tag queries.
 */

import { register, collectDefaultMetrics, Registry, Counter, Histogram, Gauge } from 'prom-client';
import type { CacheInstrumentation, CacheStats, ProduceOutcome } from '@tagcache/cache';

// Export prom-client types for application-specific metrics
export { Counter, Histogram, Gauge, Registry, register };

/**
 * MetricsConfig - Configuration for cache instrumentation
 */
export interface MetricsConfig {
  /** Cache name (used as label) */
  cacheName: string;
  /** Whether to collect default Node.js process metrics */
  collectDefaultMetrics?: boolean;
  /** Custom registry (optional, defaults to global registry) */
  registry?: Registry;
  /** Prefix for all metric names (optional) */
  prefix?: string;
}

/**
 * Prometheus implementation of the cache instrumentation hooks
 */
export class CacheMetrics implements CacheInstrumentation {
  private readonly cacheName: string;
  private lookupsTotal: Counter;
  private produceDuration: Histogram;
  private prunedTotal: Counter;
  private hitRate: Gauge;
  private size: Gauge;

  constructor(config: MetricsConfig) {
    const registry = config.registry || register;
    const prefix = config.prefix || 'tagcache';
    this.cacheName = config.cacheName;

    // Lookups by operation and result (hit or miss)
    this.lookupsTotal = createCounter({
      name: `${prefix}_cache_lookups_total`,
      help: 'Total number of cache lookups',
      labelNames: ['cache', 'operation', 'result'],
      registry,
    });

    // Producer run time on cache misses, in seconds
    this.produceDuration = createHistogram({
      name: `${prefix}_cache_produce_duration_seconds`,
      help: 'Duration of value producers run on cache misses',
      labelNames: ['cache', 'operation', 'outcome'],
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registry,
    });

    this.prunedTotal = createCounter({
      name: `${prefix}_cache_tag_entries_pruned_total`,
      help: 'Dangling tag entries removed during tag queries',
      labelNames: ['cache'],
      registry,
    });

    this.hitRate = createGauge({
      name: `${prefix}_cache_hit_rate`,
      help: 'Cache hit rate (0-1) at the last stats observation',
      labelNames: ['cache'],
      registry,
    });

    this.size = createGauge({
      name: `${prefix}_cache_keys`,
      help: 'Number of keys in the backing store at the last stats observation',
      labelNames: ['cache'],
      registry,
    });
  }

  recordHit(operation: string): void {
    this.lookupsTotal.inc({ cache: this.cacheName, operation, result: 'hit' });
  }

  recordMiss(operation: string): void {
    this.lookupsTotal.inc({ cache: this.cacheName, operation, result: 'miss' });
  }

  recordProduce(operation: string, seconds: number, outcome: ProduceOutcome): void {
    this.produceDuration.observe({ cache: this.cacheName, operation, outcome }, seconds);
  }

  recordPrune(count: number): void {
    this.prunedTotal.inc({ cache: this.cacheName }, count);
  }

  /**
   * Publish a stats snapshot (e.g. from CacheProvider.stats()) as gauges
   */
  observeStats(stats: CacheStats): void {
    this.hitRate.set({ cache: this.cacheName }, stats.hitRate);
    this.size.set({ cache: this.cacheName }, stats.size);
  }
}

/**
 * Initialize metrics for a cache
 */
export function initializeMetrics(config: MetricsConfig): CacheMetrics {
  const registry = config.registry || register;

  // Collect default Node.js metrics (memory, CPU, event loop, etc.)
  if (config.collectDefaultMetrics !== false) {
    collectDefaultMetrics({
      register: registry,
      prefix: config.prefix ? `${config.prefix}_` : 'tagcache_',
      labels: { cache: config.cacheName },
    });
  }

  return new CacheMetrics(config);
}

/**
 * Handler for a /metrics endpoint
 */
export async function metricsHandler(registry: Registry = register): Promise<string> {
  return registry.metrics();
}

/**
 * Create a counter metric
 */
export function createCounter(opts: {
  name: string;
  help: string;
  labelNames?: string[];
  registry?: Registry;
}) {
  return new Counter({
    name: opts.name,
    help: opts.help,
    labelNames: opts.labelNames || [],
    registers: [opts.registry || register],
  });
}

/**
 * Create a gauge metric
 */
export function createGauge(opts: {
  name: string;
  help: string;
  labelNames?: string[];
  registry?: Registry;
}) {
  return new Gauge({
    name: opts.name,
    help: opts.help,
    labelNames: opts.labelNames || [],
    registers: [opts.registry || register],
  });
}

/**
 * Create a histogram metric
 */
export function createHistogram(opts: {
  name: string;
  help: string;
  labelNames?: string[];
  buckets?: number[];
  registry?: Registry;
}) {
  return new Histogram({
    name: opts.name,
    help: opts.help,
    labelNames: opts.labelNames || [],
    buckets: opts.buckets || [0.001, 0.01, 0.1, 1, 10],
    registers: [opts.registry || register],
  });
}
