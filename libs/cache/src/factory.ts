/**
 * Cache factory - creates stores and providers based on configuration
 */
import { pino, type Logger } from 'pino';
import { z } from 'zod';
import { CacheProvider } from './cache-provider.js';
import { OptionValidationError } from './errors.js';
import type { CacheFactoryConfig, CacheLogger, CacheStore } from './interfaces.js';
import { MemoryStore } from './memory-store.js';
import { RedisStore } from './redis-store.js';

/**
 * Create a backing store based on configuration
 */
export function createStore(config: CacheFactoryConfig): CacheStore {
  if (config.backend === 'memory') {
    return new MemoryStore(config);
  } else if (config.backend === 'redis') {
    return new RedisStore(config);
  } else {
    throw new OptionValidationError(`Unsupported cache backend: ${String(config.backend)}`);
  }
}

/**
 * Create a cache provider based on configuration
 *
 * @example
 * ```typescript
 * // Memory store (development)
 * const cache = createCacheProvider({ backend: 'memory', prefix: 'myapp' });
 *
 * // Redis store (production)
 * const cache = createCacheProvider({
 *   backend: 'redis',
 *   ttl: 300,
 *   prefix: 'myapp',
 *   redis: { url: 'redis://localhost:6379' },
 * });
 * ```
 */
export function createCacheProvider(config: CacheFactoryConfig): CacheProvider {
  return new CacheProvider(createStore(config), config);
}

/**
 * Adapt a pino logger to the cache logger interface
 */
export function pinoCacheLogger(logger: Logger): CacheLogger {
  return {
    info: (msg, meta) => logger.info(meta ?? {}, msg),
    error: (msg, meta) => logger.error(meta ?? {}, msg),
    warn: (msg, meta) => logger.warn(meta ?? {}, msg),
    debug: (msg, meta) => logger.debug(meta ?? {}, msg),
  };
}

const optionalInt = z.coerce.number().int().nonnegative().optional();

const envSchema = z.object({
  CACHE_BACKEND: z.enum(['memory', 'redis']).default('memory'),
  CACHE_TTL: z.coerce.number().positive().optional(),
  CACHE_PREFIX: z.string().min(1).optional(),
  CACHE_TAG_PREFIX: z.string().min(1).optional(),
  CACHE_SCAN_STRATEGY: z.enum(['auto', 'scan', 'keys']).optional(),
  CACHE_SCAN_COUNT: z.coerce.number().int().positive().optional(),
  CACHE_MEMORY_CLEANUP_INTERVAL: optionalInt,
  REDIS_URL: z.string().min(1).optional(),
  REDIS_HOST: z.string().min(1).optional(),
  REDIS_PORT: optionalInt.default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: optionalInt.default(0),
});

/**
 * Parse cache configuration from environment variables
 *
 * Environment variables:
 * - CACHE_BACKEND: 'memory' or 'redis' (default: 'memory')
 * - CACHE_TTL: Default TTL in seconds (optional, no expiry without it)
 * - CACHE_PREFIX: Key prefix (optional)
 * - CACHE_TAG_PREFIX: Prefix of tag index keys (default: '$tag$:')
 * - CACHE_SCAN_STRATEGY: 'auto', 'scan' or 'keys' (default: 'auto')
 * - CACHE_SCAN_COUNT: Keys per cursor step (default: 250)
 * - CACHE_MEMORY_CLEANUP_INTERVAL: Cleanup interval in ms (default: 60000)
 * - REDIS_URL: Redis connection URL
 * - REDIS_HOST: Redis host (alternative to REDIS_URL)
 * - REDIS_PORT: Redis port (default: 6379)
 * - REDIS_PASSWORD: Redis password (optional)
 * - REDIS_DB: Redis database number (default: 0)
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): CacheFactoryConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new OptionValidationError(`Invalid cache environment: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  const config: CacheFactoryConfig = {
    backend: vars.CACHE_BACKEND,
    ttl: vars.CACHE_TTL,
    prefix: vars.CACHE_PREFIX,
    tagKeyPrefix: vars.CACHE_TAG_PREFIX,
    scanStrategy: vars.CACHE_SCAN_STRATEGY,
    scanCount: vars.CACHE_SCAN_COUNT,
  };

  if (config.backend === 'memory') {
    config.memory = {
      cleanupIntervalMs: vars.CACHE_MEMORY_CLEANUP_INTERVAL ?? 60000,
    };
  } else {
    if (!vars.REDIS_URL && !vars.REDIS_HOST) {
      throw new OptionValidationError('REDIS_URL or REDIS_HOST is required for the redis backend');
    }
    config.redis = {
      url: vars.REDIS_URL,
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
      password: vars.REDIS_PASSWORD,
      db: vars.REDIS_DB,
    };
  }

  return config;
}

/**
 * Create a cache provider from environment variables, logging through pino
 * (LOG_LEVEL, default 'info') unless a logger is given
 */
export function createCacheProviderFromEnv(
  overrides: Partial<Omit<CacheFactoryConfig, 'backend'>> = {},
  env: NodeJS.ProcessEnv = process.env
): CacheProvider {
  const config = configFromEnv(env);
  const logger =
    overrides.logger ??
    pinoCacheLogger(pino({ name: 'tagcache', level: env.LOG_LEVEL || 'info' }));

  logger.info('Creating cache provider', { backend: config.backend, prefix: config.prefix });
  return createCacheProvider({ ...config, ...overrides, logger });
}

/**
 * Run `fn` with a provider that is closed on every exit path
 *
 * @example
 * ```typescript
 * const report = await withCacheProvider({ backend: 'redis', redis: { url } }, (cache) =>
 *   cache.fetchObject('report:today', buildReport, { ttl: 600 })
 * );
 * ```
 */
export async function withCacheProvider<T>(
  config: CacheFactoryConfig | CacheProvider,
  fn: (cache: CacheProvider) => Promise<T>
): Promise<T> {
  const cache = config instanceof CacheProvider ? config : createCacheProvider(config);
  try {
    return await fn(cache);
  } finally {
    await cache.close();
  }
}
