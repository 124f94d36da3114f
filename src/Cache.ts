import { CacheStats, CacheStatsManager } from './CacheStats';
import { Disposable, isDisposable } from './Disposable';
import { CacheOptions, createOptions, DEFAULT_CACHE_OPTIONS, RemovalPolicy, validateOptions } from './Options';
import { createBoundedStore } from './store/BoundedStoreFactory';
import LibLogger from './logger';

const logger = LibLogger.get('Cache');

/**
 * A bounded key/value cache. Once it holds `getMaximumSize()` entries, storing a
 * new key first removes one entry chosen by the cache's removal policy.
 *
 * Example:
 * ```ts
 * const cache = createCache<string, string>(2, 'lru');
 * cache.put('sophie', 'red');
 * cache.put('tom', 'blue');
 *
 * cache.get('tom');
 * cache.get('sophie');
 *
 * // "sophie" was read after "tom", so "tom" makes room for "robin"
 * cache.put('robin', 'green');
 * ```
 *
 * Every operation is synchronous. Iterators are live views ordered from the
 * eldest entry (next to be removed) to the newest; structurally modifying the
 * cache while one is outstanding makes its next step throw
 * ConcurrentModificationError.
 *
 * @template K - Key type, compared with SameValueZero like Map keys
 * @template V - Value type
 */
export interface Cache<K, V> extends Disposable, Iterable<V> {
  /**
   * Associate a value with a key and record an access to it.
   * Rewriting an existing key keeps the accesses recorded so far.
   * @returns the previous value for the key, or null if there was none
   */
  put(key: K, value: V): V | null;

  /**
   * Return the value for a key and record an access to it.
   * A null return means the key is absent, or mapped to null; use containsKey to tell them apart.
   */
  get(key: K): V | null;

  /**
   * Check for a key without recording an access
   */
  containsKey(key: K): boolean;

  /**
   * Values, from the eldest entry to the newest under the removal policy
   */
  iterator(): IterableIterator<V>;

  /**
   * Keys, from the eldest entry to the newest under the removal policy
   */
  iteratorKeys(): IterableIterator<K>;

  getMaximumSize(): number;

  getSize(): number;

  getRemovalPolicy(): RemovalPolicy;

  /**
   * Get current cache statistics
   */
  getStats(): CacheStats;

  resetStats(): void;

  /**
   * Remove every entry. The cache can be used again right away.
   */
  dispose(): void;
}

/**
 * Create a cache holding at most `maximumSize` entries
 * @throws InvalidConfigurationError if maximumSize is not a positive integer or the policy is unknown
 */
export const createCache = <K, V>(
  maximumSize: number,
  removalPolicy: RemovalPolicy = DEFAULT_CACHE_OPTIONS.removalPolicy
): Cache<K, V> => {
  return createCacheFromOptions<K, V>({ maximumSize, removalPolicy });
};

export const createCacheFromOptions = <K, V>(
  cacheOptions: Partial<CacheOptions> & Pick<CacheOptions, 'maximumSize'>
): Cache<K, V> => {
  const options = createOptions(cacheOptions);
  validateOptions(options);

  const store = createBoundedStore<K, V>(options.removalPolicy, options.maximumSize);
  const statsManager = new CacheStatsManager();

  logger.debug('Cache created', {
    component: 'cache',
    maximumSize: options.maximumSize,
    removalPolicy: options.removalPolicy
  });

  const put = (key: K, value: V): V | null => {
    logger.trace('put', { key });
    const { previous, evicted } = store.put(key, value);
    if (evicted) {
      statsManager.incrementEvictions();
      logger.debug('Evicted entry to make room', {
        evictedKey: evicted.key,
        newKey: key,
        removalPolicy: options.removalPolicy
      });
    }
    return previous;
  };

  const get = (key: K): V | null => {
    logger.trace('get', { key });
    statsManager.incrementRequests();
    if (!store.containsKey(key)) {
      statsManager.incrementMisses();
      return null;
    }
    statsManager.incrementHits();
    return store.get(key);
  };

  const dispose = (): void => {
    logger.debug('dispose', { size: store.getSize() });
    store.dispose();
  };

  return {
    put,
    get,
    containsKey: (key: K) => store.containsKey(key),
    iterator: () => store.iterator(),
    iteratorKeys: () => store.iteratorKeys(),
    [Symbol.iterator]: () => store.iterator(),
    getMaximumSize: () => store.getMaximumSize(),
    getSize: () => store.getSize(),
    getRemovalPolicy: () => store.getRemovalPolicy(),
    getStats: () => statsManager.getStats(),
    resetStats: () => statsManager.reset(),
    dispose
  };
};

export const isCache = (cache: unknown): cache is Cache<unknown, unknown> => {
  return isDisposable(cache) &&
    'put' in cache && typeof cache.put === 'function' &&
    'get' in cache && typeof cache.get === 'function' &&
    'containsKey' in cache && typeof cache.containsKey === 'function' &&
    'iteratorKeys' in cache && typeof cache.iteratorKeys === 'function' &&
    'getMaximumSize' in cache && typeof cache.getMaximumSize === 'function';
};
